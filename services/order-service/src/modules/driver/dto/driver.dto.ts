import { IsBoolean, IsString, MaxLength, MinLength } from "class-validator";

export class RegisterDriverDto {
  @IsString()
  @MinLength(1)
  @MaxLength(120)
  name!: string;

  @IsString()
  @MinLength(3)
  @MaxLength(32)
  phone!: string;
}

export class DriverAvailabilityDto {
  @IsBoolean()
  available!: boolean;
}
