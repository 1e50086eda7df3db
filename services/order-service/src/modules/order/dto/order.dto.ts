import { DELIVERY_TYPES, DeliveryType, ORDER_STATUSES, OrderStatus } from "@dropline/types";
import { IsBoolean, IsIn, IsNumber, IsOptional, IsString, Max, Min, MinLength } from "class-validator";

export class QuoteDto {
  @IsNumber()
  foodSubtotal!: number;

  @IsNumber()
  platformFee!: number;

  @IsNumber()
  deliveryFee!: number;
}

export class CreateOrderDto extends QuoteDto {
  @IsString()
  @MinLength(1)
  restaurantId!: string;

  @IsOptional()
  @IsIn([...DELIVERY_TYPES])
  deliveryType?: DeliveryType;

  @IsOptional()
  @IsString()
  customerId?: string;
}

export class SetOrderStatusDto {
  @IsIn([...ORDER_STATUSES])
  status!: OrderStatus;
}

export class AssignDriverDto {
  @IsOptional()
  @IsString()
  driverId?: string;
}

export class LocationUpdateDto {
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @IsNumber()
  @Min(-180)
  @Max(180)
  lng!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  accuracy?: number;
}

export class DriverActionDto {
  @IsString()
  driverId!: string;
}

// Photo presence is checked by the service so the rejection carries MissingProof.
export class PickupDto extends DriverActionDto {
  @IsOptional()
  @IsString()
  photoRef?: string;
}

export class CompleteDeliveryDto extends DriverActionDto {
  @IsOptional()
  @IsString()
  photoRef?: string;

  @IsOptional()
  @IsBoolean()
  handedToCustomer?: boolean;
}
