import { Actor, DriverRecord } from "@dropline/types";
import { Body, Controller, Get, HttpCode, Param, Post, UseGuards } from "@nestjs/common";
import { ActorGuard, CurrentActor } from "../access/actor.guard";
import { DriverService } from "./driver.service";
import { DriverAvailabilityDto, RegisterDriverDto } from "./dto/driver.dto";

@Controller("drivers")
@UseGuards(ActorGuard)
export class DriverController {
  constructor(private readonly driverService: DriverService) {}

  @Post()
  async register(@CurrentActor() actor: Actor, @Body() dto: RegisterDriverDto): Promise<DriverRecord> {
    return this.driverService.registerDriver(actor, dto.name, dto.phone);
  }

  @Get()
  list(@CurrentActor() actor: Actor): DriverRecord[] {
    return this.driverService.listDrivers(actor);
  }

  @Get(":driverId")
  get(@CurrentActor() actor: Actor, @Param("driverId") driverId: string): DriverRecord {
    return this.driverService.getDriver(actor, driverId);
  }

  @Post(":driverId/availability")
  @HttpCode(200)
  async availability(
    @CurrentActor() actor: Actor,
    @Param("driverId") driverId: string,
    @Body() dto: DriverAvailabilityDto,
  ): Promise<DriverRecord> {
    return this.driverService.setAvailability(actor, driverId, dto.available);
  }
}
