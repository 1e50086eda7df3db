import { Actor, ArrivalAck, LocationAck, OrderRecord } from "@dropline/types";
import { Body, Controller, Get, Headers, HttpCode, Param, Post, UseGuards } from "@nestjs/common";
import { ActorGuard, CurrentActor } from "../access/actor.guard";
import { DispatchService } from "../dispatch/dispatch.service";
import { OrderService } from "./order.service";
import {
  AssignDriverDto,
  CompleteDeliveryDto,
  CreateOrderDto,
  DriverActionDto,
  LocationUpdateDto,
  PickupDto,
  SetOrderStatusDto,
} from "./dto/order.dto";

@Controller("orders")
@UseGuards(ActorGuard)
export class OrderController {
  constructor(
    private readonly orderService: OrderService,
    private readonly dispatch: DispatchService,
  ) {}

  @Post()
  async create(
    @CurrentActor() actor: Actor,
    @Body() dto: CreateOrderDto,
    @Headers("x-idempotency-key") idempotencyKey?: string,
  ): Promise<OrderRecord> {
    return this.orderService.createOrder(actor, dto, idempotencyKey);
  }

  @Get()
  list(@CurrentActor() actor: Actor): OrderRecord[] {
    return this.orderService.listOrders(actor);
  }

  @Get(":orderId")
  get(@CurrentActor() actor: Actor, @Param("orderId") orderId: string): OrderRecord {
    return this.orderService.getOrder(actor, orderId);
  }

  @Post(":orderId/confirm")
  @HttpCode(200)
  async confirm(@CurrentActor() actor: Actor, @Param("orderId") orderId: string): Promise<OrderRecord> {
    return this.orderService.confirmOrder(actor, orderId);
  }

  @Post(":orderId/cancel")
  @HttpCode(200)
  async cancel(@CurrentActor() actor: Actor, @Param("orderId") orderId: string): Promise<OrderRecord> {
    return this.orderService.cancelOrder(actor, orderId);
  }

  @Post(":orderId/status")
  @HttpCode(200)
  async setStatus(
    @CurrentActor() actor: Actor,
    @Param("orderId") orderId: string,
    @Body() dto: SetOrderStatusDto,
  ): Promise<OrderRecord> {
    return this.orderService.setStatus(actor, orderId, dto.status);
  }

  @Post(":orderId/assign")
  @HttpCode(200)
  async assign(
    @CurrentActor() actor: Actor,
    @Param("orderId") orderId: string,
    @Body() dto: AssignDriverDto,
  ): Promise<OrderRecord> {
    return this.dispatch.assignDriver(actor, orderId, dto.driverId);
  }

  @Post(":orderId/location")
  @HttpCode(200)
  async location(
    @CurrentActor() actor: Actor,
    @Param("orderId") orderId: string,
    @Body() dto: LocationUpdateDto,
  ): Promise<LocationAck> {
    return this.dispatch.reportLocation(actor, orderId, dto.lat, dto.lng, dto.accuracy);
  }

  @Post(":orderId/pickup")
  @HttpCode(200)
  async pickup(
    @CurrentActor() actor: Actor,
    @Param("orderId") orderId: string,
    @Body() dto: PickupDto,
  ): Promise<OrderRecord> {
    return this.orderService.confirmPickup(actor, orderId, dto.driverId, dto.photoRef);
  }

  @Post(":orderId/start")
  @HttpCode(200)
  async start(
    @CurrentActor() actor: Actor,
    @Param("orderId") orderId: string,
    @Body() dto: DriverActionDto,
  ): Promise<OrderRecord> {
    return this.orderService.startDelivery(actor, orderId, dto.driverId);
  }

  @Post(":orderId/arrive")
  @HttpCode(200)
  async arrive(@CurrentActor() actor: Actor, @Param("orderId") orderId: string): Promise<ArrivalAck> {
    return this.orderService.markArrival(actor, orderId);
  }

  @Post(":orderId/complete")
  @HttpCode(200)
  async complete(
    @CurrentActor() actor: Actor,
    @Param("orderId") orderId: string,
    @Body() dto: CompleteDeliveryDto,
  ): Promise<OrderRecord> {
    return this.dispatch.completeDelivery(actor, orderId, dto.driverId, dto.photoRef, dto.handedToCustomer);
  }
}
