import { Quote } from "@dropline/types";
import { Body, Controller, HttpCode, Post } from "@nestjs/common";
import { QuoteDto } from "../order/dto/order.dto";
import { PricingService } from "./pricing.service";

@Controller("orders/quote")
export class PricingController {
  constructor(private readonly pricing: PricingService) {}

  @Post()
  @HttpCode(200)
  quote(@Body() dto: QuoteDto): Quote {
    return this.pricing.quote(dto);
  }
}
