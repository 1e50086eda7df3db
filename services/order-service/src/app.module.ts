import { Module } from "@nestjs/common";
import { CoreModule } from "./core.module";
import { RealtimeGateway } from "./modules/realtime/realtime.gateway";

@Module({
  imports: [CoreModule],
  providers: [RealtimeGateway],
})
export class AppModule {}
