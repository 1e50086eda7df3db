import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  WebSocketGateway,
  WebSocketServer,
} from "@nestjs/websockets";
import { Logger, OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import { Server, Socket } from "socket.io";
import { Subscription } from "rxjs";
import { Actor, RealtimeEvent } from "@dropline/types";
import { ActorResolverService } from "../access/actor-resolver.service";
import { actorKeyOf } from "../audit/audit.service";
import { ADMIN_ROOM, RealtimeEventsService } from "./realtime-events.service";

function handshakeToken(client: Socket): string | null {
  const fromAuth: unknown = client.handshake.auth.token;
  if (typeof fromAuth === "string" && fromAuth.length > 0) return fromAuth;
  const fromQuery = client.handshake.query.token;
  return typeof fromQuery === "string" && fromQuery.length > 0 ? fromQuery : null;
}

function roomsFor(actor: Actor): string[] {
  return actor.role === "admin" ? [actorKeyOf(actor), ADMIN_ROOM] : [actorKeyOf(actor)];
}

@WebSocketGateway({
  cors: { origin: "*" },
  namespace: "/realtime",
})
export class RealtimeGateway
  implements OnGatewayConnection, OnGatewayDisconnect, OnModuleInit, OnModuleDestroy {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(RealtimeGateway.name);
  private eventsSub?: Subscription;

  constructor(
    private readonly events: RealtimeEventsService,
    private readonly resolver: ActorResolverService,
  ) {}

  onModuleInit(): void {
    this.eventsSub = this.events.events$.subscribe((event: RealtimeEvent) => {
      if (event.targetActorKeys.length === 0) return;
      this.server.to(event.targetActorKeys).emit("realtime:event", event);
    });
  }

  onModuleDestroy(): void {
    this.eventsSub?.unsubscribe();
  }

  async handleConnection(client: Socket): Promise<void> {
    const token = handshakeToken(client);
    if (!token) {
      this.logger.warn(`Socket ${client.id} rejected: no token`);
      client.disconnect(true);
      return;
    }

    let actor: Actor;
    try {
      actor = this.resolver.resolveToken(token);
    } catch (error) {
      this.logger.warn(`Socket ${client.id} rejected: ${error instanceof Error ? error.message : String(error)}`);
      client.disconnect(true);
      return;
    }

    const rooms = roomsFor(actor);
    await client.join(rooms);
    this.logger.log(`Socket ${client.id} joined ${rooms.join(", ")}`);
  }

  handleDisconnect(client: Socket): void {
    this.logger.log(`Socket disconnected: ${client.id}`);
  }
}
