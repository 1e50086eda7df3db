import { Actor, AuditEventRecord, AuditSummary } from "@dropline/types";
import { Controller, Get, Query, UseGuards } from "@nestjs/common";
import { AccessService } from "../access/access.service";
import { ActorGuard, CurrentActor } from "../access/actor.guard";
import { AuditService } from "./audit.service";

@Controller("audit")
@UseGuards(ActorGuard)
export class AuditController {
  constructor(
    private readonly audit: AuditService,
    private readonly access: AccessService,
  ) {}

  @Get("events")
  events(
    @CurrentActor() actor: Actor,
    @Query("limit") limit?: string,
    @Query("action") action?: string,
    @Query("actorKey") actorKey?: string,
  ): AuditEventRecord[] {
    this.access.assertRole(actor, "audit.read", "audit");
    const parsedLimit = Number(limit);
    return this.audit.list(Number.isFinite(parsedLimit) && limit ? parsedLimit : 100, action, actorKey);
  }

  @Get("summary")
  summary(@CurrentActor() actor: Actor): AuditSummary {
    this.access.assertRole(actor, "audit.read", "audit");
    return this.audit.summary();
  }
}
