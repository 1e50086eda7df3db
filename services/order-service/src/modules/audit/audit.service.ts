import { Actor, AuditActorRole, AuditEventRecord, AuditOutcome, AuditSummary } from "@dropline/types";
import { Injectable, Logger } from "@nestjs/common";
import { ClockService } from "../../common/clock.service";
import { IdService } from "../../common/id.service";

type RecordInput = Omit<AuditEventRecord, "id" | "createdAtIso" | "service">;

const MAX_EVENTS = 5000;

export function actorKeyOf(actor: Actor): string {
  switch (actor.role) {
    case "customer":
      return `customer:${actor.identity}`;
    case "driver":
      return `driver:${actor.driverId}`;
    case "admin":
      return `admin:${actor.identity}`;
  }
}

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);
  private readonly serviceName = "order-service";
  private readonly events: AuditEventRecord[] = [];

  constructor(
    private readonly clock: ClockService,
    private readonly ids: IdService,
  ) {}

  record(input: RecordInput): AuditEventRecord {
    const event: AuditEventRecord = {
      id: this.ids.auditId(),
      service: this.serviceName,
      createdAtIso: this.clock.nowIso(),
      ...input,
    };

    this.events.unshift(event);
    if (this.events.length > MAX_EVENTS) this.events.length = MAX_EVENTS;
    if (event.outcome === "FAILURE") {
      this.logger.debug(`${event.action} denied for ${event.actorKey} on ${event.resourceType}:${event.resourceId ?? "-"}`);
    }
    return event;
  }

  recordActor(
    actor: Actor,
    action: string,
    outcome: AuditOutcome,
    resourceType: string,
    resourceId?: string,
    metadata?: Record<string, string | number | boolean>,
  ): AuditEventRecord {
    const actorRole: AuditActorRole = actor.role;
    return this.record({
      actorKey: actorKeyOf(actor),
      actorRole,
      action,
      resourceType,
      resourceId,
      outcome,
      metadata,
    });
  }

  list(limit = 100, action?: string, actorKey?: string): AuditEventRecord[] {
    return this.events
      .filter((event) => (action ? event.action === action : true))
      .filter((event) => (actorKey ? event.actorKey === actorKey : true))
      .slice(0, Math.min(Math.max(limit, 1), 500));
  }

  summary(): AuditSummary {
    const actionCounts = new Map<string, number>();
    let failedEvents = 0;

    for (const event of this.events) {
      actionCounts.set(event.action, (actionCounts.get(event.action) || 0) + 1);
      if (event.outcome === "FAILURE") failedEvents += 1;
    }

    return {
      service: this.serviceName,
      totalEvents: this.events.length,
      failedEvents,
      lastEventAtIso: this.events[0]?.createdAtIso || null,
      actions: Array.from(actionCounts.entries())
        .map(([action, count]) => ({ action, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, 20),
    };
  }
}
