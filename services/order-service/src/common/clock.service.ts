import { Injectable } from "@nestjs/common";

/**
 * Wall clock that never steps backwards: if the system time moves back, the
 * last issued instant is repeated until real time catches up.
 */
@Injectable()
export class ClockService {
  private lastUnixMs = 0;

  now(): Date {
    const current = Date.now();
    if (current > this.lastUnixMs) this.lastUnixMs = current;
    return new Date(this.lastUnixMs);
  }

  nowIso(): string {
    return this.now().toISOString();
  }
}
