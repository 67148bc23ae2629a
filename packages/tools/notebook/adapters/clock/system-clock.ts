/**
 * Adapter: SystemClock
 *
 * Clock backed by the process time, expressed in the configured zone.
 */

import { TZDate } from "@date-fns/tz";
import { type Timestamp, timestamp } from "../../domain/entities/moment.ts";
import type { Clock } from "../../domain/ports/clock.ts";

export class SystemClock implements Clock {
  constructor(private readonly timeZone: string) {}

  now(): Timestamp {
    return timestamp(new TZDate(Date.now(), this.timeZone));
  }
}
