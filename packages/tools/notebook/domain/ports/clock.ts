// Clock port - the current time, in the configured zone

import type { Timestamp } from "../entities/moment.ts";

export interface Clock {
  now(): Timestamp;
}
