import { DateTime } from "luxon";
import { utcNowIso } from "../time.js";

export interface Clock {
  now(): Date;
  nowIso(): string;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  nowIso(): string {
    return utcNowIso();
  }
}

export class FixedClock implements Clock {
  private readonly instant: DateTime;

  constructor(iso: string) {
    const parsed = DateTime.fromISO(iso, { zone: "utc" });
    if (!parsed.isValid) {
      throw new Error(`Invalid fixed clock instant: ${iso}`);
    }
    this.instant = parsed;
  }

  now(): Date {
    return this.instant.toJSDate();
  }

  nowIso(): string {
    const iso = this.instant.toISO();
    if (!iso) {
      throw new Error("Failed to serialize fixed clock instant");
    }
    return iso;
  }
}
