// worldcore/time/StoreHours.ts

import { CalendarTime, formatClockTime, isTimeInRange, parseClockTime } from "./WorldClock";

export interface StoreHoursDef {
  storeId: string;
  open: string; // "HH:MM"
  close: string; // "HH:MM"
  closedDays?: number[];
}

interface CompiledHours {
  open: number;
  close: number;
  closedDays: Set<number>;
}

export class StoreHours {
  private readonly hours = new Map<string, CompiledHours>();

  set(def: StoreHoursDef): void {
    this.hours.set(def.storeId, {
      open: parseClockTime(def.open),
      close: parseClockTime(def.close),
      closedDays: new Set(def.closedDays ?? []),
    });
  }

  has(storeId: string): boolean {
    return this.hours.has(storeId);
  }

  /** Stores without hours never close. */
  isOpen(storeId: string, now: CalendarTime): boolean {
    const h = this.hours.get(storeId);
    if (!h) return true;
    if (h.closedDays.has(now.day)) return false;
    return isTimeInRange(now.minuteOfDay, h.open, h.close);
  }

  status(storeId: string, now: CalendarTime): string {
    if (this.isOpen(storeId, now)) return "Open";
    const h = this.hours.get(storeId);
    return `Closed (opens at ${formatClockTime(h ? h.open : 8 * 60)})`;
  }
}
