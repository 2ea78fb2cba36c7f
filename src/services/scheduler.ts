/**
 * Strategic slot assignment.
 *
 * Slots are the configured times of day in the schedule timezone. Reservations
 * live in the slot store so separate runs never hand out the same instant.
 * Within a run the cursor only moves forward.
 */

import type { ScheduleConfig } from '../lib/config';
import type { ScheduleInfo } from '../lib/types';
import type { SlotOwner, SlotStore } from './slot-store';
import { ConfigurationError, errorMessage } from '../lib/errors';
import {
  addDays,
  assertTimeZone,
  formatLocal,
  parseTimeOfDay,
  zonedParts,
  zonedTimeToUtc,
  type CalendarDate,
} from '../lib/time';

// A year of fully booked days means something is wrong with the store
const MAX_SEARCH_DAYS = 366;

export class StrategicScheduler {
  private readonly times: Array<{ hour: number; minute: number }>;
  private cursor: Date;

  constructor(
    private readonly store: SlotStore,
    private readonly config: ScheduleConfig,
    private readonly now: () => Date = () => new Date()
  ) {
    try {
      assertTimeZone(config.timezone);
    } catch (error) {
      throw new ConfigurationError(`Invalid schedule timezone "${config.timezone}": ${errorMessage(error)}`);
    }
    if (config.strategicTimes.length === 0) {
      throw new ConfigurationError('At least one strategic time is required');
    }

    this.times = config.strategicTimes.map(parseTimeOfDay);
    this.cursor = this.now();
  }

  get timezone(): string {
    return this.config.timezone;
  }

  /**
   * Start a run: reset the cursor to now and drop reservations that have passed
   */
  beginRun(): void {
    this.cursor = this.now();
    const pruned = this.store.pruneBefore(this.cursor);
    if (pruned > 0) {
      console.log(`[scheduler] Pruned ${pruned} past slot(s)`);
    }
  }

  /**
   * Reserve and return the next free slot after the cursor
   */
  nextSlot(owner?: SlotOwner): Date {
    let after = this.searchStart();

    while (true) {
      const slot = this.findFreeSlot(after);
      // Another process may have claimed it between the check and the insert
      if (this.store.reserve(slot, owner)) {
        this.cursor = slot;
        console.log(`[scheduler] Reserved ${formatLocal(slot, this.config.timezone)} (${this.config.timezone})`);
        return slot;
      }
      after = slot;
    }
  }

  /**
   * Next free slot without reserving it
   */
  peekNextSlot(): Date {
    return this.findFreeSlot(this.searchStart());
  }

  /**
   * Give a slot back after its publish failed
   */
  release(slot: Date): void {
    this.store.release(slot);
    console.log(`[scheduler] Released ${formatLocal(slot, this.config.timezone)}`);
  }

  /**
   * Mark publish times already booked on the provider. A booking occupies every
   * strategic slot in the same local hour. Returns how many slots were newly reserved.
   */
  markUsed(times: Date[]): number {
    const now = this.now().getTime();
    let added = 0;
    for (const time of times) {
      for (const slot of this.slotsInHourOf(time)) {
        if (slot.getTime() > now && this.store.reserve(slot)) {
          added++;
        }
      }
    }
    return added;
  }

  getInfo(): ScheduleInfo {
    return {
      timezone: this.config.timezone,
      strategicTimes: [...this.config.strategicTimes],
      nextAvailableSlot: this.peekNextSlot().toISOString(),
      reservedSlots: this.store.listReserved(this.now()).map((slot) => slot.toISOString()),
    };
  }

  private slotsInHourOf(time: Date): Date[] {
    const local = zonedParts(time, this.config.timezone);
    const day: CalendarDate = { year: local.year, month: local.month, day: local.day };
    return this.times
      .filter(({ hour }) => hour === local.hour)
      .map(({ hour, minute }) => zonedTimeToUtc(day, hour, minute, this.config.timezone));
  }

  private searchStart(): Date {
    const now = this.now();
    return this.cursor.getTime() > now.getTime() ? this.cursor : now;
  }

  /**
   * First configured slot strictly after `after` that the store has not reserved
   */
  private findFreeSlot(after: Date): Date {
    const local = zonedParts(after, this.config.timezone);
    const start: CalendarDate = { year: local.year, month: local.month, day: local.day };

    for (let offset = 0; offset <= MAX_SEARCH_DAYS; offset++) {
      const day = addDays(start, offset);
      for (const { hour, minute } of this.times) {
        const slot = zonedTimeToUtc(day, hour, minute, this.config.timezone);
        if (slot.getTime() > after.getTime() && !this.store.isReserved(slot)) {
          return slot;
        }
      }
    }

    throw new Error(`No free slot within ${MAX_SEARCH_DAYS} days of ${after.toISOString()}`);
  }
}
