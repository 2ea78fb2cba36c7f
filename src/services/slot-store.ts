import { getDb } from '../lib/db';

/**
 * Who holds a reserved slot. Slots seeded from posts already on the
 * provider have no owner.
 */
export interface SlotOwner {
  pageId: string;
  postId: string;
}

/**
 * Durable set of reserved publish instants
 */
export interface SlotStore {
  isReserved(slot: Date): boolean;
  /** Returns false when the slot was already taken */
  reserve(slot: Date, owner?: SlotOwner): boolean;
  release(slot: Date): void;
  listReserved(from: Date): Date[];
  /** Delete reservations strictly before `cutoff`, returning how many were removed */
  pruneBefore(cutoff: Date): number;
}

/**
 * Check if a slot instant is already reserved
 */
export function isSlotReserved(slot: Date): boolean {
  const db = getDb();
  const row = db
    .prepare<[number], { slot_at: number }>('SELECT slot_at FROM scheduled_slots WHERE slot_at = ?')
    .get(slot.getTime());

  return row !== undefined;
}

/**
 * Reserve a slot. The primary key makes this a single atomic claim.
 */
export function reserveSlot(slot: Date, owner?: SlotOwner): boolean {
  const db = getDb();
  const result = db
    .prepare(
      'INSERT OR IGNORE INTO scheduled_slots (slot_at, page_id, post_id, reserved_at) VALUES (?, ?, ?, ?)'
    )
    .run(slot.getTime(), owner?.pageId ?? null, owner?.postId ?? null, Date.now());

  return result.changes === 1;
}

export function releaseSlot(slot: Date): void {
  const db = getDb();
  db.prepare('DELETE FROM scheduled_slots WHERE slot_at = ?').run(slot.getTime());
}

export function listReservedSlots(from: Date): Date[] {
  const db = getDb();
  const rows = db
    .prepare<[number], { slot_at: number }>(
      'SELECT slot_at FROM scheduled_slots WHERE slot_at >= ? ORDER BY slot_at ASC'
    )
    .all(from.getTime());

  return rows.map((row) => new Date(row.slot_at));
}

export function pruneSlotsBefore(cutoff: Date): number {
  const db = getDb();
  const result = db.prepare('DELETE FROM scheduled_slots WHERE slot_at < ?').run(cutoff.getTime());
  return result.changes;
}

export const sqliteSlotStore: SlotStore = {
  isReserved: isSlotReserved,
  reserve: reserveSlot,
  release: releaseSlot,
  listReserved: listReservedSlots,
  pruneBefore: pruneSlotsBefore,
};
