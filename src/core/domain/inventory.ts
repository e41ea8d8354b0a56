import { FLAT_TYPES, type FlatInventory, type FlatType } from '../ports';
import { fail, ok, type Result } from './result';

/**
 * Per-project flat inventory. Immutable: every mutation returns a new ledger,
 * so a caller can commit the new counts together with the status change that
 * consumed them.
 *
 * Invariant: 0 <= available <= total for every flat type.
 */
export class InventoryLedger {
  private constructor(private readonly units: FlatInventory) {}

  static from(inventory: FlatInventory): InventoryLedger {
    const units: FlatInventory = {};
    for (const type of FLAT_TYPES) {
      const entry = inventory[type];
      if (entry) {
        const total = Math.max(0, entry.total);
        units[type] = { total, available: clamp(entry.available, 0, total) };
      }
    }
    return new InventoryLedger(units);
  }

  // Builds a fresh ledger with every unit available; zero totals are omitted
  static fromTotals(totals: Partial<Record<FlatType, number>>): InventoryLedger {
    const units: FlatInventory = {};
    for (const type of FLAT_TYPES) {
      const total = totals[type] ?? 0;
      if (total > 0) {
        units[type] = { total, available: total };
      }
    }
    return new InventoryLedger(units);
  }

  offers(type: FlatType): boolean {
    return this.totalCount(type) > 0;
  }

  offeredTypes(): FlatType[] {
    return FLAT_TYPES.filter((type) => this.offers(type));
  }

  availableCount(type: FlatType): number {
    return this.units[type]?.available ?? 0;
  }

  totalCount(type: FlatType): number {
    return this.units[type]?.total ?? 0;
  }

  // Units reserved or booked against this type
  heldCount(type: FlatType): number {
    return this.totalCount(type) - this.availableCount(type);
  }

  totalAvailable(): number {
    return FLAT_TYPES.reduce((sum, type) => sum + this.availableCount(type), 0);
  }

  reserve(type: FlatType): Result<InventoryLedger> {
    const entry = this.units[type];
    if (!entry || entry.available <= 0) {
      return fail('NoUnitsAvailable', `No ${formatFlatType(type)} units available`, { flatType: type });
    }
    return ok(this.with(type, { total: entry.total, available: entry.available - 1 }));
  }

  // Capped at total so a duplicate release cannot mint units
  release(type: FlatType): InventoryLedger {
    const entry = this.units[type];
    if (!entry || entry.available >= entry.total) {
      return this;
    }
    return this.with(type, { total: entry.total, available: entry.available + 1 });
  }

  // Changes the total while keeping every held unit held
  resize(type: FlatType, total: number): Result<InventoryLedger> {
    if (!Number.isInteger(total) || total < 0) {
      return fail('InvalidInventory', `Unit count for ${formatFlatType(type)} must be a non-negative integer`, {
        flatType: type,
        total,
      });
    }
    const held = this.heldCount(type);
    if (total < held) {
      return fail(
        'InvalidInventory',
        `Cannot reduce ${formatFlatType(type)} units to ${total}: ${held} already reserved or booked`,
        { flatType: type, total, held },
      );
    }
    return ok(this.with(type, { total, available: total - held }));
  }

  toInventory(): FlatInventory {
    const snapshot: FlatInventory = {};
    for (const type of FLAT_TYPES) {
      const entry = this.units[type];
      if (entry) {
        snapshot[type] = { ...entry };
      }
    }
    return snapshot;
  }

  private with(type: FlatType, entry: { total: number; available: number }): InventoryLedger {
    const units: FlatInventory = { ...this.units };
    units[type] = entry;
    return new InventoryLedger(units);
  }
}

export const formatFlatType = (type: FlatType): string => (type === 'TWO_ROOM' ? '2-Room' : '3-Room');

const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);
