/**
 * Fleetplan — Unit Registry
 *
 * Arena of tracking units indexed by id, populated once at fleet
 * initialization. Capacity is tracked through a reserve → commit | release
 * protocol: a unit's assignments plus reservations never exceed its capacity.
 */

import { CapacityExceededError, FleetplanError } from '../types/index.js';
import type {
  TargetId,
  TimeWindow,
  UnitAssignment,
  UnitDefinition,
  UnitId,
  UnitSnapshot,
} from '../types/index.js';
import { Logger, defaultLogger } from '../logging/logger.js';

interface UnitRecord {
  id: UnitId;
  capacity: number;
  operational: boolean;
  assignments: UnitAssignment[];
  reservations: Set<TargetId>;
  engagedIn: string | null;
}

// ─── Registry ────────────────────────────────────────────────────────────────

export class UnitRegistry {
  private readonly units: Map<UnitId, UnitRecord> = new Map();
  private readonly log: Logger;

  constructor(definitions: ReadonlyArray<UnitDefinition>, logger: Logger = defaultLogger) {
    this.log = logger.child('registry');
    for (const def of definitions) {
      if (this.units.has(def.id)) {
        throw new FleetplanError(`Duplicate unit id '${def.id}'`, 'DUPLICATE_UNIT', { unitId: def.id });
      }
      if (!Number.isInteger(def.capacity) || def.capacity < 0) {
        throw new FleetplanError(
          `Unit '${def.id}' capacity must be a non-negative integer, got ${def.capacity}`,
          'INVALID_UNIT',
          { unitId: def.id },
        );
      }
      this.units.set(def.id, {
        id: def.id,
        capacity: def.capacity,
        operational: def.operational ?? true,
        assignments: [],
        reservations: new Set(),
        engagedIn: null,
      });
    }
  }

  // ─── Query ─────────────────────────────────────────────────────────────

  has(unitId: UnitId): boolean {
    return this.units.has(unitId);
  }

  get size(): number {
    return this.units.size;
  }

  /** Unit ids in ascending order. */
  ids(): UnitId[] {
    return Array.from(this.units.keys()).sort();
  }

  snapshot(unitId: UnitId): UnitSnapshot | undefined {
    const record = this.units.get(unitId);
    return record ? this.freeze(record) : undefined;
  }

  /** Snapshots of every unit, ascending by id. */
  snapshots(): UnitSnapshot[] {
    return this.ids().map((id) => this.freeze(this.require(id)));
  }

  spareCapacity(unitId: UnitId): number {
    const record = this.require(unitId);
    return record.capacity - record.assignments.length - record.reservations.size;
  }

  /** Operational, below capacity and not recruited into an active negotiation. */
  isAvailable(unitId: UnitId): boolean {
    const record = this.units.get(unitId);
    if (!record) return false;
    return record.operational && record.engagedIn === null && this.spareCapacity(unitId) > 0;
  }

  // ─── Reservation Protocol ──────────────────────────────────────────────

  /**
   * Hold one slot for a target. Returns false when no slot is free or the
   * unit already holds this target.
   */
  reserve(unitId: UnitId, targetId: TargetId): boolean {
    const record = this.require(unitId);
    if (!record.operational || this.spareCapacity(unitId) <= 0) return false;
    if (record.reservations.has(targetId) || this.isAssigned(record, targetId)) return false;
    record.reservations.add(targetId);
    this.log.debug('slot reserved', { unitId, targetId });
    return true;
  }

  /**
   * Turn a reservation (or, when there is none, a free slot) into an
   * assignment. Throws CapacityExceededError when neither exists.
   */
  commit(unitId: UnitId, targetId: TargetId, window: TimeWindow): void {
    const record = this.require(unitId);
    if (this.isAssigned(record, targetId)) return;

    if (!record.reservations.delete(targetId) && this.spareCapacity(unitId) <= 0) {
      throw new CapacityExceededError(unitId, record.capacity);
    }
    record.assignments.push({ targetId, window: { ...window } });
    this.log.debug('assignment committed', { unitId, targetId });
  }

  /** Whether commit() would succeed for this unit and target. */
  canCommit(unitId: UnitId, targetId: TargetId): boolean {
    const record = this.units.get(unitId);
    if (!record || !record.operational) return false;
    if (this.isAssigned(record, targetId) || record.reservations.has(targetId)) return true;
    return this.spareCapacity(unitId) > 0;
  }

  release(unitId: UnitId, targetId: TargetId): void {
    const record = this.units.get(unitId);
    if (record?.reservations.delete(targetId)) {
      this.log.debug('reservation released', { unitId, targetId });
    }
  }

  // ─── Engagement ────────────────────────────────────────────────────────

  /**
   * Mark units as recruited into a negotiation so no other distribution can
   * recruit them until disengage().
   */
  engage(unitIds: ReadonlyArray<UnitId>, negotiationId: string): void {
    for (const unitId of unitIds) {
      const record = this.require(unitId);
      if (record.engagedIn !== null && record.engagedIn !== negotiationId) {
        throw new FleetplanError(
          `Unit ${unitId} is already engaged in ${record.engagedIn}`,
          'UNIT_ENGAGED',
          { unitId, negotiationId: record.engagedIn },
        );
      }
    }
    for (const unitId of unitIds) {
      this.require(unitId).engagedIn = negotiationId;
    }
  }

  disengage(negotiationId: string): void {
    for (const record of this.units.values()) {
      if (record.engagedIn === negotiationId) record.engagedIn = null;
    }
  }

  setOperational(unitId: UnitId, operational: boolean): void {
    this.require(unitId).operational = operational;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private require(unitId: UnitId): UnitRecord {
    const record = this.units.get(unitId);
    if (!record) {
      throw new FleetplanError(`Unknown unit '${unitId}'`, 'UNKNOWN_UNIT', { unitId });
    }
    return record;
  }

  private isAssigned(record: UnitRecord, targetId: TargetId): boolean {
    return record.assignments.some((a) => a.targetId === targetId);
  }

  private freeze(record: UnitRecord): UnitSnapshot {
    return Object.freeze({
      id: record.id,
      capacity: record.capacity,
      operational: record.operational,
      assignments: Object.freeze(record.assignments.map((a) => Object.freeze({ targetId: a.targetId, window: { ...a.window } }))),
      reservations: Object.freeze(Array.from(record.reservations).sort()),
      engagedIn: record.engagedIn,
    });
  }
}
