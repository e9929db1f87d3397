/**
 * Fleetplan — Static Position Oracle
 *
 * PositionOracle over a fixed table of positions, with haversine slant
 * distance. Serves the simulation runner and stands in for the geometry
 * simulation wherever positions do not change within a cycle.
 */

import { OracleUnavailableError } from '../types/index.js';
import type { EpochMs, GeoPosition, PositionOracle } from '../types/index.js';
import { slantDistanceKm } from '../scoring/geometry.js';

export class StaticPositionOracle implements PositionOracle {
  private readonly positions: Map<string, GeoPosition> = new Map();
  private readonly outages: Set<string> = new Set();

  constructor(positions: Iterable<[string, GeoPosition]> = []) {
    for (const [id, pos] of positions) {
      this.positions.set(id, { ...pos });
    }
  }

  set(entityId: string, position: GeoPosition): void {
    this.positions.set(entityId, { ...position });
  }

  /** Make lookups for an entity fail until restore() is called. */
  markUnavailable(entityId: string): void {
    this.outages.add(entityId);
  }

  restore(entityId: string): void {
    this.outages.delete(entityId);
  }

  async position(entityId: string, _time: EpochMs): Promise<GeoPosition> {
    if (this.outages.has(entityId)) {
      throw new OracleUnavailableError(entityId, 'marked unavailable');
    }
    const pos = this.positions.get(entityId);
    if (!pos) {
      throw new OracleUnavailableError(entityId, 'no position on record');
    }
    return { ...pos };
  }

  distance(a: GeoPosition, b: GeoPosition): number {
    return slantDistanceKm(a, b);
  }
}
