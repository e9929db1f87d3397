/**
 * Fleetplan — Fleet Types
 *
 * Targets, tracking units and the external position oracle.
 */

import type {
  EpochMs,
  GeoPosition,
  TargetId,
  TimeWindow,
  UnitId,
} from './common.js';

// ─── Targets ─────────────────────────────────────────────────────────────────

export type ThreatLevel = 'low' | 'medium' | 'high' | 'critical';

export type TargetState = 'unassigned' | 'negotiating' | 'assigned';

export interface TargetDescriptor {
  id: TargetId;
  detectionTime: EpochMs;
  threatLevel: ThreatLevel;
  /** Opaque to the core; handed through to evaluators untouched */
  trajectory?: unknown;
  /** Requested tracking window; defaults to detectionTime + trackingWindowMs */
  window?: TimeWindow;
}

export interface Target {
  descriptor: TargetDescriptor;
  state: TargetState;
  window: TimeWindow;
  cyclesCarried: number;
}

export const THREAT_RANK: Record<ThreatLevel, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

// ─── Units ───────────────────────────────────────────────────────────────────

export interface UnitDefinition {
  id: UnitId;
  capacity: number;
  operational?: boolean;
}

export interface UnitAssignment {
  targetId: TargetId;
  window: TimeWindow;
}

/** Read-only view of a unit, handed to the distributor and the scorer. */
export interface UnitSnapshot {
  readonly id: UnitId;
  readonly capacity: number;
  readonly operational: boolean;
  readonly assignments: ReadonlyArray<UnitAssignment>;
  readonly reservations: ReadonlyArray<TargetId>;
  readonly engagedIn: string | null;
}

// ─── Position Oracle ─────────────────────────────────────────────────────────

/**
 * Geometry simulation collaborator. Resolves units and tracked targets alike,
 * since target trajectories are opaque to the core. Throws
 * OracleUnavailableError when a position cannot be produced.
 */
export interface PositionOracle {
  position(entityId: string, time: EpochMs): Promise<GeoPosition>;
  distance(a: GeoPosition, b: GeoPosition): number;
}
