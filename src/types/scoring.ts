/**
 * Fleetplan — Scoring Types
 */

import type { GeoPosition, TimeWindow, UnitId } from './common.js';
import type { UnitSnapshot } from './fleet.js';

export interface ScorerWeights {
  geometry: number;
  schedulability: number;
  robustness: number;
}

export interface OptimizationMetrics {
  /** Normalized tracking geometry quality, 1 / (1 + gdop) */
  readonly geometry: number;
  /** Dilution of precision; lower is better */
  readonly gdop: number;
  /** Fraction of the requested window the group covers */
  readonly schedulability: number;
  /** 1 − worst-case relative quality loss when any one member drops out */
  readonly robustness: number;
  readonly composite: number;
}

/**
 * Everything the scorer needs besides the group and the target: positions are
 * resolved ahead of time so scoring stays pure.
 */
export interface ScoringContext {
  targetPosition: GeoPosition;
  unitPositions: ReadonlyMap<UnitId, GeoPosition>;
  units: ReadonlyMap<UnitId, UnitSnapshot>;
  window: TimeWindow;
}

export interface RankedCandidate {
  group: UnitId[];
  key: string;
  metrics: OptimizationMetrics;
  supporters: UnitId[];
}
