/**
 * Fleetplan — Configuration Types
 */

import type { ScorerWeights } from './scoring.js';

export type CycleMode = 'continuous' | 'interval';

export interface PlanningConfig {
  cycleMode: CycleMode;
  cycleIntervalMs: number;
  cycleBudgetMs: number;
  maxCycles: number;
  idlePollMs: number;
  maxRounds: number;
  memberTimeoutMs: number;
  convergenceThreshold: number;
  minWillingness: number;
  memberCandidateCount: number;
  trackingWindowMs: number;
  referenceRangeKm: number;
  maxOracleOutageCycles: number;
  weights: ScorerWeights;
}

export type PlanningConfigInput = Partial<Omit<PlanningConfig, 'weights'>> & {
  weights?: Partial<ScorerWeights>;
};
