/**
 * Fleetplan — Planning Cycle Types
 */

import type { EpochMs, TargetId, UnitId } from './common.js';
import type { AssignedUnit } from './negotiation.js';
import type { OptimizationMetrics } from './scoring.js';

export type CycleState = 'open' | 'running' | 'closed';

export type CycleOutcome = 'completed' | 'deadline_exceeded' | 'failed';

export type EntryStatus = 'converged' | 'timed_out' | 'failed' | 'fallback';

export interface CycleResultEntry {
  targetId: TargetId;
  negotiationId: string;
  finalAssignment: UnitId[];
  roles: AssignedUnit[];
  status: EntryStatus;
  degraded: boolean;
  rounds: number;
  metrics: OptimizationMetrics | null;
}

export interface CycleResult {
  cycleId: string;
  sequence: number;
  startedAt: EpochMs;
  endedAt: EpochMs;
  outcome: CycleOutcome;
  entries: ReadonlyArray<CycleResultEntry>;
  carriedOver: ReadonlyArray<TargetId>;
  error?: { code: string; message: string };
}

export interface Cycle {
  cycleId: string;
  sequence: number;
  startedAt: EpochMs;
  state: CycleState;
  drained: TargetId[];
  entries: CycleResultEntry[];
  carriedOver: TargetId[];
  endedAt?: EpochMs;
}

export interface PlanningStats {
  cycles: number;
  entries: Record<EntryStatus, number>;
  carriedOver: number;
  failedCycles: number;
}
