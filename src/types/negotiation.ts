/**
 * Fleetplan — Negotiation Types
 *
 * Proposals, rounds, the negotiation aggregate and its state machine table.
 */

import type { EpochMs, TargetId, TimeWindow, UnitId } from './common.js';
import type { TargetDescriptor } from './fleet.js';
import type { OptimizationMetrics, RankedCandidate } from './scoring.js';

// ─── Negotiation State ───────────────────────────────────────────────────────

export type NegotiationState =
  | 'created'
  | 'active'
  | 'converged'
  | 'timed_out'
  | 'failed';

export type NegotiationTrigger =
  | 'open_round'
  | 'converge'
  | 'exhaust_rounds'
  | 'force_timeout'
  | 'fail';

export type ConclusionReason =
  | 'agreement_spread'
  | 'unanimous'
  | 'max_rounds'
  | 'safety_bound'
  | 'all_abstained';

// ─── Proposals ───────────────────────────────────────────────────────────────

export interface BidPayload {
  kind: 'bid';
  /** 0 = unwilling, 1 = fully committed */
  willingness: number;
  /** The member's top-choice grouping of participants */
  preferredGroup: UnitId[];
  constraints: string[];
  rationale: string;
}

export type AbstainReason = 'timeout' | 'error' | 'declined' | 'invalid';

export interface AbstainPayload {
  kind: 'abstain';
  reason: AbstainReason;
  rationale: string;
}

export type ProposalPayload = BidPayload | AbstainPayload;

export interface Proposal {
  readonly unitId: UnitId;
  readonly round: number;
  readonly payload: ProposalPayload;
  readonly timestamp: EpochMs;
}

// ─── Rounds ──────────────────────────────────────────────────────────────────

export type FanOutMode = 'parallel' | 'sequential';

export interface NegotiationRound {
  round: number;
  /** Arrival order, not unit order */
  proposals: Proposal[];
  candidates: RankedCandidate[];
  agreement: number;
  mode: FanOutMode;
  startedAt: EpochMs;
  endedAt: EpochMs;
}

// ─── Negotiation ─────────────────────────────────────────────────────────────

export type UnitRole = 'primary' | 'support';

export interface AssignedUnit {
  unitId: UnitId;
  role: UnitRole;
}

export interface FinalAssignment {
  units: AssignedUnit[];
  metrics: OptimizationMetrics;
}

export interface Negotiation {
  id: string;
  targetId: TargetId;
  leaderId: UnitId;
  memberIds: ReadonlyArray<UnitId>;
  /** Highest round opened so far; 0 before activation */
  currentRound: number;
  rounds: NegotiationRound[];
  state: NegotiationState;
  finalAssignment?: FinalAssignment;
  conclusion?: ConclusionReason;
  createdAt: EpochMs;
  concludedAt?: EpochMs;
}

export interface StateTransition {
  from: NegotiationState;
  to: NegotiationState;
  trigger: NegotiationTrigger;
  round: number;
  timestamp: EpochMs;
}

/** Valid state transitions for the negotiation FSM */
export const VALID_TRANSITIONS: ReadonlyArray<{ from: NegotiationState; to: NegotiationState; via: NegotiationTrigger }> = [
  { from: 'created', to: 'active',    via: 'open_round' },
  { from: 'created', to: 'timed_out', via: 'force_timeout' },
  { from: 'active',  to: 'active',    via: 'open_round' },
  { from: 'active',  to: 'converged', via: 'converge' },
  { from: 'active',  to: 'timed_out', via: 'exhaust_rounds' },
  { from: 'active',  to: 'timed_out', via: 'force_timeout' },
  { from: 'active',  to: 'failed',    via: 'fail' },
] as const;

export const TERMINAL_STATES: ReadonlySet<NegotiationState> = new Set([
  'converged',
  'timed_out',
  'failed',
]);

// ─── Decision Evaluator ──────────────────────────────────────────────────────

/** What a member sees when asked for a proposal. */
export interface ProposalContext {
  negotiationId: string;
  unitId: UnitId;
  round: number;
  target: TargetDescriptor;
  /** Resolved tracking window of the target */
  window: TimeWindow;
  leaderId: UnitId;
  participants: ReadonlyArray<UnitId>;
  /** Ranked candidates of the previous round; empty in round 1 */
  ranking: ReadonlyArray<RankedCandidate>;
  initial: { group: ReadonlyArray<UnitId>; metrics: OptimizationMetrics };
  history: ReadonlyArray<NegotiationRound>;
  deadline: EpochMs;
  signal: AbortSignal;
}

/**
 * Opaque per-unit decision capability: a rule engine, an optimizer or a
 * language-model call. Only the structured payload drives control decisions.
 */
export interface DecisionEvaluator {
  propose(context: ProposalContext): Promise<ProposalPayload>;
}
