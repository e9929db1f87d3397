/**
 * Fleetplan — Consensus Protocol
 *
 * Runs one negotiation for one target: the leader fans a ProposalContext out
 * to its members each round, scores the distinct groups they bid for, and
 * stops once the group ranking is decisive, every member has abstained, or
 * the round limit is reached.
 *
 * Flow: acquire gate → engage units → round 1..maxRounds
 *       (fan-out → rank → agreement) → conclude → disengage → release gate
 */

import { NegotiationError, systemClock } from '../types/index.js';
import type {
  AbstainPayload,
  AssignedUnit,
  BidPayload,
  Clock,
  ConclusionReason,
  EpochMs,
  DecisionEvaluator,
  FinalAssignment,
  Negotiation,
  NegotiationRound,
  OptimizationMetrics,
  PlanningConfig,
  Proposal,
  ProposalContext,
  ProposalPayload,
  RankedCandidate,
  ScoringContext,
  Target,
  UnitId,
} from '../types/index.js';
import { TERMINAL_STATES } from '../types/index.js';
import { UnitRegistry } from '../fleet/registry.js';
import { OptimizationScorer, canonicalGroup } from '../scoring/scorer.js';
import { PlanningEvents } from '../events/emitter.js';
import { Logger, defaultLogger } from '../logging/logger.js';
import { ActivationGate, processActivationGate } from './activation-gate.js';
import type { ReleaseGate } from './activation-gate.js';
import { NegotiationStateMachine } from './state-machine.js';
import { fanOut } from './fan-out.js';
import type { FanOutProbe, MemberCall, MemberResponse } from './fan-out.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type ProtocolSettings = Pick<
  PlanningConfig,
  'maxRounds' | 'memberTimeoutMs' | 'convergenceThreshold' | 'minWillingness'
>;

/**
 * Time limit on a negotiation. `budgetMs` starts once the activation gate is
 * held; nothing runs past `deadline`, waiting for the gate included.
 */
export interface SafetyBound {
  budgetMs: number;
  deadline: EpochMs;
}

/** Looks up the decision evaluator of a unit. */
export type EvaluatorLookup = (unitId: UnitId) => DecisionEvaluator | undefined;

export interface ConsensusProtocolOptions {
  negotiationId: string;
  target: Target;
  leaderId: UnitId;
  memberIds: ReadonlyArray<UnitId>;
  initial: { group: ReadonlyArray<UnitId>; metrics: OptimizationMetrics };
  /** Positions and snapshots resolved by the distributor */
  context: ScoringContext;
  /** Unit → distance to the target in km, used to pick the primary */
  distances: ReadonlyMap<UnitId, number>;
  evaluators: EvaluatorLookup;
  scorer: OptimizationScorer;
  registry: UnitRegistry;
  settings: ProtocolSettings;
  safetyBound?: SafetyBound;
  gate?: ActivationGate;
  stateMachine?: NegotiationStateMachine;
  fanOutProbe?: FanOutProbe;
  events?: PlanningEvents;
  logger?: Logger;
  clock?: Clock;
}

// ─── Convergence ─────────────────────────────────────────────────────────────

/**
 * (top − second) / top over composites: 1 with a single candidate, 0 when
 * there are none or the top composite is not positive.
 */
export function agreementScore(candidates: ReadonlyArray<RankedCandidate>): number {
  if (candidates.length === 0) return 0;
  const top = candidates[0].metrics.composite;
  if (candidates.length === 1) return 1;
  if (top <= 0) return 0;
  return (top - candidates[1].metrics.composite) / top;
}

/**
 * Decide whether a round settles the negotiation. Returns the reason, or
 * null to keep going.
 */
export function convergenceReason(
  candidates: ReadonlyArray<RankedCandidate>,
  bids: ReadonlyArray<{ unitId: UnitId; bid: BidPayload }>,
  agreement: number,
  settings: Pick<ProtocolSettings, 'convergenceThreshold' | 'minWillingness'>,
): ConclusionReason | null {
  if (candidates.length === 0) return null;
  const top = candidates[0];
  const willing = bids.filter((b) => b.bid.willingness >= settings.minWillingness);
  if (!willing.some((b) => top.supporters.includes(b.unitId))) return null;

  if (agreement > settings.convergenceThreshold) return 'agreement_spread';

  const unanimous =
    bids.length > 0 &&
    willing.length === bids.length &&
    candidates.length === 1;
  return unanimous ? 'unanimous' : null;
}

// ─── Protocol ────────────────────────────────────────────────────────────────

export class ConsensusProtocol {
  private readonly options: ConsensusProtocolOptions;
  private readonly participants: UnitId[];
  private readonly gate: ActivationGate;
  private readonly stateMachine: NegotiationStateMachine;
  private readonly events: PlanningEvents;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly abort = new AbortController();
  private running: Promise<Negotiation> | null = null;
  private safetyTimer: ReturnType<typeof setTimeout> | undefined;
  /** Extra time granted by sequential rounds, not yet scheduled */
  private safetyExtensionMs = 0;

  constructor(options: ConsensusProtocolOptions) {
    this.options = options;
    this.gate = options.gate ?? processActivationGate;
    this.clock = options.clock ?? systemClock;
    this.stateMachine = options.stateMachine ?? new NegotiationStateMachine(this.clock);
    const logger = options.logger ?? defaultLogger;
    this.events = options.events ?? new PlanningEvents(logger);
    this.log = logger.child('consensus');

    const members = Array.from(new Set(options.memberIds)).filter((id) => id !== options.leaderId);
    this.participants = [options.leaderId, ...members];
    this.stateMachine.create({
      id: options.negotiationId,
      targetId: options.target.descriptor.id,
      leaderId: options.leaderId,
      memberIds: members,
    });
  }

  get negotiationId(): string {
    return this.options.negotiationId;
  }

  /** Current negotiation record. */
  get negotiation(): Negotiation {
    const negotiation = this.stateMachine.get(this.options.negotiationId);
    if (!negotiation) {
      throw new NegotiationError(`Negotiation ${this.options.negotiationId} was pruned while in use`);
    }
    return negotiation;
  }

  /**
   * Run the negotiation to a terminal state. Calling run() again returns the
   * same promise.
   */
  run(): Promise<Negotiation> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /**
   * Conclude immediately as timed out with the best candidate of the last
   * completed round. Outstanding member calls are cancelled. No-op once the
   * negotiation is terminal.
   */
  forceTimeout(): Negotiation {
    const negotiation = this.negotiation;
    if (TERMINAL_STATES.has(negotiation.state)) return negotiation;

    const last = negotiation.rounds[negotiation.rounds.length - 1];
    const best = last?.candidates[0];
    this.conclude('force_timeout', 'safety_bound', best);
    this.abort.abort();
    return negotiation;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private async execute(): Promise<Negotiation> {
    const id = this.options.negotiationId;
    const bound = this.options.safetyBound;
    if (bound) this.scheduleSafetyBound(bound.deadline - this.clock.now());

    let release: ReleaseGate;
    try {
      release = await this.gate.acquire(id, this.abort.signal);
    } catch (error) {
      this.clearSafetyBound();
      if (this.isConcluded()) return this.negotiation;
      throw error;
    }

    try {
      if (this.isConcluded()) return this.negotiation;
      if (bound) {
        this.clearSafetyBound();
        this.scheduleSafetyBound(Math.min(bound.budgetMs, bound.deadline - this.clock.now()));
      }
      this.options.registry.engage(this.participants, id);
      try {
        await this.rounds();
      } finally {
        this.options.registry.disengage(id);
      }
      return this.negotiation;
    } finally {
      this.clearSafetyBound();
      release();
    }
  }

  private scheduleSafetyBound(ms: number): void {
    this.safetyTimer = setTimeout(() => this.onSafetyBound(), Math.max(0, ms));
  }

  private clearSafetyBound(): void {
    if (this.safetyTimer !== undefined) clearTimeout(this.safetyTimer);
    this.safetyTimer = undefined;
    this.safetyExtensionMs = 0;
  }

  private extendSafetyBound(extraMs: number): void {
    if (this.safetyTimer !== undefined) this.safetyExtensionMs += extraMs;
  }

  private onSafetyBound(): void {
    this.safetyTimer = undefined;
    const extension = this.safetyExtensionMs;
    const remaining = (this.options.safetyBound?.deadline ?? 0) - this.clock.now();
    if (extension > 0 && remaining > 0) {
      this.safetyExtensionMs = 0;
      this.scheduleSafetyBound(Math.min(extension, remaining));
      return;
    }
    this.log.warn('safety bound reached', {
      negotiationId: this.options.negotiationId,
      budgetMs: this.options.safetyBound?.budgetMs,
    });
    this.forceTimeout();
  }

  private async rounds(): Promise<void> {
    const { settings } = this.options;
    const id = this.options.negotiationId;

    for (let round = 1; round <= settings.maxRounds; round++) {
      if (this.isConcluded()) return;
      this.stateMachine.openRound(id, round);
      if (round === 1) {
        this.events.emit('negotiation:activated', {
          negotiationId: id,
          targetId: this.options.target.descriptor.id,
          leaderId: this.options.leaderId,
          memberIds: this.negotiation.memberIds,
        });
      }

      const startedAt = this.clock.now();
      const { responses, mode } = await fanOut(this.memberCalls(round), {
        timeoutMs: settings.memberTimeoutMs,
        signal: this.abort.signal,
        clock: this.clock,
        probe: this.options.fanOutProbe,
        onSequential: (extraMs) => this.extendSafetyBound(extraMs),
      });
      // The safety bound may have fired while members were thinking.
      if (this.isConcluded()) return;

      const proposals = responses.map((response) => this.toProposal(response, round));
      const bids = proposals.flatMap((p) =>
        p.payload.kind === 'bid' ? [{ unitId: p.unitId, bid: p.payload }] : [],
      );
      const candidates = this.options.scorer.rank(
        bids.map((b) => ({ group: b.bid.preferredGroup, supporters: [b.unitId] })),
        this.options.target.descriptor,
        this.options.context,
      );
      const agreement = agreementScore(candidates);

      const record: NegotiationRound = {
        round,
        proposals,
        candidates,
        agreement,
        mode,
        startedAt,
        endedAt: this.clock.now(),
      };
      this.stateMachine.recordRound(id, record);
      this.events.emit('negotiation:round_completed', {
        negotiationId: id,
        round,
        mode,
        agreement,
        bids: bids.length,
        top: candidates[0]?.key ?? null,
      });
      this.log.debug('round completed', {
        negotiationId: id,
        round,
        mode,
        agreement,
        candidates: candidates.map((c) => ({ key: c.key, composite: c.metrics.composite })),
      });

      if (bids.length === 0) {
        this.conclude('fail', 'all_abstained');
        return;
      }
      const reason = convergenceReason(candidates, bids, agreement, settings);
      if (reason) {
        this.conclude('converge', reason, candidates[0]);
        return;
      }
      if (round === settings.maxRounds) {
        this.conclude('exhaust_rounds', 'max_rounds', candidates[0]);
        return;
      }
    }
  }

  private memberCalls(round: number): MemberCall[] {
    const negotiation = this.negotiation;
    const previous = negotiation.rounds[negotiation.rounds.length - 1];
    const ranking = previous ? previous.candidates : [];
    const history = [...negotiation.rounds];

    return negotiation.memberIds.map((unitId) => ({
      unitId,
      evaluator: this.options.evaluators(unitId),
      buildContext: (signal: AbortSignal, deadline: number): ProposalContext => ({
        negotiationId: negotiation.id,
        unitId,
        round,
        target: this.options.target.descriptor,
        window: { ...this.options.target.window },
        leaderId: this.options.leaderId,
        participants: this.participants,
        ranking,
        initial: this.options.initial,
        history,
        deadline,
        signal,
      }),
    }));
  }

  /**
   * Freeze a response into a Proposal. Bids are sanitized: units outside the
   * negotiation are stripped, and a bid left with no participant or with a
   * willingness outside [0, 1] becomes an `invalid` abstention.
   */
  private toProposal(response: MemberResponse, round: number): Proposal {
    let payload: ProposalPayload = response.payload;

    if (payload.kind === 'bid') {
      const group = canonicalGroup(payload.preferredGroup.filter((id) => this.participants.includes(id)));
      const willingness = payload.willingness;
      if (group.length === 0) {
        payload = invalid('preferred group names no participant');
      } else if (!Number.isFinite(willingness) || willingness < 0 || willingness > 1) {
        payload = invalid(`willingness ${willingness} is outside [0, 1]`);
      } else {
        const bid: BidPayload = {
          kind: 'bid',
          willingness,
          preferredGroup: group,
          constraints: [...payload.constraints],
          rationale: payload.rationale,
        };
        payload = Object.freeze(bid);
      }
    }

    if (payload.kind === 'abstain') {
      payload = Object.freeze({ ...payload });
      this.log.warn('member abstained', {
        negotiationId: this.options.negotiationId,
        unitId: response.unitId,
        round,
        reason: payload.reason,
        ...(response.error ? { code: response.error.code } : {}),
      });
      this.events.emit('member:abstained', {
        negotiationId: this.options.negotiationId,
        unitId: response.unitId,
        round,
        reason: payload.reason,
        rationale: payload.rationale,
      });
    }

    return Object.freeze({
      unitId: response.unitId,
      round,
      payload,
      timestamp: response.receivedAt,
    });
  }

  private conclude(
    trigger: 'converge' | 'exhaust_rounds' | 'force_timeout' | 'fail',
    conclusion: ConclusionReason,
    best?: RankedCandidate,
  ): void {
    const finalAssignment = best ? this.assignmentFor(best) : undefined;
    const negotiation = this.stateMachine.conclude(this.options.negotiationId, trigger, {
      conclusion,
      ...(finalAssignment ? { finalAssignment } : {}),
    });

    this.log.info('negotiation concluded', {
      negotiationId: negotiation.id,
      targetId: negotiation.targetId,
      state: negotiation.state,
      conclusion,
      rounds: negotiation.rounds.length,
      group: best?.key ?? null,
    });
    this.events.emit('negotiation:concluded', {
      negotiationId: negotiation.id,
      targetId: negotiation.targetId,
      state: negotiation.state,
      conclusion,
      rounds: negotiation.rounds.length,
      finalAssignment: finalAssignment ?? null,
    });
  }

  /** Primary is the group's nearest unit (ties: lowest id). */
  private assignmentFor(candidate: RankedCandidate): FinalAssignment {
    const distance = (id: UnitId): number => this.options.distances.get(id) ?? Number.POSITIVE_INFINITY;
    const byDistance = [...candidate.group].sort(
      (a, b) => distance(a) - distance(b) || (a < b ? -1 : a > b ? 1 : 0),
    );
    const primary = byDistance[0];
    const units: AssignedUnit[] = [
      { unitId: primary, role: 'primary' },
      ...candidate.group.filter((id) => id !== primary).map((unitId): AssignedUnit => ({ unitId, role: 'support' })),
    ];
    return { units, metrics: candidate.metrics };
  }

  private isConcluded(): boolean {
    return TERMINAL_STATES.has(this.negotiation.state);
  }
}

function invalid(rationale: string): AbstainPayload {
  return { kind: 'abstain', reason: 'invalid', rationale };
}
