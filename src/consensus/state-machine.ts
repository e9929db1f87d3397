/**
 * Fleetplan — Negotiation State Machine
 *
 * Finite state machine for per-target negotiations.
 * Validates transitions against VALID_TRANSITIONS, enforces strict round
 * ordering and keeps a transition log. One instance is shared by every
 * protocol a cycle manager runs so that a target never has two live
 * negotiations.
 */

import { NegotiationError, systemClock } from '../types/index.js';
import type {
  Clock,
  ConclusionReason,
  FinalAssignment,
  Negotiation,
  NegotiationRound,
  NegotiationState,
  NegotiationTrigger,
  StateTransition,
  TargetId,
  UnitId,
} from '../types/index.js';
import { TERMINAL_STATES, VALID_TRANSITIONS as TRANSITIONS } from '../types/index.js';

// ─── State Machine ───────────────────────────────────────────────────────────

export class NegotiationStateMachine {
  private negotiations: Map<string, Negotiation> = new Map();
  private transitionLog: StateTransition[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Register a negotiation in the `created` state.
   */
  create(params: {
    id: string;
    targetId: TargetId;
    leaderId: UnitId;
    memberIds: ReadonlyArray<UnitId>;
  }): Negotiation {
    if (this.negotiations.has(params.id)) {
      throw new NegotiationError(`Negotiation ${params.id} already exists`, { negotiationId: params.id });
    }
    const live = this.liveFor(params.targetId);
    if (live) {
      throw new NegotiationError(
        `Target ${params.targetId} already has a live negotiation (${live.id})`,
        { targetId: params.targetId, negotiationId: live.id },
      );
    }

    const negotiation: Negotiation = {
      id: params.id,
      targetId: params.targetId,
      leaderId: params.leaderId,
      memberIds: Object.freeze([...params.memberIds]),
      currentRound: 0,
      rounds: [],
      state: 'created',
      createdAt: this.clock.now(),
    };
    this.negotiations.set(negotiation.id, negotiation);
    return negotiation;
  }

  get(negotiationId: string): Negotiation | undefined {
    return this.negotiations.get(negotiationId);
  }

  /**
   * Negotiations in the `active` state.
   */
  getActive(): Negotiation[] {
    return Array.from(this.negotiations.values()).filter((n) => n.state === 'active');
  }

  /**
   * Open the next round. Rounds run 1..n without gaps or repeats, and a new
   * round cannot open while the previous one is unrecorded.
   */
  openRound(negotiationId: string, round: number): Negotiation {
    const negotiation = this.require(negotiationId);
    const expected = negotiation.rounds.length + 1;
    if (round !== expected || negotiation.currentRound !== negotiation.rounds.length) {
      throw new NegotiationError(
        `Out-of-order round ${round} for ${negotiationId}; expected ${expected}`,
        { negotiationId, round, expected, currentRound: negotiation.currentRound },
      );
    }
    this.transition(negotiation, 'open_round', round);
    negotiation.currentRound = round;
    return negotiation;
  }

  /**
   * Store a finished round. Only the currently open round can be recorded.
   */
  recordRound(negotiationId: string, round: NegotiationRound): Negotiation {
    const negotiation = this.require(negotiationId);
    if (negotiation.state !== 'active') {
      throw new NegotiationError(
        `Cannot record round ${round.round}: negotiation ${negotiationId} is '${negotiation.state}'`,
        { negotiationId, state: negotiation.state },
      );
    }
    if (round.round !== negotiation.currentRound || negotiation.rounds.length !== round.round - 1) {
      throw new NegotiationError(
        `Round ${round.round} does not match open round ${negotiation.currentRound} of ${negotiationId}`,
        { negotiationId, round: round.round, currentRound: negotiation.currentRound },
      );
    }
    negotiation.rounds.push(round);
    return negotiation;
  }

  /**
   * Move a negotiation into a terminal state.
   */
  conclude(
    negotiationId: string,
    trigger: Exclude<NegotiationTrigger, 'open_round'>,
    outcome: { conclusion: ConclusionReason; finalAssignment?: FinalAssignment },
  ): Negotiation {
    const negotiation = this.require(negotiationId);
    this.transition(negotiation, trigger, negotiation.currentRound);
    negotiation.conclusion = outcome.conclusion;
    if (outcome.finalAssignment) {
      negotiation.finalAssignment = outcome.finalAssignment;
    }
    negotiation.concludedAt = this.clock.now();
    return negotiation;
  }

  isTerminal(negotiationId: string): boolean {
    return TERMINAL_STATES.has(this.require(negotiationId).state);
  }

  /**
   * Drop concluded negotiations. Live ones are kept.
   */
  prune(): number {
    let removed = 0;
    for (const [id, negotiation] of this.negotiations) {
      if (TERMINAL_STATES.has(negotiation.state)) {
        this.negotiations.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Get the transition log for debugging.
   */
  getTransitionLog(): ReadonlyArray<StateTransition> {
    return this.transitionLog;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private require(negotiationId: string): Negotiation {
    const negotiation = this.negotiations.get(negotiationId);
    if (!negotiation) {
      throw new NegotiationError(`Negotiation ${negotiationId} not found`, { negotiationId });
    }
    return negotiation;
  }

  private liveFor(targetId: TargetId): Negotiation | undefined {
    for (const negotiation of this.negotiations.values()) {
      if (negotiation.targetId === targetId && !TERMINAL_STATES.has(negotiation.state)) {
        return negotiation;
      }
    }
    return undefined;
  }

  private transition(negotiation: Negotiation, trigger: NegotiationTrigger, round: number): void {
    const target = this.resolveTargetState(negotiation.state, trigger);
    if (!target) {
      throw new NegotiationError(
        `Invalid transition: ${negotiation.state} → ? (via ${trigger})`,
        { negotiationId: negotiation.id, currentState: negotiation.state, trigger },
      );
    }
    this.transitionLog.push({
      from: negotiation.state,
      to: target,
      trigger,
      round,
      timestamp: this.clock.now(),
    });
    negotiation.state = target;
  }

  private resolveTargetState(
    current: NegotiationState,
    trigger: NegotiationTrigger,
  ): NegotiationState | null {
    // Each (from, via) pair is unique in the table.
    const transition = TRANSITIONS.find((t) => t.from === current && t.via === trigger);
    return transition?.to ?? null;
  }
}
