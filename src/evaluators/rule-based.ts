/**
 * Fleetplan — Rule-Based Decision Evaluator
 *
 * Deterministic member behaviour for simulations: decline when the unit
 * cannot take the target, otherwise bid for the group the leader seeded in
 * round 1 and for the best-ranked group from then on. Willingness follows
 * the threat level, scaled by how much capacity the unit has left and
 * halved when the tracking window clashes with an existing assignment.
 */

import { THREAT_RANK } from '../types/index.js';
import type {
  DecisionEvaluator,
  ProposalContext,
  ProposalPayload,
  ThreatLevel,
  TimeWindow,
  UnitId,
  UnitSnapshot,
} from '../types/index.js';
import { UnitRegistry } from '../fleet/registry.js';

// ─── Constants ───────────────────────────────────────────────────────────────

const BASE_WILLINGNESS: Record<ThreatLevel, number> = {
  low: 0.6,
  medium: 0.75,
  high: 0.9,
  critical: 1,
};

const DEFAULT_GROUP_SIZE = 3;
const CONFLICT_PENALTY = 0.5;

export interface RuleBasedEvaluatorOptions {
  unitId: UnitId;
  registry: UnitRegistry;
  /** Targets below this level are declined */
  minThreatLevel?: ThreatLevel;
  /** Largest group proposed in round 1 */
  groupSize?: number;
}

// ─── Evaluator ───────────────────────────────────────────────────────────────

export class RuleBasedEvaluator implements DecisionEvaluator {
  private readonly unitId: UnitId;
  private readonly registry: UnitRegistry;
  private readonly minThreatLevel: ThreatLevel;
  private readonly groupSize: number;

  constructor(options: RuleBasedEvaluatorOptions) {
    this.unitId = options.unitId;
    this.registry = options.registry;
    this.minThreatLevel = options.minThreatLevel ?? 'low';
    this.groupSize = Math.max(1, options.groupSize ?? DEFAULT_GROUP_SIZE);
  }

  async propose(context: ProposalContext): Promise<ProposalPayload> {
    const unit = this.registry.snapshot(this.unitId);
    if (!unit || !unit.operational) {
      return { kind: 'abstain', reason: 'declined', rationale: 'unit is not operational' };
    }
    const targetId = context.target.id;
    if (THREAT_RANK[context.target.threatLevel] < THREAT_RANK[this.minThreatLevel]) {
      return {
        kind: 'abstain',
        reason: 'declined',
        rationale: `threat level ${context.target.threatLevel} is below ${this.minThreatLevel}`,
      };
    }

    const spare = unit.capacity - unit.assignments.length - unit.reservations.length;
    const holdsSlot = unit.reservations.includes(targetId) || unit.assignments.some((a) => a.targetId === targetId);
    if (spare <= 0 && !holdsSlot) {
      return { kind: 'abstain', reason: 'declined', rationale: 'no spare capacity' };
    }

    const constraints: string[] = [];
    const base = BASE_WILLINGNESS[context.target.threatLevel];
    let willingness = holdsSlot || unit.capacity === 0 ? base : base * (0.5 + (0.5 * spare) / unit.capacity);
    if (this.hasConflict(unit, targetId, context.window)) {
      willingness *= CONFLICT_PENALTY;
      constraints.push('window overlaps an existing assignment');
    }

    const top = context.ranking[0];
    const preferredGroup = top ? [...top.group] : this.seedGroup(context);
    const rationale = top
      ? `adopting top-ranked group ${top.key} (composite ${top.metrics.composite.toFixed(3)})`
      : `joining the ${preferredGroup.length} nearest participants`;

    return {
      kind: 'bid',
      willingness: Math.min(1, Math.max(0, willingness)),
      preferredGroup,
      constraints,
      rationale,
    };
  }

  /** Leader first, then this unit, then the remaining participants in order. */
  private seedGroup(context: ProposalContext): UnitId[] {
    const ordered = [context.leaderId, this.unitId, ...context.participants];
    return Array.from(new Set(ordered)).slice(0, this.groupSize);
  }

  private hasConflict(unit: UnitSnapshot, targetId: string, window: TimeWindow): boolean {
    return unit.assignments.some(
      (a) => a.targetId !== targetId && a.window.start < window.end && window.start < a.window.end,
    );
  }
}
