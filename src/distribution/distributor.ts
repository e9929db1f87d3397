/**
 * Fleetplan — Target Distributor
 *
 * Seeds each newly detected target with a leader (the nearest unit with a
 * free slot) and the next K nearest units as member candidates, then scores
 * the initial pairing. The leader-only claim is kept as the fallback
 * assignment for when negotiation cannot agree.
 *
 * Flow: resolve positions → rank by distance (ties: lowest id) → reserve the
 *       leader slot → snapshot scoring context → initial + fallback metrics
 */

import { OracleUnavailableError } from '../types/index.js';
import type {
  FinalAssignment,
  GeoPosition,
  OptimizationMetrics,
  PositionOracle,
  ScoringContext,
  Target,
  UnitId,
  UnitSnapshot,
} from '../types/index.js';
import { UnitRegistry } from '../fleet/registry.js';
import { OptimizationScorer } from '../scoring/scorer.js';
import { PlanningEvents } from '../events/emitter.js';
import { Logger, defaultLogger, describeError } from '../logging/logger.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type NoLeaderReason =
  | 'target_position_unavailable'
  | 'no_available_units';

export interface DistributionResult {
  targetId: string;
  leader: UnitId | null;
  memberCandidates: UnitId[];
  initialScore: OptimizationMetrics | null;
  /** Leader-only assignment used when the negotiation fails */
  fallback: FinalAssignment | null;
  /** Positions and snapshots the negotiation scores against */
  context: ScoringContext | null;
  /** Slant distance in km for every unit whose position resolved */
  distances: ReadonlyMap<UnitId, number>;
  /** Units skipped because the oracle could not place them */
  excluded: UnitId[];
  reason?: NoLeaderReason;
}

export interface DistributorOptions {
  registry: UnitRegistry;
  oracle: PositionOracle;
  scorer: OptimizationScorer;
  memberCandidateCount: number;
  events?: PlanningEvents;
  logger?: Logger;
}

// ─── Distributor ─────────────────────────────────────────────────────────────

export class TargetDistributor {
  private readonly registry: UnitRegistry;
  private readonly oracle: PositionOracle;
  private readonly scorer: OptimizationScorer;
  private readonly k: number;
  private readonly events: PlanningEvents;
  private readonly log: Logger;

  /** Units the oracle failed on during the current cycle */
  private excludedThisCycle: Set<UnitId> = new Set();
  private lookupsThisCycle = 0;

  constructor(options: DistributorOptions) {
    this.registry = options.registry;
    this.oracle = options.oracle;
    this.scorer = options.scorer;
    this.k = options.memberCandidateCount;
    const logger = options.logger ?? defaultLogger;
    this.events = options.events ?? new PlanningEvents(logger);
    this.log = logger.child('distributor');
  }

  /**
   * Forget per-cycle oracle exclusions. Called by the cycle manager when a
   * new cycle opens.
   */
  beginCycle(): void {
    this.excludedThisCycle = new Set();
    this.lookupsThisCycle = 0;
  }

  /** True when lookups were attempted this cycle and every unit failed. */
  fleetUnavailable(): boolean {
    return this.lookupsThisCycle > 0 && this.excludedThisCycle.size >= this.registry.size;
  }

  /**
   * Select leader and member candidates for a target and reserve the
   * leader's slot. A result with `leader: null` leaves the target untouched.
   */
  async distribute(
    target: Target,
    availableUnits: ReadonlyArray<UnitId> = this.registry.ids(),
  ): Promise<DistributionResult> {
    const targetId = target.descriptor.id;
    const time = target.descriptor.detectionTime;
    const empty = (reason: NoLeaderReason, distances: ReadonlyMap<UnitId, number>, excluded: UnitId[]): DistributionResult => ({
      targetId,
      leader: null,
      memberCandidates: [],
      initialScore: null,
      fallback: null,
      context: null,
      distances,
      excluded,
      reason,
    });

    let targetPosition: GeoPosition;
    try {
      targetPosition = await this.oracle.position(targetId, time);
    } catch (error) {
      this.log.warn('target position unavailable', { targetId, error: describeError(error) });
      return empty('target_position_unavailable', new Map(), []);
    }

    const { positions, excluded } = await this.resolveUnitPositions(availableUnits, time);

    const distances = new Map<UnitId, number>();
    for (const [unitId, pos] of positions) {
      try {
        distances.set(unitId, this.oracle.distance(pos, targetPosition));
      } catch (error) {
        this.markExcluded(unitId, error);
        excluded.push(unitId);
      }
    }

    // Availability is read after the lookups resolve so that a concurrent
    // distribution's reservation is already visible here.
    const ranked = Array.from(distances.entries())
      .filter(([unitId]) => this.registry.isAvailable(unitId))
      .sort(([a, da], [b, db]) => da - db || (a < b ? -1 : a > b ? 1 : 0))
      .map(([unitId]) => unitId);

    let leader: UnitId | null = null;
    for (const unitId of ranked) {
      if (this.registry.reserve(unitId, targetId)) {
        leader = unitId;
        break;
      }
    }
    if (leader === null) {
      this.log.info('no unit can take target', { targetId, considered: ranked.length, excluded });
      return empty('no_available_units', distances, excluded);
    }

    const leaderId = leader;
    let seeded: Pick<DistributionResult, 'memberCandidates' | 'initialScore' | 'fallback' | 'context'>;
    try {
      seeded = this.seed(target, leaderId, ranked, positions, targetPosition);
    } catch (error) {
      this.registry.release(leaderId, targetId);
      throw error;
    }

    target.state = 'negotiating';
    this.log.debug('target distributed', {
      targetId,
      leader: leaderId,
      members: seeded.memberCandidates,
      composite: seeded.initialScore?.composite,
    });

    return { targetId, leader: leaderId, ...seeded, distances, excluded };
  }

  /** Give back the leader slot claimed by distribute(). */
  releaseClaim(result: DistributionResult): void {
    if (result.leader !== null) {
      this.registry.release(result.leader, result.targetId);
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /** Member candidates, scoring context, initial metrics and fallback for a leader. */
  private seed(
    target: Target,
    leaderId: UnitId,
    ranked: ReadonlyArray<UnitId>,
    positions: ReadonlyMap<UnitId, GeoPosition>,
    targetPosition: GeoPosition,
  ): Pick<DistributionResult, 'memberCandidates' | 'initialScore' | 'fallback' | 'context'> {
    const memberCandidates = ranked.filter((id) => id !== leaderId).slice(0, this.k);
    const participants = [leaderId, ...memberCandidates];

    const units = new Map<UnitId, UnitSnapshot>();
    const unitPositions = new Map<UnitId, GeoPosition>();
    for (const unitId of participants) {
      const snapshot = this.registry.snapshot(unitId);
      const pos = positions.get(unitId);
      if (snapshot) units.set(unitId, snapshot);
      if (pos) unitPositions.set(unitId, pos);
    }
    const context: ScoringContext = { targetPosition, unitPositions, units, window: { ...target.window } };

    const fallback: FinalAssignment = {
      units: [{ unitId: leaderId, role: 'primary' }],
      metrics: this.scorer.score([leaderId], target.descriptor, context),
    };
    return {
      memberCandidates,
      initialScore: this.scorer.score(participants, target.descriptor, context),
      fallback,
      context,
    };
  }

  private async resolveUnitPositions(
    unitIds: ReadonlyArray<UnitId>,
    time: number,
  ): Promise<{ positions: Map<UnitId, GeoPosition>; excluded: UnitId[] }> {
    const candidates = Array.from(new Set(unitIds)).filter((id) => this.registry.has(id)).sort();
    const excluded: UnitId[] = [];
    const positions = new Map<UnitId, GeoPosition>();

    const lookups = await Promise.all(
      candidates.map(async (unitId) => {
        if (this.excludedThisCycle.has(unitId)) {
          return { unitId, pos: null };
        }
        this.lookupsThisCycle++;
        try {
          return { unitId, pos: await this.oracle.position(unitId, time) };
        } catch (error) {
          this.markExcluded(unitId, error);
          return { unitId, pos: null };
        }
      }),
    );

    for (const { unitId, pos } of lookups) {
      if (pos) {
        positions.set(unitId, pos);
      } else {
        excluded.push(unitId);
      }
    }
    return { positions, excluded };
  }

  private markExcluded(unitId: UnitId, error: unknown): void {
    if (this.excludedThisCycle.has(unitId)) return;
    this.excludedThisCycle.add(unitId);

    const expected = error instanceof OracleUnavailableError;
    this.log.warn('unit excluded for this cycle', {
      unitId,
      error: describeError(error),
      ...(expected ? {} : { unexpected: true }),
    });
    this.events.emit('oracle:unavailable', { unitId, error: describeError(error) });
  }
}
