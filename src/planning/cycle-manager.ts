/**
 * Fleetplan — Rolling Planning Cycle Manager
 *
 * Owns the target queue and the planning loop. Each cycle drains the queue,
 * seeds every target through the distributor, runs one consensus negotiation
 * per target under a safety bound, and commits the outcome to the registry.
 * A target always leaves a cycle assigned (by consensus or fallback) or
 * carried over to the next one.
 *
 * Flow: submitDetectedTargets → queue → runCycle
 *       (distribute → negotiate → finalize) → CycleResult → history
 */

import {
  FleetplanError,
  FleetPositionUnavailableError,
  systemClock,
} from '../types/index.js';
import type {
  AssignedUnit,
  Clock,
  Cycle,
  CycleOutcome,
  CycleResult,
  CycleResultEntry,
  DecisionEvaluator,
  EntryStatus,
  EpochMs,
  FinalAssignment,
  Negotiation,
  PlanningConfig,
  PlanningConfigInput,
  PlanningEventHandler,
  PlanningStats,
  PositionOracle,
  Target,
  TargetDescriptor,
  UnitId,
} from '../types/index.js';
import { resolveConfig } from '../config/config.js';
import { UnitRegistry } from '../fleet/registry.js';
import { TargetQueue } from '../fleet/target-queue.js';
import { OptimizationScorer } from '../scoring/scorer.js';
import { TargetDistributor } from '../distribution/distributor.js';
import type { DistributionResult } from '../distribution/distributor.js';
import { ActivationGate, processActivationGate } from '../consensus/activation-gate.js';
import { NegotiationStateMachine } from '../consensus/state-machine.js';
import { ConsensusProtocol } from '../consensus/protocol.js';
import type { EvaluatorLookup } from '../consensus/protocol.js';
import type { FanOutProbe } from '../consensus/fan-out.js';
import { PlanningEvents } from '../events/emitter.js';
import { Logger, defaultLogger, describeError } from '../logging/logger.js';

// ─── Constants ───────────────────────────────────────────────────────────────

const HISTORY_DEPTH = 2;

/** Allowance per round on top of the member timeout for scoring and hand-off */
const ROUND_GRACE_MS = 25;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CycleManagerOptions {
  registry: UnitRegistry;
  oracle: PositionOracle;
  /** Decision evaluator per unit, as a map or a lookup function */
  evaluators: ReadonlyMap<UnitId, DecisionEvaluator> | EvaluatorLookup;
  config?: PlanningConfigInput;
  gate?: ActivationGate;
  fanOutProbe?: FanOutProbe;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Wait before the next rolling cycle: none in continuous mode, the rest of
 * the interval in interval mode.
 */
export function nextCycleDelay(
  config: Pick<PlanningConfig, 'cycleMode' | 'cycleIntervalMs'>,
  elapsedMs: number,
): number {
  if (config.cycleMode === 'interval') {
    return Math.max(0, config.cycleIntervalMs - elapsedMs);
  }
  return 0;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise<void>((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

interface DrainProgress {
  deadline: EpochMs;
  /** Targets that leave the cycle unassigned, in arrival order */
  carried: Target[];
  /** Drained targets not reached yet */
  remaining: Target[];
  deadlineExceeded: boolean;
  distributed: number;
}

function emptyStats(): PlanningStats {
  return {
    cycles: 0,
    entries: { converged: 0, timed_out: 0, fallback: 0, failed: 0 },
    carriedOver: 0,
    failedCycles: 0,
  };
}

// ─── Cycle Manager ───────────────────────────────────────────────────────────

export class RollingPlanningCycleManager {
  readonly config: PlanningConfig;
  private readonly registry: UnitRegistry;
  private readonly evaluators: EvaluatorLookup;
  private readonly scorer: OptimizationScorer;
  private readonly distributor: TargetDistributor;
  private readonly stateMachine: NegotiationStateMachine;
  private readonly gate: ActivationGate;
  private readonly fanOutProbe?: FanOutProbe;
  private readonly events: PlanningEvents;
  private readonly logger: Logger;
  private readonly log: Logger;
  private readonly clock: Clock;

  private readonly queue = new TargetQueue();
  /** Targets queued or in a negotiation, by id */
  private readonly pending: Map<string, Target> = new Map();
  private current: Cycle | null = null;
  private sequence = 0;
  private history: CycleResult[] = [];
  private stats: PlanningStats = emptyStats();
  private outageStreak = 0;

  private rolling: Promise<void> | null = null;
  private loopAbort: AbortController | null = null;

  constructor(options: CycleManagerOptions) {
    this.config = resolveConfig(options.config);
    this.registry = options.registry;
    const evaluators = options.evaluators;
    this.evaluators = typeof evaluators === 'function' ? evaluators : (unitId) => evaluators.get(unitId);
    this.gate = options.gate ?? processActivationGate;
    this.fanOutProbe = options.fanOutProbe;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.log = this.logger.child('planning');
    this.events = new PlanningEvents(this.logger);

    this.scorer = new OptimizationScorer({
      weights: this.config.weights,
      referenceRangeKm: this.config.referenceRangeKm,
    });
    this.distributor = new TargetDistributor({
      registry: this.registry,
      oracle: options.oracle,
      scorer: this.scorer,
      memberCandidateCount: this.config.memberCandidateCount,
      events: this.events,
      logger: this.logger,
    });
    this.stateMachine = new NegotiationStateMachine(this.clock);
  }

  // ─── Event System ──────────────────────────────────────────────────────

  /**
   * Register an event handler for cycle, negotiation and oracle events.
   */
  onEvent(handler: PlanningEventHandler): () => void {
    return this.events.onEvent(handler);
  }

  // ─── Ingestion ─────────────────────────────────────────────────────────

  /**
   * Queue newly detected targets. Targets already queued or negotiating are
   * ignored, as are descriptors without an id or a finite detection time.
   * Returns how many were accepted.
   */
  submitDetectedTargets(descriptors: ReadonlyArray<TargetDescriptor>): number {
    const accepted: Target[] = [];
    for (const descriptor of descriptors) {
      if (typeof descriptor.id !== 'string' || descriptor.id.length === 0 || !Number.isFinite(descriptor.detectionTime)) {
        this.log.warn('malformed target ignored', { targetId: descriptor.id });
        continue;
      }
      if (this.pending.has(descriptor.id)) {
        this.log.debug('duplicate target ignored', { targetId: descriptor.id });
        continue;
      }
      const window = descriptor.window ?? {
        start: descriptor.detectionTime,
        end: descriptor.detectionTime + this.config.trackingWindowMs,
      };
      const target: Target = {
        descriptor: { ...descriptor },
        state: 'unassigned',
        window: { ...window },
        cyclesCarried: 0,
      };
      this.pending.set(descriptor.id, target);
      accepted.push(target);
    }
    this.queue.push(...accepted);
    return accepted.length;
  }

  /** Targets waiting for a cycle, in queue order. */
  queuedTargets(): string[] {
    return this.queue.peek().map((t) => t.descriptor.id);
  }

  // ─── Cycles ────────────────────────────────────────────────────────────

  /**
   * Open the next cycle and return its id. An already open cycle that has
   * not run yet is returned as is.
   */
  startCycle(): string {
    if (this.current?.state === 'open') return this.current.cycleId;
    if (this.current?.state === 'running') {
      throw new FleetplanError(
        `Cycle ${this.current.cycleId} is still running`,
        'CYCLE_IN_PROGRESS',
        { cycleId: this.current.cycleId },
      );
    }

    this.sequence++;
    const cycle: Cycle = {
      cycleId: `cycle-${this.sequence}`,
      sequence: this.sequence,
      startedAt: this.clock.now(),
      state: 'open',
      drained: [],
      entries: [],
      carriedOver: [],
    };
    this.current = cycle;
    this.distributor.beginCycle();
    this.stateMachine.prune();

    this.log.info('cycle started', { cycleId: cycle.cycleId, queued: this.queue.length });
    this.events.emit('cycle:started', { cycleId: cycle.cycleId, sequence: cycle.sequence });
    return cycle.cycleId;
  }

  /**
   * Run the open cycle (opening one if needed) until the queue is empty or
   * the cycle budget is spent.
   */
  async runCycle(): Promise<CycleResult> {
    this.startCycle();
    const cycle = this.current;
    if (!cycle) {
      throw new FleetplanError('No cycle to run', 'NO_CYCLE');
    }
    cycle.state = 'running';

    const progress: DrainProgress = {
      deadline: cycle.startedAt + this.config.cycleBudgetMs,
      carried: [],
      remaining: [],
      deadlineExceeded: false,
      distributed: 0,
    };
    const finish = (aborted?: unknown): CycleResult => {
      // Carried and unreached targets go back to the head of the queue in arrival order.
      this.queue.requeue([...progress.carried, ...progress.remaining]);
      return this.closeCycle(cycle, progress, aborted);
    };

    try {
      await this.drainQueue(cycle, progress);
    } catch (error) {
      finish(error);
      throw error;
    }
    return finish();
  }

  /** The cycle in progress, if any. */
  currentCycle(): Readonly<Cycle> | null {
    return this.current;
  }

  /** The previous and current CycleResult, oldest first. */
  getHistory(): ReadonlyArray<CycleResult> {
    return [...this.history];
  }

  getStats(): PlanningStats {
    return {
      ...this.stats,
      entries: { ...this.stats.entries },
    };
  }

  // ─── Rolling Loop ──────────────────────────────────────────────────────

  /**
   * Run cycles until stop() or `maxCycles`. Resolves when the loop exits.
   */
  startRolling(): Promise<void> {
    if (this.rolling) {
      throw new FleetplanError('Rolling planning is already running', 'ALREADY_ROLLING');
    }
    const controller = new AbortController();
    this.loopAbort = controller;
    this.log.info('rolling planning started', {
      mode: this.config.cycleMode,
      maxCycles: this.config.maxCycles,
    });
    this.rolling = this.loop(controller.signal).finally(() => {
      this.rolling = null;
      this.loopAbort = null;
      this.log.info('rolling planning stopped', { ...this.getStats() });
    });
    return this.rolling;
  }

  /**
   * Stop the rolling loop after the cycle in progress. Resolves once the
   * loop has exited.
   */
  async stop(): Promise<void> {
    this.loopAbort?.abort();
    if (this.rolling) await this.rolling;
  }

  get isRolling(): boolean {
    return this.rolling !== null;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private async loop(signal: AbortSignal): Promise<void> {
    let cycles = 0;
    let progressed = true;

    while (!signal.aborted && cycles < this.config.maxCycles) {
      if (this.config.cycleMode === 'continuous') {
        if (this.queue.length === 0) {
          await this.queue.waitForItems(this.config.idlePollMs, signal);
          continue;
        }
        // Only carried targets left and nothing changed last cycle.
        if (!progressed) {
          await this.queue.waitForArrival(this.config.idlePollMs, signal);
          if (signal.aborted) break;
        }
      }

      const started = this.clock.now();
      const result = await this.runCycle();
      cycles++;
      progressed = result.entries.some((e) => e.status !== 'failed');

      if (cycles >= this.config.maxCycles) break;
      await sleep(nextCycleDelay(this.config, this.clock.now() - started), signal);
    }
  }

  private async drainQueue(cycle: Cycle, progress: DrainProgress): Promise<void> {
    while (this.queue.length > 0 && !progress.deadlineExceeded) {
      progress.remaining = this.queue.drain();
      for (let target = progress.remaining.shift(); target; target = progress.remaining.shift()) {
        if (this.clock.now() >= progress.deadline) {
          progress.deadlineExceeded = true;
          const unprocessed = [target, ...progress.remaining];
          progress.remaining = [];
          progress.carried.push(...unprocessed);
          for (const t of unprocessed) this.carry(cycle, t, 'cycle_deadline');
          return;
        }
        cycle.drained.push(target.descriptor.id);
        progress.distributed++;
        const outcome = await this.processTarget(cycle, target, progress.deadline);
        if (outcome === 'carried') progress.carried.push(target);
      }
    }
  }

  private async processTarget(
    cycle: Cycle,
    target: Target,
    deadline: number,
  ): Promise<'assigned' | 'carried'> {
    let result: DistributionResult | null = null;
    try {
      result = await this.distributor.distribute(target);
      return await this.negotiate(cycle, target, result, deadline);
    } catch (error) {
      this.log.error('target processing failed', {
        cycleId: cycle.cycleId,
        targetId: target.descriptor.id,
        error: describeError(error),
      });
      if (result) this.distributor.releaseClaim(result);
      this.carry(cycle, target, 'processing_error');
      return 'carried';
    }
  }

  private async negotiate(
    cycle: Cycle,
    target: Target,
    result: DistributionResult,
    deadline: number,
  ): Promise<'assigned' | 'carried'> {
    if (result.leader === null || !result.context || !result.fallback || !result.initialScore) {
      this.carry(cycle, target, result.reason ?? 'no_available_units');
      return 'carried';
    }

    const targetId = target.descriptor.id;
    const attempt = cycle.entries.filter((e) => e.targetId === targetId).length;
    const negotiationId = attempt === 0 ? `${cycle.cycleId}:${targetId}` : `${cycle.cycleId}:${targetId}:${attempt + 1}`;

    const protocol = new ConsensusProtocol({
      negotiationId,
      target,
      leaderId: result.leader,
      memberIds: result.memberCandidates,
      initial: { group: [result.leader, ...result.memberCandidates], metrics: result.initialScore },
      context: result.context,
      distances: result.distances,
      evaluators: this.evaluators,
      scorer: this.scorer,
      registry: this.registry,
      settings: this.config,
      safetyBound: {
        budgetMs: this.config.maxRounds * (this.config.memberTimeoutMs + ROUND_GRACE_MS),
        deadline,
      },
      gate: this.gate,
      stateMachine: this.stateMachine,
      fanOutProbe: this.fanOutProbe,
      events: this.events,
      logger: this.logger,
      clock: this.clock,
    });

    let negotiation: Negotiation;
    try {
      negotiation = await protocol.run();
    } catch (error) {
      this.log.error('negotiation aborted', { negotiationId, error: describeError(error) });
      negotiation = protocol.forceTimeout();
      if (negotiation.state === 'timed_out') {
        // A crashed run keeps no candidate.
        delete negotiation.finalAssignment;
      }
    }

    const entry = this.finalize(target, result, negotiation);
    cycle.entries.push(entry);
    this.stats.entries[entry.status]++;

    if (entry.status === 'failed') {
      this.carry(cycle, target, 'commit_failed');
      return 'carried';
    }
    this.pending.delete(targetId);
    return 'assigned';
  }

  /**
   * Commit the negotiated group, falling back to the leader-only claim, and
   * build the cycle entry.
   */
  private finalize(target: Target, result: DistributionResult, negotiation: Negotiation): CycleResultEntry {
    const targetId = target.descriptor.id;
    const fallback = result.fallback;
    const attempts: Array<{ status: EntryStatus; assignment: FinalAssignment }> = [];

    if (negotiation.state === 'converged' && negotiation.finalAssignment) {
      attempts.push({ status: 'converged', assignment: negotiation.finalAssignment });
    } else if (negotiation.state === 'timed_out' && negotiation.finalAssignment) {
      attempts.push({ status: 'timed_out', assignment: negotiation.finalAssignment });
    }
    if (fallback) {
      const status: EntryStatus = negotiation.state === 'timed_out' ? 'timed_out' : 'fallback';
      attempts.push({ status, assignment: fallback });
    }

    for (const attempt of attempts) {
      if (this.commit(targetId, target, attempt.assignment.units)) {
        this.releaseUnused(result, attempt.assignment.units);
        target.state = 'assigned';
        return this.entry(target, negotiation, attempt.status, attempt.assignment.units, attempt.assignment.metrics);
      }
      this.log.warn('assignment could not be committed', {
        negotiationId: negotiation.id,
        status: attempt.status,
        units: attempt.assignment.units.map((u) => u.unitId),
      });
    }

    this.distributor.releaseClaim(result);
    return this.entry(target, negotiation, 'failed', [], null);
  }

  /** All-or-nothing commit of a group. */
  private commit(targetId: string, target: Target, units: ReadonlyArray<AssignedUnit>): boolean {
    if (units.length === 0) return false;
    if (!units.every((u) => this.registry.canCommit(u.unitId, targetId))) return false;
    for (const unit of units) {
      this.registry.commit(unit.unitId, targetId, target.window);
    }
    return true;
  }

  /** Release the leader reservation when the agreed group left the leader out. */
  private releaseUnused(result: DistributionResult, units: ReadonlyArray<AssignedUnit>): void {
    if (result.leader !== null && !units.some((u) => u.unitId === result.leader)) {
      this.distributor.releaseClaim(result);
    }
  }

  private entry(
    target: Target,
    negotiation: Negotiation,
    status: EntryStatus,
    units: ReadonlyArray<AssignedUnit>,
    metrics: CycleResultEntry['metrics'],
  ): CycleResultEntry {
    return {
      targetId: target.descriptor.id,
      negotiationId: negotiation.id,
      finalAssignment: units.map((u) => u.unitId),
      roles: units.map((u) => ({ ...u })),
      status,
      degraded: status !== 'converged',
      rounds: negotiation.rounds.length,
      metrics,
    };
  }

  private carry(cycle: Cycle, target: Target, reason: string): void {
    target.state = 'unassigned';
    target.cyclesCarried++;
    cycle.carriedOver.push(target.descriptor.id);
    this.stats.carriedOver++;
    this.log.info('target carried over', {
      cycleId: cycle.cycleId,
      targetId: target.descriptor.id,
      reason,
      cyclesCarried: target.cyclesCarried,
    });
    this.events.emit('target:carried_over', {
      cycleId: cycle.cycleId,
      targetId: target.descriptor.id,
      reason,
      cyclesCarried: target.cyclesCarried,
    });
  }

  private closeCycle(cycle: Cycle, progress: DrainProgress, aborted?: unknown): CycleResult {
    const endedAt = this.clock.now();
    cycle.state = 'closed';
    cycle.endedAt = endedAt;

    let outcome: CycleOutcome = progress.deadlineExceeded ? 'deadline_exceeded' : 'completed';
    let error: CycleResult['error'];

    if (progress.distributed > 0) {
      this.outageStreak = this.distributor.fleetUnavailable() ? this.outageStreak + 1 : 0;
    }
    if (aborted !== undefined) {
      outcome = 'failed';
      error = {
        code: aborted instanceof FleetplanError ? aborted.code : 'CYCLE_ABORTED',
        message: describeError(aborted),
      };
    } else if (this.outageStreak >= this.config.maxOracleOutageCycles) {
      const failure = new FleetPositionUnavailableError(this.outageStreak);
      outcome = 'failed';
      error = { code: failure.code, message: failure.message };
    }

    const result: CycleResult = {
      cycleId: cycle.cycleId,
      sequence: cycle.sequence,
      startedAt: cycle.startedAt,
      endedAt,
      outcome,
      entries: cycle.entries.map((e) => ({ ...e })),
      carriedOver: [...cycle.carriedOver],
      ...(error ? { error } : {}),
    };

    this.history = [...this.history, result].slice(-HISTORY_DEPTH);
    this.stats.cycles++;
    this.current = null;

    if (outcome === 'failed') {
      this.stats.failedCycles++;
      this.log.error('cycle failed', { cycleId: cycle.cycleId, ...error });
      this.events.emit('cycle:failed', result);
    } else {
      this.log.info('cycle completed', {
        cycleId: cycle.cycleId,
        outcome,
        entries: result.entries.length,
        carriedOver: result.carriedOver.length,
      });
      this.events.emit('cycle:completed', result);
    }
    return result;
  }
}
