/**
 * Fleetplan — Optimization Scorer
 *
 * Combines tracking geometry, schedule feasibility and robustness into one
 * composite score for a (group, target) pairing. Pure: identical inputs give
 * bit-identical metrics, which the protocol relies on for deterministic
 * ranking and tie-breaking.
 */

import { InvalidConfigurationError } from '../types/index.js';
import type {
  OptimizationMetrics,
  RankedCandidate,
  ScorerWeights,
  ScoringContext,
  TargetDescriptor,
  TimeWindow,
  UnitId,
  UnitSnapshot,
} from '../types/index.js';
import { DEFAULT_CONFIG, validateWeights } from '../config/config.js';
import { groupGdop } from './geometry.js';

export interface ScorerOptions {
  weights: ScorerWeights;
  referenceRangeKm?: number;
}

// ─── Group Helpers ───────────────────────────────────────────────────────────

/** Sorted, de-duplicated copy of a unit group. */
export function canonicalGroup(group: ReadonlyArray<UnitId>): UnitId[] {
  return Array.from(new Set(group)).sort();
}

export function groupKey(group: ReadonlyArray<UnitId>): string {
  return canonicalGroup(group).join('+');
}

// ─── Window Arithmetic ───────────────────────────────────────────────────────

function overlapping(a: TimeWindow, b: TimeWindow): boolean {
  return a.start < b.end && b.start < a.end;
}

/** Parts of `window` not covered by any of `busy`. */
function freeIntervals(window: TimeWindow, busy: ReadonlyArray<TimeWindow>): TimeWindow[] {
  const blocks = busy
    .filter((b) => overlapping(b, window))
    .map((b) => ({ start: Math.max(b.start, window.start), end: Math.min(b.end, window.end) }))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const free: TimeWindow[] = [];
  let cursor = window.start;
  for (const block of blocks) {
    if (block.start > cursor) free.push({ start: cursor, end: block.start });
    cursor = Math.max(cursor, block.end);
  }
  if (cursor < window.end) free.push({ start: cursor, end: window.end });
  return free;
}

function unionLength(intervals: TimeWindow[]): number {
  const sorted = [...intervals].sort((a, b) => a.start - b.start || a.end - b.end);
  let total = 0;
  let current: TimeWindow | null = null;
  for (const interval of sorted) {
    if (current && interval.start <= current.end) {
      current.end = Math.max(current.end, interval.end);
    } else {
      if (current) total += current.end - current.start;
      current = { ...interval };
    }
  }
  if (current) total += current.end - current.start;
  return total;
}

// ─── Scorer ──────────────────────────────────────────────────────────────────

export class OptimizationScorer {
  private readonly weights: Readonly<ScorerWeights>;
  private readonly referenceRangeKm: number;

  constructor(options: ScorerOptions) {
    const issues = validateWeights(options.weights);
    const referenceRangeKm = options.referenceRangeKm ?? DEFAULT_CONFIG.referenceRangeKm;
    if (!Number.isFinite(referenceRangeKm) || referenceRangeKm <= 0) {
      issues.push(`referenceRangeKm must be a positive number, got ${referenceRangeKm}`);
    }
    if (issues.length > 0) {
      throw new InvalidConfigurationError(issues);
    }
    this.weights = Object.freeze({ ...options.weights });
    this.referenceRangeKm = referenceRangeKm;
  }

  score(
    candidateGroup: ReadonlyArray<UnitId>,
    target: TargetDescriptor,
    context: ScoringContext,
  ): OptimizationMetrics {
    const group = canonicalGroup(candidateGroup);
    const { gdop, geometry } = this.geometry(group, context);
    const schedulability = this.schedulability(group, target, context);
    const robustness = this.robustness(group, target, context, geometry, schedulability);

    const composite =
      this.weights.geometry * geometry +
      this.weights.schedulability * schedulability +
      this.weights.robustness * robustness;

    return Object.freeze({ geometry, gdop, schedulability, robustness, composite });
  }

  /**
   * Score and rank candidate groups: composite descending, then canonical
   * key ascending.
   */
  rank(
    candidates: ReadonlyArray<{ group: ReadonlyArray<UnitId>; supporters: ReadonlyArray<UnitId> }>,
    target: TargetDescriptor,
    context: ScoringContext,
  ): RankedCandidate[] {
    const merged = new Map<string, RankedCandidate>();
    for (const candidate of candidates) {
      const group = canonicalGroup(candidate.group);
      const key = group.join('+');
      const existing = merged.get(key);
      if (existing) {
        existing.supporters = canonicalGroup([...existing.supporters, ...candidate.supporters]);
        continue;
      }
      merged.set(key, {
        group,
        key,
        metrics: this.score(group, target, context),
        supporters: canonicalGroup(candidate.supporters),
      });
    }

    return Array.from(merged.values()).sort(
      (a, b) =>
        b.metrics.composite - a.metrics.composite ||
        (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
    );
  }

  // ─── Sub-scores ────────────────────────────────────────────────────────

  private geometry(group: UnitId[], context: ScoringContext): { gdop: number; geometry: number } {
    const observers = group.flatMap((id) => {
      const pos = context.unitPositions.get(id);
      return pos ? [pos] : [];
    });
    const gdop = groupGdop(context.targetPosition, observers, this.referenceRangeKm);
    return { gdop, geometry: 1 / (1 + gdop) };
  }

  private schedulability(group: UnitId[], target: TargetDescriptor, context: ScoringContext): number {
    const window = context.window;
    const length = window.end - window.start;
    const capable = group.flatMap((id) => {
      const unit = context.units.get(id);
      return unit && this.canTake(unit, target.id) ? [unit] : [];
    });

    if (length <= 0) return capable.length > 0 ? 1 : 0;

    const free = capable.flatMap((unit) =>
      freeIntervals(
        window,
        unit.assignments.filter((a) => a.targetId !== target.id).map((a) => a.window),
      ),
    );
    return Math.min(1, unionLength(free) / length);
  }

  private canTake(unit: UnitSnapshot, targetId: string): boolean {
    if (!unit.operational) return false;
    if (unit.reservations.includes(targetId)) return true;
    if (unit.assignments.some((a) => a.targetId === targetId)) return true;
    return unit.capacity - unit.assignments.length - unit.reservations.length > 0;
  }

  private quality(geometry: number, schedulability: number): number {
    const wg = this.weights.geometry;
    const ws = this.weights.schedulability;
    if (wg + ws === 0) return (geometry + schedulability) / 2;
    return (wg * geometry + ws * schedulability) / (wg + ws);
  }

  /**
   * 1 − worst relative quality loss when any single member is removed.
   */
  private robustness(
    group: UnitId[],
    target: TargetDescriptor,
    context: ScoringContext,
    geometry: number,
    schedulability: number,
  ): number {
    if (group.length < 2) return 0;
    const base = this.quality(geometry, schedulability);
    if (base <= 0) return 0;

    let worst = 0;
    for (const removed of group) {
      const reduced = group.filter((id) => id !== removed);
      const reducedQuality = this.quality(
        this.geometry(reduced, context).geometry,
        this.schedulability(reduced, target, context),
      );
      worst = Math.max(worst, (base - reducedQuality) / base);
    }
    return Math.min(1, Math.max(0, 1 - worst));
  }
}
