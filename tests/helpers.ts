/**
 * Fleetplan — Test Helpers
 *
 * Shared test utilities: scripted evaluators, a fixed-distance oracle, a
 * captured logger and a manual clock.
 */

import { OracleUnavailableError } from '../src/types/common.js';
import type { Clock, EpochMs, GeoPosition } from '../src/types/common.js';
import type { Target, TargetDescriptor, ThreatLevel } from '../src/types/fleet.js';
import type {
  BidPayload,
  DecisionEvaluator,
  ProposalContext,
  ProposalPayload,
} from '../src/types/negotiation.js';
import type { PositionOracle } from '../src/types/fleet.js';
import { LogLevel, Logger } from '../src/logging/logger.js';
import type { LogEntry } from '../src/logging/logger.js';

// ─── Clock ───────────────────────────────────────────────────────────────────

export class ManualClock implements Clock {
  constructor(private time: EpochMs = 1_000_000) {}

  now(): EpochMs {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

// ─── Logger ──────────────────────────────────────────────────────────────────

export function captureLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, component: 'test', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

export const silentLogger = new Logger({ level: LogLevel.SILENT });

// ─── Position Oracle ─────────────────────────────────────────────────────────

/**
 * Every target sits at the origin; a unit's altitude is its distance to it,
 * so distance() is the altitude difference.
 */
export class FixedDistanceOracle implements PositionOracle {
  readonly lookups: string[] = [];
  private readonly failing: Set<string> = new Set();

  constructor(private readonly distances: Record<string, number>) {}

  fail(entityId: string): void {
    this.failing.add(entityId);
  }

  async position(entityId: string, _time: EpochMs): Promise<GeoPosition> {
    this.lookups.push(entityId);
    if (this.failing.has(entityId)) {
      throw new OracleUnavailableError(entityId, 'test outage');
    }
    return { lat: 0, lon: 0, alt: this.distances[entityId] ?? 0 };
  }

  distance(a: GeoPosition, b: GeoPosition): number {
    return Math.abs(a.alt - b.alt);
  }
}

// ─── Evaluators ──────────────────────────────────────────────────────────────

export type ScriptStep =
  | { payload: ProposalPayload; delayMs?: number }
  | { error: string; delayMs?: number }
  | { hang: true };

/**
 * Replays one step per call; the last step repeats once the script runs
 * out. Records every context it was asked with.
 */
export class ScriptedEvaluator implements DecisionEvaluator {
  readonly calls: ProposalContext[] = [];
  aborted = 0;

  constructor(private readonly script: ScriptStep[]) {}

  propose(context: ProposalContext): Promise<ProposalPayload> {
    this.calls.push(context);
    const step = this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
    context.signal.addEventListener('abort', () => {
      this.aborted++;
    });

    if ('hang' in step) {
      return new Promise<ProposalPayload>(() => undefined);
    }
    const delay = step.delayMs ?? 0;
    return new Promise<ProposalPayload>((resolve, reject) => {
      setTimeout(() => {
        if ('error' in step) reject(new Error(step.error));
        else resolve(step.payload);
      }, delay);
    });
  }
}

export function bid(preferredGroup: string[], willingness = 0.9): BidPayload {
  return { kind: 'bid', willingness, preferredGroup, constraints: [], rationale: 'test' };
}

export const decline: ProposalPayload = { kind: 'abstain', reason: 'declined', rationale: 'test' };

// ─── Targets ─────────────────────────────────────────────────────────────────

export function descriptor(id: string, detectionTime = 1_000_000, threatLevel: ThreatLevel = 'high'): TargetDescriptor {
  return { id, detectionTime, threatLevel };
}

export function makeTarget(id: string, windowMs = 300_000): Target {
  return {
    descriptor: descriptor(id),
    state: 'unassigned',
    window: { start: 1_000_000, end: 1_000_000 + windowMs },
    cyclesCarried: 0,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
