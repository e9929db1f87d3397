/**
 * Fleetplan — Simulation Scenarios
 *
 * A scenario lists the fleet with fixed positions and the waves of targets
 * detected before given cycles. runSimulation() drives a cycle manager
 * through it with rule-based evaluators and a static position oracle.
 */

import { readFile } from 'node:fs/promises';
import { FleetplanError, THREAT_RANK } from '../types/index.js';
import type {
  CycleResult,
  DecisionEvaluator,
  EpochMs,
  GeoPosition,
  PlanningConfigInput,
  TargetDescriptor,
  ThreatLevel,
  UnitId,
} from '../types/index.js';
import { UnitRegistry } from '../fleet/registry.js';
import { StaticPositionOracle } from '../fleet/static-oracle.js';
import { RuleBasedEvaluator } from '../evaluators/rule-based.js';
import { RollingPlanningCycleManager } from '../planning/cycle-manager.js';
import { ActivationGate } from '../consensus/activation-gate.js';
import { Logger, defaultLogger } from '../logging/logger.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ScenarioUnit {
  id: UnitId;
  capacity: number;
  position: GeoPosition;
}

export interface ScenarioTarget {
  id: string;
  threatLevel: ThreatLevel;
  position: GeoPosition;
  /** Detection time relative to the scenario start */
  detectionOffsetMs: number;
}

export interface ScenarioWave {
  atCycle: number;
  targets: ScenarioTarget[];
}

export interface Scenario {
  units: ScenarioUnit[];
  waves: ScenarioWave[];
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isThreatLevel(value: unknown): value is ThreatLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(THREAT_RANK, value);
}

function parsePosition(raw: unknown, where: string, issues: string[]): GeoPosition | null {
  if (!isRecord(raw)) {
    issues.push(`${where}.position must be an object`);
    return null;
  }
  const { lat, lon, alt } = raw;
  if (typeof lat !== 'number' || !Number.isFinite(lat) || lat < -90 || lat > 90) {
    issues.push(`${where}.position.lat must be a number in [-90, 90]`);
    return null;
  }
  if (typeof lon !== 'number' || !Number.isFinite(lon) || lon < -180 || lon > 180) {
    issues.push(`${where}.position.lon must be a number in [-180, 180]`);
    return null;
  }
  if (alt !== undefined && (typeof alt !== 'number' || !Number.isFinite(alt))) {
    issues.push(`${where}.position.alt must be a number`);
    return null;
  }
  return { lat, lon, alt: typeof alt === 'number' ? alt : 0 };
}

/**
 * Validate raw scenario JSON. Collects every problem and throws one
 * FleetplanError with code INVALID_SCENARIO.
 */
export function parseScenario(raw: unknown): Scenario {
  const issues: string[] = [];
  if (!isRecord(raw)) {
    throw new FleetplanError('Invalid scenario: expected an object', 'INVALID_SCENARIO', { issues: ['expected an object'] });
  }

  const units: ScenarioUnit[] = [];
  const seen = new Set<string>();
  if (!Array.isArray(raw.units)) {
    issues.push('units must be an array');
  } else {
    raw.units.forEach((entry: unknown, i: number) => {
      const where = `units[${i}]`;
      if (!isRecord(entry)) {
        issues.push(`${where} must be an object`);
        return;
      }
      const { id, capacity } = entry;
      if (typeof id !== 'string' || id.length === 0) {
        issues.push(`${where}.id must be a non-empty string`);
        return;
      }
      if (seen.has(id)) issues.push(`${where}.id '${id}' is used twice`);
      seen.add(id);
      if (typeof capacity !== 'number' || !Number.isInteger(capacity) || capacity < 0) {
        issues.push(`${where}.capacity must be a non-negative integer`);
        return;
      }
      const position = parsePosition(entry.position, where, issues);
      if (position) units.push({ id, capacity, position });
    });
  }

  const waves: ScenarioWave[] = [];
  if (!Array.isArray(raw.waves)) {
    issues.push('waves must be an array');
  } else {
    raw.waves.forEach((entry: unknown, i: number) => {
      const where = `waves[${i}]`;
      if (!isRecord(entry)) {
        issues.push(`${where} must be an object`);
        return;
      }
      const { atCycle } = entry;
      if (typeof atCycle !== 'number' || !Number.isInteger(atCycle) || atCycle < 1) {
        issues.push(`${where}.atCycle must be an integer >= 1`);
        return;
      }
      if (!Array.isArray(entry.targets)) {
        issues.push(`${where}.targets must be an array`);
        return;
      }
      const targets: ScenarioTarget[] = [];
      entry.targets.forEach((t: unknown, j: number) => {
        const at = `${where}.targets[${j}]`;
        if (!isRecord(t)) {
          issues.push(`${at} must be an object`);
          return;
        }
        const { id, threatLevel, detectionOffsetMs } = t;
        if (typeof id !== 'string' || id.length === 0) {
          issues.push(`${at}.id must be a non-empty string`);
          return;
        }
        if (seen.has(id)) issues.push(`${at}.id '${id}' is used twice`);
        seen.add(id);
        if (!isThreatLevel(threatLevel)) {
          issues.push(`${at}.threatLevel must be one of ${Object.keys(THREAT_RANK).join(', ')}`);
          return;
        }
        if (detectionOffsetMs !== undefined && (typeof detectionOffsetMs !== 'number' || !Number.isFinite(detectionOffsetMs))) {
          issues.push(`${at}.detectionOffsetMs must be a number`);
          return;
        }
        const position = parsePosition(t.position, at, issues);
        if (position) {
          targets.push({
            id,
            threatLevel,
            position,
            detectionOffsetMs: typeof detectionOffsetMs === 'number' ? detectionOffsetMs : 0,
          });
        }
      });
      waves.push({ atCycle, targets });
    });
  }

  if (issues.length > 0) {
    throw new FleetplanError(`Invalid scenario: ${issues.join('; ')}`, 'INVALID_SCENARIO', { issues });
  }
  return { units, waves: waves.sort((a, b) => a.atCycle - b.atCycle) };
}

export async function loadScenario(path: string): Promise<Scenario> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new FleetplanError(
      `Scenario ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_SCENARIO',
      { path },
    );
  }
  return parseScenario(raw);
}

// ─── Simulation ──────────────────────────────────────────────────────────────

export interface SimulationOptions {
  config?: PlanningConfigInput;
  /** Cycles to run; defaults to one past the last wave */
  cycles?: number;
  startTime?: EpochMs;
  logger?: Logger;
  onCycle?: (result: CycleResult) => void;
}

/** Number of cycles a scenario needs when none is asked for. */
export function defaultCycleCount(scenario: Scenario): number {
  const last = scenario.waves.reduce((max, wave) => Math.max(max, wave.atCycle), 0);
  return last + 1;
}

export async function runSimulation(scenario: Scenario, options: SimulationOptions = {}): Promise<CycleResult[]> {
  const logger = options.logger ?? defaultLogger;
  const start = options.startTime ?? Date.now();
  const registry = new UnitRegistry(
    scenario.units.map((u) => ({ id: u.id, capacity: u.capacity })),
    logger,
  );

  const oracle = new StaticPositionOracle();
  for (const unit of scenario.units) oracle.set(unit.id, unit.position);

  const evaluators = new Map<UnitId, DecisionEvaluator>();
  for (const unit of scenario.units) {
    evaluators.set(unit.id, new RuleBasedEvaluator({ unitId: unit.id, registry }));
  }

  const manager = new RollingPlanningCycleManager({
    registry,
    oracle,
    evaluators,
    config: options.config,
    gate: new ActivationGate(),
    logger,
  });

  const cycles = options.cycles ?? Math.min(defaultCycleCount(scenario), manager.config.maxCycles);
  const results: CycleResult[] = [];
  for (let cycle = 1; cycle <= cycles; cycle++) {
    const detected: TargetDescriptor[] = [];
    for (const wave of scenario.waves.filter((w) => w.atCycle === cycle)) {
      for (const target of wave.targets) {
        oracle.set(target.id, target.position);
        detected.push({
          id: target.id,
          detectionTime: start + target.detectionOffsetMs,
          threatLevel: target.threatLevel,
        });
      }
    }
    manager.submitDetectedTargets(detected);
    const result = await manager.runCycle();
    results.push(result);
    options.onCycle?.(result);
  }
  return results;
}
