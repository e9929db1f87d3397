/**
 * Fleetplan — Planning Configuration
 *
 * Defaults, validation and loading of the configuration surface consumed by
 * the cycle manager, distributor, protocol and scorer. Validation collects
 * every issue and rejects the whole configuration at load time.
 */

import { readFile } from 'node:fs/promises';
import { InvalidConfigurationError } from '../types/index.js';
import type {
  PlanningConfig,
  PlanningConfigInput,
  ScorerWeights,
} from '../types/index.js';

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_WEIGHTS: Readonly<ScorerWeights> = Object.freeze({
  geometry: 0.4,
  schedulability: 0.3,
  robustness: 0.3,
});

export const DEFAULT_CONFIG: Readonly<PlanningConfig> = Object.freeze({
  cycleMode: 'continuous',
  cycleIntervalMs: 60_000,
  cycleBudgetMs: 10 * 60 * 1000,
  maxCycles: 100,
  idlePollMs: 1_000,
  maxRounds: 5,
  memberTimeoutMs: 30_000,
  convergenceThreshold: 0.15,
  minWillingness: 0.5,
  memberCandidateCount: 4,
  trackingWindowMs: 5 * 60 * 1000,
  referenceRangeKm: 2_000,
  maxOracleOutageCycles: 3,
  weights: DEFAULT_WEIGHTS,
});

const MAX_MEMBER_CANDIDATES = 16;
const WEIGHT_SUM_TOLERANCE = 1e-6;
const WEIGHT_KEYS = ['geometry', 'schedulability', 'robustness'] as const;

// ─── Validation ──────────────────────────────────────────────────────────────

function checkPositive(issues: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    issues.push(`${name} must be a positive number, got ${value}`);
  }
}

function checkInteger(issues: string[], name: string, value: number, min: number, max = Infinity): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `in [${min}, ${max}]`;
    issues.push(`${name} must be an integer ${range}, got ${value}`);
  }
}

function checkUnitInterval(issues: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    issues.push(`${name} must be in [0, 1], got ${value}`);
  }
}

/**
 * Validate scorer weights on their own; the scorer calls this at
 * construction time as well.
 */
export function validateWeights(weights: ScorerWeights): string[] {
  const issues: string[] = [];
  for (const name of WEIGHT_KEYS) {
    const value = weights[name];
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`weights.${name} must be >= 0, got ${value}`);
    }
  }
  const sum = weights.geometry + weights.schedulability + weights.robustness;
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    issues.push(`weights must sum to 1, got ${sum}`);
  }
  return issues;
}

export function validateConfig(config: PlanningConfig): string[] {
  const issues: string[] = [];

  if (config.cycleMode !== 'continuous' && config.cycleMode !== 'interval') {
    issues.push(`cycleMode must be 'continuous' or 'interval', got '${String(config.cycleMode)}'`);
  }
  if (config.cycleMode === 'interval') {
    checkPositive(issues, 'cycleIntervalMs', config.cycleIntervalMs);
  }
  checkPositive(issues, 'cycleBudgetMs', config.cycleBudgetMs);
  checkInteger(issues, 'maxCycles', config.maxCycles, 1);
  checkPositive(issues, 'idlePollMs', config.idlePollMs);
  checkInteger(issues, 'maxRounds', config.maxRounds, 1);
  checkPositive(issues, 'memberTimeoutMs', config.memberTimeoutMs);
  checkUnitInterval(issues, 'convergenceThreshold', config.convergenceThreshold);
  checkUnitInterval(issues, 'minWillingness', config.minWillingness);
  checkInteger(issues, 'memberCandidateCount', config.memberCandidateCount, 1, MAX_MEMBER_CANDIDATES);
  checkPositive(issues, 'trackingWindowMs', config.trackingWindowMs);
  checkPositive(issues, 'referenceRangeKm', config.referenceRangeKm);
  checkInteger(issues, 'maxOracleOutageCycles', config.maxOracleOutageCycles, 1);
  issues.push(...validateWeights(config.weights));

  return issues;
}

// ─── Resolution ──────────────────────────────────────────────────────────────

/**
 * Merge a partial configuration over the defaults and validate the result.
 * Throws InvalidConfigurationError listing every problem found.
 */
export function resolveConfig(input: PlanningConfigInput = {}): PlanningConfig {
  const config: PlanningConfig = {
    ...DEFAULT_CONFIG,
    ...input,
    weights: { ...DEFAULT_WEIGHTS, ...input.weights },
  };

  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const NUMERIC_KEYS = [
  'cycleIntervalMs',
  'cycleBudgetMs',
  'maxCycles',
  'idlePollMs',
  'maxRounds',
  'memberTimeoutMs',
  'convergenceThreshold',
  'minWillingness',
  'memberCandidateCount',
  'trackingWindowMs',
  'referenceRangeKm',
  'maxOracleOutageCycles',
] as const;

/**
 * Turn parsed JSON into a PlanningConfigInput, rejecting unknown keys and
 * values of the wrong type.
 */
export function parseConfigInput(raw: unknown): PlanningConfigInput {
  if (!isRecord(raw)) {
    throw new InvalidConfigurationError(['configuration must be a JSON object']);
  }

  const issues: string[] = [];
  const input: PlanningConfigInput = {};
  const known = new Set<string>(['cycleMode', 'weights', ...NUMERIC_KEYS]);

  for (const key of Object.keys(raw)) {
    if (!known.has(key)) issues.push(`unknown key '${key}'`);
  }

  for (const key of NUMERIC_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      issues.push(`${key} must be a number`);
      continue;
    }
    input[key] = value;
  }

  const mode = raw.cycleMode;
  if (mode !== undefined) {
    if (mode === 'continuous' || mode === 'interval') {
      input.cycleMode = mode;
    } else {
      issues.push(`cycleMode must be 'continuous' or 'interval'`);
    }
  }

  const weights = raw.weights;
  if (weights !== undefined) {
    if (!isRecord(weights)) {
      issues.push('weights must be an object');
    } else {
      const parsed: Partial<ScorerWeights> = {};
      for (const key of WEIGHT_KEYS) {
        const value = weights[key];
        if (value === undefined) continue;
        if (typeof value !== 'number') {
          issues.push(`weights.${key} must be a number`);
          continue;
        }
        parsed[key] = value;
      }
      input.weights = parsed;
    }
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
  return input;
}

/**
 * Load a JSON configuration file and resolve it against the defaults.
 */
export async function loadConfigFile(path: string): Promise<PlanningConfig> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidConfigurationError([
      `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  return resolveConfig(parseConfigInput(raw));
}
