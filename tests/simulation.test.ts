/**
 * Fleetplan — Simulation and Rule-Based Evaluator Tests
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import {
  defaultCycleCount,
  loadScenario,
  parseScenario,
  runSimulation,
} from '../src/simulation/scenario.js';
import type { Scenario } from '../src/simulation/scenario.js';
import { RuleBasedEvaluator } from '../src/evaluators/rule-based.js';
import { UnitRegistry } from '../src/fleet/registry.js';
import { FleetplanError } from '../src/types/index.js';
import type { CycleResult, ProposalContext, RankedCandidate } from '../src/types/index.js';
import { descriptor, silentLogger } from './helpers.js';

// ─── Scenario Parsing ────────────────────────────────────────────────────────

describe('parseScenario', () => {
  it('should collect every problem into one error', () => {
    try {
      parseScenario({
        units: [
          { id: 'U1', capacity: -1, position: { lat: 0, lon: 0 } },
          { id: 'U1', capacity: 1, position: { lat: 100, lon: 0 } },
        ],
        waves: [{ atCycle: 0, targets: [] }],
      });
      expect.unreachable('parseScenario should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(FleetplanError);
      if (error instanceof FleetplanError) {
        expect(error.code).toBe('INVALID_SCENARIO');
        expect(error.details?.issues).toEqual([
          'units[0].capacity must be a non-negative integer',
          "units[1].id 'U1' is used twice",
          'units[1].position.lat must be a number in [-90, 90]',
          'waves[0].atCycle must be an integer >= 1',
        ]);
      }
    }
  });

  it('should reject anything but an object', () => {
    expect(() => parseScenario([])).toThrow('Invalid scenario: expected an object');
  });

  it('should fill defaults and order waves by cycle', () => {
    const scenario = parseScenario({
      units: [{ id: 'U1', capacity: 1, position: { lat: 1, lon: 2 } }],
      waves: [
        { atCycle: 3, targets: [{ id: 'T2', threatLevel: 'low', position: { lat: 0, lon: 0, alt: 5 }, detectionOffsetMs: 10 }] },
        { atCycle: 1, targets: [{ id: 'T1', threatLevel: 'high', position: { lat: 0, lon: 0 } }] },
      ],
    });

    expect(scenario.units[0].position).toEqual({ lat: 1, lon: 2, alt: 0 });
    expect(scenario.waves.map((w) => w.atCycle)).toEqual([1, 3]);
    expect(scenario.waves[0].targets[0].detectionOffsetMs).toBe(0);
    expect(defaultCycleCount(scenario)).toBe(4);
  });

  it('should load the bundled demo scenario', async () => {
    const scenario = await loadScenario(fileURLToPath(new URL('../scenarios/demo.json', import.meta.url)));
    expect(scenario.units.map((u) => u.id)).toEqual(['U1', 'U2', 'U3', 'U4', 'U5']);
    expect(scenario.waves.map((w) => w.targets.map((t) => t.id))).toEqual([['T1', 'T2'], ['T3', 'T4']]);
  });
});

// ─── Simulation ──────────────────────────────────────────────────────────────

describe('runSimulation', () => {
  const scenario: Scenario = {
    units: [
      { id: 'U1', capacity: 2, position: { lat: 0, lon: 0, alt: 500 } },
      { id: 'U2', capacity: 2, position: { lat: 1, lon: 0, alt: 500 } },
      { id: 'U3', capacity: 2, position: { lat: 0, lon: 1, alt: 500 } },
    ],
    waves: [
      {
        atCycle: 1,
        targets: [{ id: 'T1', threatLevel: 'high', position: { lat: 0.5, lon: 0.5, alt: 0 }, detectionOffsetMs: 0 }],
      },
    ],
  };

  it('should agree on the seeded group and stop one cycle after the last wave', async () => {
    const seen: CycleResult[] = [];
    const results = await runSimulation(scenario, {
      startTime: 1_000_000,
      logger: silentLogger,
      onCycle: (result) => seen.push(result),
    });

    expect(results.map((r) => r.cycleId)).toEqual(['cycle-1', 'cycle-2']);
    expect(seen).toEqual(results);

    const [entry] = results[0].entries;
    expect(entry.status).toBe('converged');
    expect(entry.rounds).toBe(1);
    expect(entry.roles[0]).toEqual({ unitId: 'U2', role: 'primary' });
    expect([...entry.finalAssignment].sort()).toEqual(['U1', 'U2', 'U3']);
    expect(results[1].entries).toEqual([]);
    expect(results[1].outcome).toBe('completed');
  });

  it('should honour an explicit cycle count', async () => {
    const results = await runSimulation(scenario, { cycles: 1, startTime: 1_000_000, logger: silentLogger });
    expect(results).toHaveLength(1);
  });
});

// ─── Rule-Based Evaluator ────────────────────────────────────────────────────

describe('RuleBasedEvaluator', () => {
  const WINDOW = { start: 1_000_000, end: 1_300_000 };

  function context(overrides: Partial<ProposalContext> = {}): ProposalContext {
    return {
      negotiationId: 'cycle-1:T1',
      unitId: 'U2',
      round: 1,
      target: descriptor('T1'),
      window: WINDOW,
      leaderId: 'U1',
      participants: ['U1', 'U2', 'U3', 'U4'],
      ranking: [],
      initial: {
        group: ['U1', 'U2', 'U3', 'U4'],
        metrics: { geometry: 0, gdop: 0, schedulability: 0, robustness: 0, composite: 0 },
      },
      history: [],
      deadline: 0,
      signal: new AbortController().signal,
      ...overrides,
    };
  }

  function registry(): UnitRegistry {
    return new UnitRegistry(
      [
        { id: 'U1', capacity: 2 },
        { id: 'U2', capacity: 2 },
      ],
      silentLogger,
    );
  }

  it('should seed the leader, itself and the nearest participants in round 1', async () => {
    const evaluator = new RuleBasedEvaluator({ unitId: 'U2', registry: registry() });
    await expect(evaluator.propose(context())).resolves.toEqual({
      kind: 'bid',
      willingness: 0.9,
      preferredGroup: ['U1', 'U2', 'U3'],
      constraints: [],
      rationale: 'joining the 3 nearest participants',
    });
  });

  it('should adopt the top-ranked group in later rounds', async () => {
    const top: RankedCandidate = {
      group: ['U1', 'U4'],
      key: 'U1+U4',
      metrics: { geometry: 0, gdop: 0, schedulability: 0, robustness: 0, composite: 0.5 },
      supporters: ['U3'],
    };
    const evaluator = new RuleBasedEvaluator({ unitId: 'U2', registry: registry() });
    const payload = await evaluator.propose(context({ round: 2, ranking: [top] }));

    expect(payload.kind === 'bid' && payload.preferredGroup).toEqual(['U1', 'U4']);
    expect(payload.kind === 'bid' && payload.rationale).toBe('adopting top-ranked group U1+U4 (composite 0.500)');
  });

  it('should lose willingness with load and window clashes', async () => {
    const units = registry();
    units.commit('U2', 'T9', { start: 1_200_000, end: 1_400_000 });
    const evaluator = new RuleBasedEvaluator({ unitId: 'U2', registry: units });

    const payload = await evaluator.propose(context());
    expect(payload.kind).toBe('bid');
    if (payload.kind === 'bid') {
      expect(payload.willingness).toBeCloseTo(0.9 * 0.75 * 0.5, 12);
      expect(payload.constraints).toEqual(['window overlaps an existing assignment']);
    }
  });

  it('should decline targets below its threat floor', async () => {
    const evaluator = new RuleBasedEvaluator({ unitId: 'U2', registry: registry(), minThreatLevel: 'critical' });
    await expect(evaluator.propose(context())).resolves.toEqual({
      kind: 'abstain',
      reason: 'declined',
      rationale: 'threat level high is below critical',
    });
  });

  it('should decline when it has no slot left', async () => {
    const units = registry();
    units.commit('U2', 'T8', WINDOW);
    units.commit('U2', 'T9', WINDOW);
    const evaluator = new RuleBasedEvaluator({ unitId: 'U2', registry: units });
    await expect(evaluator.propose(context())).resolves.toEqual({
      kind: 'abstain',
      reason: 'declined',
      rationale: 'no spare capacity',
    });
  });

  it('should bid at full willingness for a target it already holds a slot for', async () => {
    const units = registry();
    units.reserve('U1', 'T1');
    units.commit('U1', 'T8', { start: 0, end: 10 });
    const evaluator = new RuleBasedEvaluator({ unitId: 'U1', registry: units });
    const payload = await evaluator.propose(context({ unitId: 'U1' }));
    expect(payload.kind === 'bid' && payload.willingness).toBe(0.9);
  });
});
