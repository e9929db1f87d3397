/**
 * Fleetplan — Consensus Protocol Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ActivationGate,
  ConsensusProtocol,
  NegotiationStateMachine,
  agreementScore,
  convergenceReason,
} from '../src/consensus/index.js';
import type { FanOutProbe, ProtocolSettings } from '../src/consensus/index.js';
import { TargetDistributor } from '../src/distribution/distributor.js';
import { UnitRegistry } from '../src/fleet/registry.js';
import { OptimizationScorer } from '../src/scoring/scorer.js';
import { PlanningEvents } from '../src/events/emitter.js';
import { DEFAULT_CONFIG } from '../src/config/config.js';
import { NegotiationError, ResourceExhaustedError } from '../src/types/index.js';
import type {
  DecisionEvaluator,
  OptimizationMetrics,
  PlanningEventType,
  ProposalContext,
  ProposalPayload,
  RankedCandidate,
} from '../src/types/index.js';
import { FixedDistanceOracle, ScriptedEvaluator, bid, decline, delay, makeTarget, silentLogger } from './helpers.js';

// ─── Fixtures ────────────────────────────────────────────────────────────────

const SETTINGS: ProtocolSettings = {
  maxRounds: 3,
  memberTimeoutMs: 1_000,
  convergenceThreshold: 0.15,
  minWillingness: 0.5,
};

const scorer = new OptimizationScorer({ weights: DEFAULT_CONFIG.weights });

interface Env {
  registry: UnitRegistry;
  distributor: TargetDistributor;
  events: PlanningEvents;
  emitted: Array<{ type: PlanningEventType; data: unknown }>;
  gate: ActivationGate;
}

function environment(distances: Record<string, number> = { U1: 10, U2: 20, U3: 30, U4: 40 }): Env {
  const registry = new UnitRegistry(
    Object.keys(distances).map((id) => ({ id, capacity: 2 })),
    silentLogger,
  );
  const events = new PlanningEvents(silentLogger);
  const emitted: Env['emitted'] = [];
  events.onEvent((type, data) => emitted.push({ type, data }));
  const distributor = new TargetDistributor({
    registry,
    oracle: new FixedDistanceOracle(distances),
    scorer,
    memberCandidateCount: 3,
    events,
    logger: silentLogger,
  });
  distributor.beginCycle();
  return { registry, distributor, events, emitted, gate: new ActivationGate() };
}

async function protocolFor(
  env: Env,
  targetId: string,
  evaluators: Record<string, DecisionEvaluator>,
  options: { settings?: Partial<ProtocolSettings>; probe?: FanOutProbe } = {},
): Promise<ConsensusProtocol> {
  const target = makeTarget(targetId);
  const result = await env.distributor.distribute(target);
  if (result.leader === null || !result.context || !result.initialScore) {
    throw new Error(`could not distribute ${targetId}`);
  }
  return new ConsensusProtocol({
    negotiationId: `cycle-1:${targetId}`,
    target,
    leaderId: result.leader,
    memberIds: result.memberCandidates,
    initial: { group: [result.leader, ...result.memberCandidates], metrics: result.initialScore },
    context: result.context,
    distances: result.distances,
    evaluators: (unitId) => evaluators[unitId],
    scorer,
    registry: env.registry,
    settings: { ...SETTINGS, ...options.settings },
    gate: env.gate,
    fanOutProbe: options.probe,
    events: env.events,
    logger: silentLogger,
  });
}

function metrics(composite: number): OptimizationMetrics {
  return { geometry: 0, gdop: 0, schedulability: 0, robustness: 0, composite };
}

function candidate(group: string[], composite: number, supporters: string[]): RankedCandidate {
  return { group, key: group.join('+'), metrics: metrics(composite), supporters };
}

// ─── Convergence Rules ───────────────────────────────────────────────────────

describe('agreementScore', () => {
  it('should be 0 without candidates and 1 with a single one', () => {
    expect(agreementScore([])).toBe(0);
    expect(agreementScore([candidate(['U1'], 0.3, ['U2'])])).toBe(1);
  });

  it('should be the relative gap between the top two composites', () => {
    expect(agreementScore([candidate(['U1'], 0.8, []), candidate(['U2'], 0.6, [])])).toBeCloseTo(0.25, 12);
    expect(agreementScore([candidate(['U1'], 0, []), candidate(['U2'], 0, [])])).toBe(0);
  });
});

describe('convergenceReason', () => {
  const ranked = [candidate(['U1', 'U2'], 0.8, ['U2']), candidate(['U1', 'U3'], 0.6, ['U3'])];

  it('should settle on a decisive ranking backed by a willing supporter', () => {
    const bids = [
      { unitId: 'U2', bid: bid(['U1', 'U2'], 0.9) },
      { unitId: 'U3', bid: bid(['U1', 'U3'], 0.9) },
    ];
    expect(convergenceReason(ranked, bids, 0.25, SETTINGS)).toBe('agreement_spread');
  });

  it('should not settle when the top candidate has no willing supporter', () => {
    const bids = [
      { unitId: 'U2', bid: bid(['U1', 'U2'], 0.3) },
      { unitId: 'U3', bid: bid(['U1', 'U3'], 0.9) },
    ];
    expect(convergenceReason(ranked, bids, 0.25, SETTINGS)).toBeNull();
  });

  it('should settle unanimously when every willing bid names one group', () => {
    const single = [candidate(['U1', 'U2'], 0.8, ['U2', 'U3'])];
    const bids = [
      { unitId: 'U2', bid: bid(['U1', 'U2'], 0.9) },
      { unitId: 'U3', bid: bid(['U2', 'U1'], 0.6) },
    ];
    expect(convergenceReason(single, bids, 1, { ...SETTINGS, convergenceThreshold: 1 })).toBe('unanimous');
  });
});

// ─── State Machine ───────────────────────────────────────────────────────────

describe('NegotiationStateMachine', () => {
  function machine(): NegotiationStateMachine {
    const fsm = new NegotiationStateMachine();
    fsm.create({ id: 'n1', targetId: 'T1', leaderId: 'U1', memberIds: ['U2'] });
    return fsm;
  }

  it('should reject rounds opened out of order', () => {
    const fsm = machine();
    expect(() => fsm.openRound('n1', 2)).toThrow('Out-of-order round 2 for n1; expected 1');

    fsm.openRound('n1', 1);
    expect(() => fsm.openRound('n1', 2)).toThrow(NegotiationError);
    expect(fsm.get('n1')?.currentRound).toBe(1);
  });

  it('should reject transitions missing from the table', () => {
    const fsm = machine();
    expect(() => fsm.conclude('n1', 'converge', { conclusion: 'unanimous' })).toThrow(
      'Invalid transition: created → ? (via converge)',
    );
  });

  it('should allow one live negotiation per target', () => {
    const fsm = machine();
    expect(() => fsm.create({ id: 'n2', targetId: 'T1', leaderId: 'U3', memberIds: [] })).toThrow(
      'Target T1 already has a live negotiation (n1)',
    );

    fsm.conclude('n1', 'force_timeout', { conclusion: 'safety_bound' });
    expect(fsm.create({ id: 'n2', targetId: 'T1', leaderId: 'U3', memberIds: [] }).state).toBe('created');
    expect(fsm.prune()).toBe(1);
    expect(fsm.get('n1')).toBeUndefined();
  });

  it('should log every transition', () => {
    const fsm = machine();
    fsm.openRound('n1', 1);
    fsm.conclude('n1', 'fail', { conclusion: 'all_abstained' });
    expect(fsm.getTransitionLog().map((t) => [t.from, t.to, t.trigger, t.round])).toEqual([
      ['created', 'active', 'open_round', 1],
      ['active', 'failed', 'fail', 1],
    ]);
  });
});

// ─── Protocol ────────────────────────────────────────────────────────────────

describe('ConsensusProtocol', () => {
  it('should converge in one round when every member bids for the same group', async () => {
    const env = environment();
    const u2 = new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]);
    const u3 = new ScriptedEvaluator([{ payload: bid(['U2', 'U1']) }]);
    const u4 = new ScriptedEvaluator([{ payload: bid(['U1', 'U2'], 0.6) }]);
    const protocol = await protocolFor(env, 'T1', { U2: u2, U3: u3, U4: u4 });

    const negotiation = await protocol.run();

    expect(negotiation.state).toBe('converged');
    expect(negotiation.conclusion).toBe('agreement_spread');
    expect(negotiation.rounds).toHaveLength(1);
    expect(negotiation.rounds[0].agreement).toBe(1);
    expect(negotiation.finalAssignment?.units).toEqual([
      { unitId: 'U1', role: 'primary' },
      { unitId: 'U2', role: 'support' },
    ]);
    expect(negotiation.finalAssignment?.metrics.composite).toBeCloseTo(0.4 * 0.01 + 0.3 + 0.3, 9);
    expect(env.emitted.map((e) => e.type)).toEqual([
      'negotiation:activated',
      'negotiation:round_completed',
      'negotiation:concluded',
    ]);
    expect(env.registry.snapshot('U2')?.engagedIn).toBeNull();
    expect(env.gate.current).toBeNull();
  });

  it('should hand members the negotiation context', async () => {
    const env = environment();
    const u2 = new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]);
    const protocol = await protocolFor(env, 'T1', { U2: u2, U3: u2, U4: u2 });
    await protocol.run();

    const context = u2.calls[0];
    expect(context.negotiationId).toBe('cycle-1:T1');
    expect(context.round).toBe(1);
    expect(context.leaderId).toBe('U1');
    expect(context.participants).toEqual(['U1', 'U2', 'U3', 'U4']);
    expect(context.ranking).toEqual([]);
    expect(context.window).toEqual({ start: 1_000_000, end: 1_300_000 });
    expect(context.initial.group).toEqual(['U1', 'U2', 'U3', 'U4']);
    expect(u2.calls.map((c) => c.unitId)).toEqual(['U2', 'U3', 'U4']);
  });

  it('should fail when every member abstains', async () => {
    const env = environment();
    const protocol = await protocolFor(env, 'T1', { U2: new ScriptedEvaluator([{ payload: decline }]), U3: new ScriptedEvaluator([{ error: 'model offline' }]) });

    const negotiation = await protocol.run();

    expect(negotiation.state).toBe('failed');
    expect(negotiation.conclusion).toBe('all_abstained');
    expect(negotiation.finalAssignment).toBeUndefined();
    const reasons = negotiation.rounds[0].proposals.map((p) => [p.unitId, p.payload.kind === 'abstain' ? p.payload.reason : 'bid']);
    expect(reasons.sort()).toEqual([
      ['U2', 'declined'],
      ['U3', 'error'],
      ['U4', 'error'],
    ]);
    expect(env.emitted.filter((e) => e.type === 'member:abstained')).toHaveLength(3);
  });

  it('should fail a negotiation with no members', async () => {
    const env = environment({ U1: 10 });
    const protocol = await protocolFor(env, 'T1', {});

    const negotiation = await protocol.run();

    expect(negotiation.memberIds).toEqual([]);
    expect(negotiation.state).toBe('failed');
    expect(negotiation.rounds[0].proposals).toEqual([]);
  });

  it('should time out after the last round with the best candidate so far', async () => {
    const env = environment();
    const hanging = new ScriptedEvaluator([{ hang: true }]);
    const protocol = await protocolFor(
      env,
      'T1',
      {
        U2: new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]),
        U3: new ScriptedEvaluator([{ payload: bid(['U1', 'U3']) }]),
        U4: hanging,
      },
      { settings: { memberTimeoutMs: 20 } },
    );

    const negotiation = await protocol.run();

    expect(negotiation.state).toBe('timed_out');
    expect(negotiation.conclusion).toBe('max_rounds');
    expect(negotiation.rounds.map((r) => r.agreement)).toEqual([0, 0, 0]);
    expect(negotiation.finalAssignment?.units.map((u) => u.unitId)).toEqual(['U1', 'U2']);
    expect(hanging.calls).toHaveLength(3);
    expect(hanging.aborted).toBe(3);
    const timeouts = negotiation.rounds.flatMap((r) => r.proposals).filter((p) => p.payload.kind === 'abstain');
    expect(timeouts.map((p) => (p.payload.kind === 'abstain' ? p.payload.rationale : ''))).toEqual([
      'Unit U4 did not respond within 20ms',
      'Unit U4 did not respond within 20ms',
      'Unit U4 did not respond within 20ms',
    ]);
  });

  it('should record proposals in arrival order and rounds in sequence', async () => {
    const env = environment();
    const protocol = await protocolFor(env, 'T1', {
      U2: new ScriptedEvaluator([{ payload: bid(['U1', 'U2']), delayMs: 30 }]),
      U3: new ScriptedEvaluator([{ payload: bid(['U1', 'U3']), delayMs: 15 }]),
      U4: new ScriptedEvaluator([{ payload: bid(['U1', 'U4']) }]),
    });

    const negotiation = await protocol.run();

    expect(negotiation.conclusion).toBe('max_rounds');
    expect(negotiation.rounds.map((r) => r.round)).toEqual([1, 2, 3]);
    for (const round of negotiation.rounds) {
      expect(round.proposals.map((p) => p.unitId)).toEqual(['U4', 'U3', 'U2']);
      expect(round.proposals.every((p) => p.round === round.round)).toBe(true);
    }
  });

  it('should hand later rounds the previous ranking', async () => {
    const env = environment();
    const u2 = new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]);
    const protocol = await protocolFor(env, 'T1', { U2: u2, U3: new ScriptedEvaluator([{ payload: bid(['U1', 'U3']) }]), U4: new ScriptedEvaluator([{ payload: decline }]) });

    const negotiation = await protocol.run();

    expect(u2.calls.map((c) => c.round)).toEqual([1, 2, 3]);
    expect(u2.calls[1].ranking.map((c) => c.key)).toEqual(['U1+U2', 'U1+U3']);
    expect(u2.calls[2].history).toHaveLength(2);
    expect(negotiation.rounds[1].candidates).toBe(u2.calls[2].ranking);
  });

  it('should conclude on the safety bound with the last completed round', async () => {
    const env = environment();
    const u2 = new ScriptedEvaluator([{ payload: bid(['U1', 'U2'], 0.2) }, { hang: true }]);
    const protocol = await protocolFor(
      env,
      'T1',
      { U2: u2, U3: new ScriptedEvaluator([{ payload: decline }]), U4: new ScriptedEvaluator([{ payload: decline }]) },
      { settings: { memberTimeoutMs: 10_000 } },
    );

    const running = protocol.run();
    while (u2.calls.length < 2) {
      await delay(5);
    }
    protocol.forceTimeout();
    const negotiation = await running;

    expect(negotiation.state).toBe('timed_out');
    expect(negotiation.conclusion).toBe('safety_bound');
    expect(negotiation.rounds).toHaveLength(1);
    expect(negotiation.currentRound).toBe(2);
    expect(negotiation.finalAssignment?.units.map((u) => u.unitId)).toEqual(['U1', 'U2']);
    expect(u2.aborted).toBe(1);
    expect(env.registry.snapshot('U1')?.engagedIn).toBeNull();
    expect(protocol.forceTimeout().conclusion).toBe('safety_bound');
  });

  it('should pick the group member nearest the target as primary', async () => {
    const env = environment({ U1: 10, U2: 50, U3: 30, U4: 20 });
    const evaluator = new ScriptedEvaluator([{ payload: bid(['U2', 'U4']) }]);
    const protocol = await protocolFor(env, 'T1', { U2: evaluator, U3: evaluator, U4: evaluator });

    const negotiation = await protocol.run();

    expect(negotiation.finalAssignment?.units).toEqual([
      { unitId: 'U4', role: 'primary' },
      { unitId: 'U2', role: 'support' },
    ]);
    expect(negotiation.memberIds).toEqual(['U4', 'U3', 'U2']);
  });

  it('should turn malformed bids into invalid abstentions and strip outsiders', async () => {
    const env = environment();
    const protocol = await protocolFor(env, 'T1', {
      U2: new ScriptedEvaluator([{ payload: bid(['U9']) }]),
      U3: new ScriptedEvaluator([{ payload: bid(['U1', 'U3'], 1.5) }]),
      U4: new ScriptedEvaluator([{ payload: bid(['U9', 'U4', 'U1']) }]),
    });

    const negotiation = await protocol.run();
    const byUnit = new Map(negotiation.rounds[0].proposals.map((p) => [p.unitId, p.payload]));

    expect(byUnit.get('U2')).toEqual({ kind: 'abstain', reason: 'invalid', rationale: 'preferred group names no participant' });
    expect(byUnit.get('U3')).toEqual({ kind: 'abstain', reason: 'invalid', rationale: 'willingness 1.5 is outside [0, 1]' });
    expect(byUnit.get('U4')).toEqual({ kind: 'bid', willingness: 0.9, preferredGroup: ['U1', 'U4'], constraints: [], rationale: 'test' });
    expect(Object.isFrozen(byUnit.get('U4'))).toBe(true);
    expect(negotiation.state).toBe('converged');
    expect(negotiation.finalAssignment?.units.map((u) => u.unitId)).toEqual(['U1', 'U4']);
  });

  it('should run members one at a time when the probe refuses the slots', async () => {
    const scripts = (): Record<string, DecisionEvaluator> => ({
      U2: new ScriptedEvaluator([{ payload: bid(['U1', 'U2']), delayMs: 20 }]),
      U3: new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]),
      U4: new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]),
    });
    const asked: number[] = [];

    const parallel = await (await protocolFor(environment(), 'T1', scripts())).run();
    const sequential = await (
      await protocolFor(environment(), 'T1', scripts(), {
        probe: (slots) => {
          asked.push(slots);
          return false;
        },
      })
    ).run();

    expect(asked).toEqual([3]);
    expect(parallel.rounds[0].mode).toBe('parallel');
    expect(sequential.rounds[0].mode).toBe('sequential');
    expect(sequential.rounds[0].proposals.map((p) => p.unitId)).toEqual(['U2', 'U3', 'U4']);
    expect(parallel.rounds[0].proposals[2].unitId).toBe('U2');
    expect(sequential.finalAssignment).toEqual(parallel.finalAssignment);
    expect(sequential.conclusion).toBe(parallel.conclusion);
  });

  it('should fall back to sequential calls when the runtime runs out of slots', async () => {
    class ExhaustedOnce implements DecisionEvaluator {
      calls = 0;

      propose(_context: ProposalContext): Promise<ProposalPayload> {
        this.calls++;
        if (this.calls === 1) throw new ResourceExhaustedError('worker slots');
        return Promise.resolve(bid(['U1', 'U3']));
      }
    }
    const exhausted = new ExhaustedOnce();
    const env = environment();
    const protocol = await protocolFor(env, 'T1', {
      U2: new ScriptedEvaluator([{ payload: bid(['U1', 'U3']) }]),
      U3: exhausted,
      U4: new ScriptedEvaluator([{ payload: bid(['U1', 'U3']) }]),
    });

    const negotiation = await protocol.run();

    expect(negotiation.rounds[0].mode).toBe('sequential');
    expect(exhausted.calls).toBe(2);
    expect(negotiation.rounds[0].proposals.map((p) => p.unitId)).toEqual(['U2', 'U3', 'U4']);
    expect(negotiation.state).toBe('converged');
  });

  it('should never let two negotiations hold the gate at once', async () => {
    const env = environment();
    const violations: string[] = [];
    const watcher: DecisionEvaluator = {
      async propose(context) {
        if (env.gate.current !== context.negotiationId) violations.push(context.negotiationId);
        await delay(5);
        if (env.gate.current !== context.negotiationId) violations.push(context.negotiationId);
        return bid([context.leaderId, context.participants[1]]);
      },
    };
    const evaluators = { U1: watcher, U2: watcher, U3: watcher, U4: watcher };
    const protocols = [
      await protocolFor(env, 'T1', evaluators),
      await protocolFor(env, 'T2', evaluators),
      await protocolFor(env, 'T3', evaluators),
    ];

    const runs = protocols.map((p) => p.run());
    expect(env.gate.current).toBe('cycle-1:T1');
    expect(env.gate.pending).toBe(2);

    const negotiations = await Promise.all(runs);
    expect(violations).toEqual([]);
    expect(negotiations.map((n) => n.state)).toEqual(['converged', 'converged', 'converged']);
    expect(env.gate.current).toBeNull();
    expect(env.gate.pending).toBe(0);
  });

  it('should time out a negotiation still waiting for the gate without asking anyone', async () => {
    const env = environment();
    const first = new ScriptedEvaluator([{ payload: bid(['U1', 'U2']), delayMs: 10 }]);
    const second = new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]);
    const a = await protocolFor(env, 'T1', { U2: first, U3: first, U4: first });
    const b = await protocolFor(env, 'T2', { U2: second, U3: second, U4: second });

    const runA = a.run();
    const runB = b.run();
    expect(env.gate.pending).toBe(1);
    expect(b.forceTimeout().state).toBe('timed_out');

    const negotiation = await runB;
    expect(env.gate.current).toBe('cycle-1:T1');
    expect(env.gate.pending).toBe(0);
    expect(negotiation.conclusion).toBe('safety_bound');
    expect(negotiation.finalAssignment).toBeUndefined();
    expect(second.calls).toEqual([]);

    await runA;
    expect(env.gate.current).toBeNull();
  });

  it('should return the same run for repeated calls', async () => {
    const env = environment();
    const evaluator = new ScriptedEvaluator([{ payload: bid(['U1', 'U2']) }]);
    const protocol = await protocolFor(env, 'T1', { U2: evaluator, U3: evaluator, U4: evaluator });
    expect(protocol.run()).toBe(protocol.run());
    await protocol.run();
  });
});
