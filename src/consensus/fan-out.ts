/**
 * Fleetplan — Member Fan-out
 *
 * Asks every member of a round for a proposal. Each call gets its own
 * AbortController and timer; a timeout, an error or the negotiation-wide
 * abort settles that member alone as an abstention and leaves its siblings
 * running. Calls run concurrently unless the capacity probe refuses the
 * slots or the runtime reports ResourceExhaustedError while starting one,
 * in which case the remaining calls run one at a time.
 */

import {
  MemberEvaluationError,
  MemberTimeoutError,
  ResourceExhaustedError,
} from '../types/index.js';
import type {
  AbstainPayload,
  Clock,
  DecisionEvaluator,
  EpochMs,
  FanOutMode,
  FleetplanError,
  ProposalContext,
  ProposalPayload,
  UnitId,
} from '../types/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

/**
 * Asked once per round with the number of concurrent calls needed. Returning
 * false makes the round sequential.
 */
export type FanOutProbe = (slots: number) => boolean;

export const unlimitedFanOut: FanOutProbe = () => true;

export interface MemberCall {
  unitId: UnitId;
  evaluator: DecisionEvaluator | undefined;
  buildContext(signal: AbortSignal, deadline: EpochMs): ProposalContext;
}

export interface MemberResponse {
  unitId: UnitId;
  payload: ProposalPayload;
  /** Set when the payload is a synthetic abstention */
  error?: FleetplanError;
  receivedAt: EpochMs;
}

export interface FanOutOptions {
  timeoutMs: number;
  /** Negotiation-wide abort; settles every outstanding call */
  signal: AbortSignal;
  clock: Clock;
  probe?: FanOutProbe;
  /**
   * Told how much longer than one member timeout the round may now take,
   * once it switches to sequential calls.
   */
  onSequential?: (extraMs: number) => void;
}

export interface FanOutResult {
  /** Arrival order */
  responses: MemberResponse[];
  mode: FanOutMode;
}

// ─── Fan-out ─────────────────────────────────────────────────────────────────

export async function fanOut(
  calls: ReadonlyArray<MemberCall>,
  options: FanOutOptions,
): Promise<FanOutResult> {
  const responses: MemberResponse[] = [];
  const probe = options.probe ?? unlimitedFanOut;
  let mode: FanOutMode = calls.length > 1 && !probe(calls.length) ? 'sequential' : 'parallel';
  if (mode === 'sequential') {
    options.onSequential?.((calls.length - 1) * options.timeoutMs);
  }

  let next = 0;
  if (mode === 'parallel') {
    const started: Promise<void>[] = [];
    try {
      for (; next < calls.length; next++) {
        const call = calls[next];
        started.push(startCall(call, options).then((response) => {
          responses.push(response);
        }));
      }
    } catch (error) {
      if (!(error instanceof ResourceExhaustedError)) throw error;
      mode = 'sequential';
    }
    await Promise.all(started);
    if (next < calls.length) {
      // The rest run one at a time after the parallel batch has settled.
      options.onSequential?.((calls.length - next) * options.timeoutMs);
    }
  }

  for (; next < calls.length; next++) {
    const call = calls[next];
    let response: MemberResponse;
    try {
      response = await startCall(call, options);
    } catch (error) {
      if (!(error instanceof ResourceExhaustedError)) throw error;
      response = {
        unitId: call.unitId,
        payload: abstain('error', error.message),
        error: new MemberEvaluationError(call.unitId, error),
        receivedAt: options.clock.now(),
      };
    }
    responses.push(response);
  }

  return { responses, mode };
}

// ─── Internal ────────────────────────────────────────────────────────────────

function abstain(reason: AbstainPayload['reason'], rationale: string): AbstainPayload {
  return { kind: 'abstain', reason, rationale };
}

/**
 * Invoke one member. Throws synchronously only for ResourceExhaustedError;
 * every other failure settles as an abstention.
 */
function startCall(call: MemberCall, options: FanOutOptions): Promise<MemberResponse> {
  const { clock, timeoutMs } = options;
  const respond = (payload: ProposalPayload, error?: FleetplanError): MemberResponse => ({
    unitId: call.unitId,
    payload,
    ...(error ? { error } : {}),
    receivedAt: clock.now(),
  });

  if (options.signal.aborted) {
    return Promise.resolve(respond(abstain('timeout', 'negotiation concluded before the call')));
  }
  if (!call.evaluator) {
    const error = new MemberEvaluationError(call.unitId, 'no decision evaluator registered');
    return Promise.resolve(respond(abstain('error', error.message), error));
  }

  const controller = new AbortController();
  const context = call.buildContext(controller.signal, clock.now() + timeoutMs);

  let pending: Promise<ProposalPayload>;
  try {
    pending = call.evaluator.propose(context);
  } catch (error) {
    if (error instanceof ResourceExhaustedError) throw error;
    pending = Promise.reject(error);
  }

  return new Promise<MemberResponse>((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (response: MemberResponse, cancel: boolean): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      options.signal.removeEventListener('abort', onAbort);
      if (cancel) controller.abort();
      resolve(response);
    };

    const onAbort = (): void => {
      finish(respond(abstain('timeout', 'negotiation concluded')), true);
    };

    timer = setTimeout(() => {
      const error = new MemberTimeoutError(call.unitId, timeoutMs);
      finish(respond(abstain('timeout', error.message), error), true);
    }, timeoutMs);
    options.signal.addEventListener('abort', onAbort, { once: true });

    pending.then(
      (payload) => finish(respond(payload), false),
      (cause: unknown) => {
        const error = new MemberEvaluationError(call.unitId, cause);
        finish(respond(abstain('error', error.message), error), false);
      },
    );
  });
}
