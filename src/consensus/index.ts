/**
 * Fleetplan — Consensus Module Exports
 */

export { ActivationGate, processActivationGate } from './activation-gate.js';
export type { ReleaseGate } from './activation-gate.js';
export { NegotiationStateMachine } from './state-machine.js';
export { fanOut, unlimitedFanOut } from './fan-out.js';
export type { FanOutProbe, FanOutOptions, FanOutResult, MemberCall, MemberResponse } from './fan-out.js';
export { ConsensusProtocol, agreementScore, convergenceReason } from './protocol.js';
export type { ConsensusProtocolOptions, EvaluatorLookup, ProtocolSettings, SafetyBound } from './protocol.js';
