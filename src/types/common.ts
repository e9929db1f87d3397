/**
 * Fleetplan — Common Types
 *
 * Shared primitives, the event system contract and the error taxonomy used
 * across all Fleetplan modules.
 */

// ─── Primitives ──────────────────────────────────────────────────────────────

/** Milliseconds since the Unix epoch */
export type EpochMs = number;

/** Tracking unit identifier */
export type UnitId = string;

/** Target identifier */
export type TargetId = string;

/** Geodetic position: degrees, degrees, kilometres above mean sea level */
export interface GeoPosition {
  lat: number;
  lon: number;
  alt: number;
}

/** Half-open interval [start, end) */
export interface TimeWindow {
  start: EpochMs;
  end: EpochMs;
}

export interface Clock {
  now(): EpochMs;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

// ─── Event System ────────────────────────────────────────────────────────────

export type PlanningEventType =
  | 'cycle:started'
  | 'cycle:completed'
  | 'cycle:failed'
  | 'target:carried_over'
  | 'negotiation:activated'
  | 'negotiation:round_completed'
  | 'negotiation:concluded'
  | 'member:abstained'
  | 'oracle:unavailable';

export type PlanningEventHandler = (type: PlanningEventType, data: unknown) => void;

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FleetplanError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FleetplanError';
  }
}

export class InvalidConfigurationError extends FleetplanError {
  constructor(public readonly issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      'INVALID_CONFIGURATION',
      { issues },
    );
    this.name = 'InvalidConfigurationError';
  }
}

export class OracleUnavailableError extends FleetplanError {
  constructor(entityId: string, reason?: string) {
    super(
      `Position unavailable for ${entityId}${reason ? `: ${reason}` : ''}`,
      'ORACLE_UNAVAILABLE',
      { entityId },
    );
    this.name = 'OracleUnavailableError';
  }
}

export class MemberTimeoutError extends FleetplanError {
  constructor(unitId: UnitId, timeoutMs: number) {
    super(
      `Unit ${unitId} did not respond within ${timeoutMs}ms`,
      'MEMBER_TIMEOUT',
      { unitId, timeoutMs },
    );
    this.name = 'MemberTimeoutError';
  }
}

export class MemberEvaluationError extends FleetplanError {
  constructor(unitId: UnitId, cause: unknown) {
    super(
      `Unit ${unitId} failed to evaluate: ${cause instanceof Error ? cause.message : String(cause)}`,
      'MEMBER_ERROR',
      { unitId },
    );
    this.name = 'MemberEvaluationError';
  }
}

export class NegotiationError extends FleetplanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NEGOTIATION_ERROR', details);
    this.name = 'NegotiationError';
  }
}

export class CapacityExceededError extends FleetplanError {
  constructor(unitId: UnitId, capacity: number) {
    super(
      `Unit ${unitId} is at capacity (${capacity})`,
      'CAPACITY_EXCEEDED',
      { unitId, capacity },
    );
    this.name = 'CapacityExceededError';
  }
}

export class FleetPositionUnavailableError extends FleetplanError {
  constructor(consecutiveCycles: number) {
    super(
      `No unit position could be obtained for ${consecutiveCycles} consecutive cycles`,
      'FLEET_POSITION_UNAVAILABLE',
      { consecutiveCycles },
    );
    this.name = 'FleetPositionUnavailableError';
  }
}

export class ResourceExhaustedError extends FleetplanError {
  constructor(resource: string) {
    super(`Resource exhausted: ${resource}`, 'RESOURCE_EXHAUSTED', { resource });
    this.name = 'ResourceExhaustedError';
  }
}
