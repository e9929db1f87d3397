/**
 * Fleetplan — Rolling-Horizon Target Allocation
 *
 * Unified export for the planning stack.
 *
 * ┌─────────────────────────────────────────────────┐
 * │  RollingPlanningCycleManager                     │
 * │  queue → cycle → history                         │
 * ├─────────────────────────────────────────────────┤
 * │  TargetDistributor  │  ConsensusProtocol         │
 * │  leader + members   │  rounds → agreement        │
 * ├─────────────────────────────────────────────────┤
 * │  OptimizationScorer │  UnitRegistry              │
 * │  geometry, schedule │  reserve → commit/release  │
 * ├─────────────────────────────────────────────────┤
 * │  PositionOracle     │  DecisionEvaluator         │
 * └─────────────────────────────────────────────────┘
 */

// ─── Types ───────────────────────────────────────────────────────────────────
export * from './types/index.js';

// ─── Config ──────────────────────────────────────────────────────────────────
export {
  DEFAULT_CONFIG,
  DEFAULT_WEIGHTS,
  validateConfig,
  validateWeights,
  resolveConfig,
  parseConfigInput,
  loadConfigFile,
} from './config/config.js';

// ─── Logging ─────────────────────────────────────────────────────────────────
export {
  Logger,
  LogLevel,
  createLogger,
  parseLogLevel,
  describeError,
  defaultLogger,
  type LogEntry,
  type LogOutput,
  type LoggerOptions,
} from './logging/logger.js';

// ─── Events ──────────────────────────────────────────────────────────────────
export { PlanningEvents } from './events/emitter.js';

// ─── Fleet ───────────────────────────────────────────────────────────────────
export { UnitRegistry } from './fleet/registry.js';
export { TargetQueue } from './fleet/target-queue.js';
export { StaticPositionOracle } from './fleet/static-oracle.js';

// ─── Scoring ─────────────────────────────────────────────────────────────────
export { OptimizationScorer, canonicalGroup, groupKey, type ScorerOptions } from './scoring/scorer.js';
export { groupGdop, slantDistanceKm, toCartesian, EARTH_RADIUS_KM, MAX_GDOP } from './scoring/geometry.js';

// ─── Distribution ────────────────────────────────────────────────────────────
export {
  TargetDistributor,
  type DistributionResult,
  type DistributorOptions,
  type NoLeaderReason,
} from './distribution/distributor.js';

// ─── Consensus ───────────────────────────────────────────────────────────────
export * from './consensus/index.js';

// ─── Evaluators ──────────────────────────────────────────────────────────────
export { RuleBasedEvaluator, type RuleBasedEvaluatorOptions } from './evaluators/rule-based.js';

// ─── Planning ────────────────────────────────────────────────────────────────
export {
  RollingPlanningCycleManager,
  nextCycleDelay,
  type CycleManagerOptions,
} from './planning/cycle-manager.js';

// ─── Simulation ──────────────────────────────────────────────────────────────
export {
  parseScenario,
  loadScenario,
  runSimulation,
  defaultCycleCount,
  type Scenario,
  type ScenarioUnit,
  type ScenarioTarget,
  type ScenarioWave,
  type SimulationOptions,
} from './simulation/scenario.js';
