#!/usr/bin/env node
/**
 * Fleetplan CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { CycleResult, CycleResultEntry, EntryStatus, PlanningConfigInput } from '../types/index.js';
import { FleetplanError } from '../types/index.js';
import { loadConfigFile } from '../config/config.js';
import { LogLevel, createLogger, describeError, parseLogLevel } from '../logging/logger.js';
import { loadScenario, runSimulation } from '../simulation/scenario.js';

const STATUS_COLOR: Record<EntryStatus, (text: string) => string> = {
  converged: chalk.green,
  timed_out: chalk.yellow,
  fallback: chalk.yellow,
  failed: chalk.red,
};

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

function logLevel(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === null) {
    throw new InvalidArgumentError('expected debug, info, warn, error or silent');
  }
  return level;
}

function describeEntry(entry: CycleResultEntry): string {
  const units = entry.roles
    .map((r) => (r.role === 'primary' ? chalk.bold(`${r.unitId}*`) : r.unitId))
    .join(', ');
  const composite = entry.metrics ? entry.metrics.composite.toFixed(3) : '-';
  const rounds = `${entry.rounds} round${entry.rounds === 1 ? '' : 's'}`;
  return `  ${entry.targetId} → ${units || chalk.dim('none')}  ${STATUS_COLOR[entry.status](entry.status)}  ${chalk.dim(`${rounds}, composite ${composite}`)}`;
}

function printCycle(result: CycleResult): void {
  const outcome =
    result.outcome === 'completed'
      ? chalk.green(result.outcome)
      : result.outcome === 'failed'
        ? chalk.red(result.outcome)
        : chalk.yellow(result.outcome);
  console.log(`${chalk.cyan.bold(result.cycleId)} ${outcome} ${chalk.dim(`${result.endedAt - result.startedAt}ms`)}`);
  for (const entry of result.entries) {
    console.log(describeEntry(entry));
  }
  if (result.carriedOver.length > 0) {
    console.log(chalk.yellow(`  carried over: ${result.carriedOver.join(', ')}`));
  }
  if (result.error) {
    console.log(chalk.red(`  ${result.error.code}: ${result.error.message}`));
  }
}

const program = new Command();

program
  .name('fleetplan')
  .description('Rolling-horizon, consensus-based target allocation for tracking fleets')
  .version('0.1.0');

program
  .command('simulate')
  .description('Run planning cycles over a scenario file')
  .requiredOption('-s, --scenario <file>', 'scenario JSON file')
  .option('-c, --config <file>', 'planning configuration JSON file')
  .option('-n, --cycles <n>', 'number of cycles to run', positiveInt)
  .option('--json', 'print cycle results as JSON')
  .option('--log-level <level>', 'debug, info, warn, error or silent', logLevel, LogLevel.WARN)
  .action(async (opts: { scenario: string; config?: string; cycles?: number; json?: boolean; logLevel: LogLevel }) => {
    try {
      const scenario = await loadScenario(opts.scenario);
      const config: PlanningConfigInput | undefined = opts.config ? await loadConfigFile(opts.config) : undefined;
      const logger = createLogger({ level: opts.logLevel, component: 'fleetplan' });

      const results = await runSimulation(scenario, {
        config,
        cycles: opts.cycles,
        logger,
        onCycle: opts.json ? undefined : printCycle,
      });

      if (opts.json) {
        console.log(JSON.stringify(results, null, 2));
      }
      if (results.some((r) => r.outcome === 'failed')) {
        process.exitCode = 1;
      }
    } catch (error) {
      const code = error instanceof FleetplanError ? `${error.code}: ` : '';
      console.error(chalk.red(`Error: ${code}${describeError(error)}`));
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exitCode = 1;
});
