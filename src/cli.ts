#!/usr/bin/env node
/**
 * scenario-harness CLI.
 *
 *   scenario-harness list
 *   scenario-harness run <suiteId> [--timeout <ms>] [--poll-interval <ms>]
 *
 * `run` prints one line per scenario and a totals line; the exit code is 0
 * when the sweep passed and 1 otherwise.
 */

import { Command, InvalidArgumentError } from 'commander';
import { HarnessConfig, loadHarnessConfig, validateHarnessConfig } from './config';
import { LifecyclePublisher } from './data-plane/publisher';
import { HarnessError, configError, describeThrown } from './domain/errors';
import { setLogLevel } from './logger';
import { createBuiltinRegistry } from './simulation/device-suites';
import { createMemoryStore } from './storage/memory-store';
import { SuiteRegistry } from './suites/registry';
import { SuiteRunner } from './suites/runner';

export interface CliDeps {
  registry?: SuiteRegistry;
  config?: HarnessConfig;
  /** Line writer for results. Default: stdout. */
  out?: (line: string) => void;
  /** Line writer for problems. Default: stderr. */
  err?: (line: string) => void;
  /** Receives the process exit code. Default: sets process.exitCode. */
  setExitCode?: (code: number) => void;
}

function parseMs(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer number of milliseconds.');
  }
  return parsed;
}

export function createProgram(deps: CliDeps = {}): Command {
  const registry = deps.registry ?? createBuiltinRegistry();
  const baseConfig = deps.config ?? loadHarnessConfig();
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = deps.err ?? ((line: string) => process.stderr.write(`${line}\n`));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();
  program
    .name('scenario-harness')
    .description('Run bounded-polling verification suites against asynchronous collaborators');

  program
    .command('list')
    .description('List registered suites and their scenarios')
    .action(() => {
      for (const suite of registry.list()) {
        out(`${suite.id}: ${suite.description}`);
        for (const scenarioId of suite.scenarioIds) out(`  ${scenarioId}`);
      }
      setExitCode(0);
    });

  program
    .command('run')
    .description('Run every scenario of a suite and print the report')
    .argument('<suiteId>', 'suite to run')
    .option('--timeout <ms>', 'default wait budget per step', parseMs)
    .option('--poll-interval <ms>', 'default poll interval', parseMs)
    .action(async (suiteId: string, options: { timeout?: number; pollInterval?: number }) => {
      const config: HarnessConfig = {
        ...baseConfig,
        defaultTimeoutMs: options.timeout ?? baseConfig.defaultTimeoutMs,
        defaultPollIntervalMs: options.pollInterval ?? baseConfig.defaultPollIntervalMs,
      };
      const validation = validateHarnessConfig(config);
      if (!validation.valid) {
        const typed = configError(validation.errors);
        err(`${typed.code}: ${typed.message}`);
        setExitCode(2);
        return;
      }
      for (const warning of validation.warnings) err(`config: ${warning}`);
      setLogLevel(config.logLevel);

      const store = createMemoryStore();
      const runner = new SuiteRunner(registry, store, new LifecyclePublisher(store), config);
      try {
        const report = await runner.run(suiteId);
        for (const line of report.summaryLines()) out(line);
        setExitCode(report.exitCode());
      } catch (e) {
        err(e instanceof HarnessError ? `${e.typedError.code}: ${e.message}` : describeThrown(e));
        setExitCode(2);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      process.stderr.write(`${describeThrown(e)}\n`);
      process.exitCode = 2;
    });
}
