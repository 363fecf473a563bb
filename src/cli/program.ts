import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig, type RuntimeConfig } from '../config/loader.js';
import { Logger } from '../logging/logger.js';
import { CommandHarness } from '../harness/command-harness.js';
import { FixturePatcher } from '../patching/fixture-patcher.js';
import { buildStrategyChain } from '../matching/index.js';
import { parseFailures } from '../parsing/failure-parser.js';
import {
  runReconciliation,
  planReconciliation,
  buildEditPlan,
  type ReconcilerDeps,
  type ReconciliationResult,
} from '../core/reconciler.js';
import { ReportWriter } from '../reporting/report-writer.js';
import { renderResult, renderRecords, renderReport, renderDryRun } from './summary-renderer.js';
import { withCommandHandler } from './command-error-handler.js';

const EXIT_CODES: Record<ReconciliationResult['status'], number> = {
  converged: 0,
  exhausted: 2,
  stalled: 3,
};

interface RunCommandOptions {
  config?: string;
  fixture?: string;
  filter?: string;
  command?: string;
  cwd?: string;
  maxIterations?: number;
  timeout?: number;
  strategy?: string[];
  logLevel?: string;
  dryRun?: boolean;
  report: boolean;
}

interface ParseCommandOptions {
  config?: string;
  fixture?: string;
  marker?: string;
  strategy?: string[];
}

interface ReportCommandOptions {
  config?: string;
  history?: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function buildDeps(config: RuntimeConfig, logger: Logger): ReconcilerDeps {
  return {
    harness: new CommandHarness({ command: config.command, timeout: config.timeout }),
    fixture: new FixturePatcher(config.fixture),
    strategies: buildStrategyChain({
      enabled: config.matching.strategies,
      numericLabels: config.matching.numericLabels,
      contextRadius: config.matching.contextRadius,
    }),
    selection: { filter: config.filter, cwd: config.cwd },
    parser: config.parser,
    logger,
  };
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the harness and patch the fixture file until it converges')
    .option('-c, --config <path>', 'Path to reconcile.config.json')
    .option('-f, --fixture <path>', 'Override: fixture file to patch')
    .option('-t, --filter <pattern>', 'Override: test filter passed to the harness')
    .option('--command <cmd>', 'Override: harness command ({filter} is substituted)')
    .option('--cwd <dir>', 'Override: working directory for the harness')
    .option('-m, --max-iterations <n>', 'Override: iteration cap', parsePositiveInt)
    .option('--timeout <ms>', 'Override: harness timeout in milliseconds', parsePositiveInt)
    .option('-s, --strategy <names...>', 'Override: enabled match strategies')
    .option('--log-level <level>', 'Override: debug, info, warn or error')
    .option('-d, --dry-run', 'Run the harness once and print the edit plan without writing')
    .option('--no-report', 'Skip writing the JSON run report')
    .action(withCommandHandler(async (opts: RunCommandOptions) => {
      const config = await loadConfig(opts.config, {
        fixture: opts.fixture,
        filter: opts.filter,
        command: opts.command,
        cwd: opts.cwd,
        maxIterations: opts.maxIterations,
        timeout: opts.timeout,
        strategies: opts.strategy,
        logLevel: opts.logLevel,
        report: opts.report === false ? false : undefined,
      });
      const logger = new Logger({
        source: 'reconcile',
        logDir: join(config.stateDir, 'logs'),
        level: config.logLevel,
        console: true,
      });
      const deps = buildDeps(config, logger);

      if (opts.dryRun) {
        const dry = await planReconciliation(deps);
        console.log(renderDryRun(dry));
        return;
      }

      const startTime = Date.now();
      const result = await runReconciliation(deps, { maxIterations: config.maxIterations });

      const colour = result.status === 'converged' ? chalk.green : chalk.yellow;
      console.log(colour(renderResult(result)));

      if (config.report) {
        const writer = new ReportWriter(config);
        const reportPath = await writer.write(writer.buildReport(result, startTime));
        logger.info(`Run report written to ${reportPath}`);
      }

      process.exit(EXIT_CODES[result.status]);
    }));
}

export function registerParseCommand(program: Command): void {
  program
    .command('parse <output-file>')
    .description('Parse saved harness output and show the failure records it contains')
    .option('-c, --config <path>', 'Path to reconcile.config.json')
    .option('-f, --fixture <path>', 'Also show the edit each record would produce against this file')
    .option('--marker <text>', 'Override: failure-section marker')
    .option('-s, --strategy <names...>', 'Override: enabled match strategies')
    .action(withCommandHandler(async (outputFile: string, opts: ParseCommandOptions) => {
      const output = await readFile(outputFile, 'utf-8');
      // Without a fixture the schema still needs one; the parse itself never touches it.
      const config = await loadConfig(opts.config, {
        fixture: opts.fixture ?? outputFile,
        strategies: opts.strategy,
      });
      const records = parseFailures(output, { marker: opts.marker ?? config.parser.marker });

      if (!opts.fixture) {
        console.log(renderRecords(records));
        return;
      }

      const content = await new FixturePatcher(config.fixture).load();
      const strategies = buildStrategyChain({
        enabled: config.matching.strategies,
        numericLabels: config.matching.numericLabels,
        contextRadius: config.matching.contextRadius,
      });
      const { located, unmatched } = buildEditPlan(records, content, strategies);
      console.log(renderRecords(records, located));
      if (unmatched.length > 0) {
        console.log(chalk.yellow(`\n${unmatched.length} record(s) matched no strategy.`));
      }
    }));
}

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Show the most recent run report')
    .option('-c, --config <path>', 'Path to reconcile.config.json')
    .option('--history', 'List all stored run reports')
    .action(withCommandHandler(async (opts: ReportCommandOptions) => {
      // Reports live under stateDir, which does not depend on the fixture.
      const config = await loadConfig(opts.config, { fixture: '.' });
      const reports = await ReportWriter.listReports(config.stateDir);
      if (reports.length === 0) {
        console.log('No run reports found.');
        return;
      }

      if (opts.history) {
        for (const path of reports) console.log(path);
        return;
      }

      const latest = await ReportWriter.readReport(reports[reports.length - 1]);
      console.log(renderReport(latest));
    }));
}

/**
 * Build the `reconcile` command-line program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('reconcile')
    .description('Rewrite stale expected-value literals in a test fixture until the harness passes')
    .version('0.1.0');

  registerRunCommand(program);
  registerParseCommand(program);
  registerReportCommand(program);

  return program;
}
