import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  AuditError,
  createAuditor,
  createLogger,
  loadEngineConfig,
  pdfCheckMetadata,
  ReportGenerator,
  ReportStore,
  RetentionSweeper,
  type AuditOutcome,
  type BrowserLauncher,
  type CheckMetadata,
  type EngineConfig,
  type Logger,
  type ReportFormat,
} from '@accessaudit/core';
import { getRuleMetadata } from '@accessaudit/rules';
import { AuditServer } from '@accessaudit/server';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import ora, { type Ora } from 'ora';
import { ZodError } from 'zod';

import { compareResults, formatComparison } from './lib/compare.js';
import {
  flagsToOverrides,
  initTemplate,
  resolveConfigPaths,
  type AuditFlags,
  type ConfigFlags,
} from './lib/config.js';
import { formatSummaryTable, renderOutcomes } from './lib/output.js';
import { readTarget } from './lib/target.js';

export const VERSION = '0.1.0';

const DAY_MS = 24 * 60 * 60 * 1000;
const FORMATS: ReportFormat[] = ['json', 'md', 'csv', 'console'];

export const EXIT_OK = 0;
export const EXIT_BELOW_THRESHOLD = 1;
export const EXIT_FAILED = 2;

export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Process surface the CLI runs against; tests pass their own.
 */
export interface CliIo {
  stdout: OutputStream;
  stderr: OutputStream;
  cwd: string;
  env: NodeJS.ProcessEnv;

  /** Show ora spinners on stderr. */
  spinner?: boolean;
  launcher?: BrowserLauncher;
  logger?: Logger;

  /** Resolves when `serve` should shut down. Defaults to SIGINT or SIGTERM. */
  untilStopped?: () => Promise<void>;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Run the `accessaudit` command line and resolve with its exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let exitCode = EXIT_OK;

  const program = new Command();
  program
    .name('accessaudit')
    .description('Accessibility audits for web pages, HTML documents and PDFs')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.stdout.write(s),
      writeErr: (s) => io.stderr.write(s),
    })
    .option('-c, --config <file>', 'Config file (default: .accessauditrc.json found upwards from cwd)')
    .option('--data-dir <dir>', 'Artifact directory')
    .option('--log-level <level>', 'fatal|error|warn|info|debug|trace|silent');

  program
    .command('audit')
    .description('Audit a URL, a .pdf or an .html file and store the run')
    .argument('<target>', 'URL or file path')
    .addOption(new Option('-f, --format <format>', 'Report format').choices(FORMATS))
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('-t, --threshold <score>', 'Exit with 1 when a score is below this', parseScore)
    .option('--timeout <seconds>', 'Render timeout', parsePositiveInt)
    .option('--deadline <seconds>', 'Overall per-run deadline', parsePositiveInt)
    .option('--pool-size <n>', 'Browser contexts rendering at once', parsePositiveInt)
    .option('--no-contrast', 'Skip computed colour contrast')
    .option('--axe', 'Also run axe-core and report its findings')
    .option('--with-pdfs', 'Also audit PDF documents the page links to')
    .option('--no-color', 'Disable ANSI colours in console output')
    .action(async (input: string, _options: unknown, cmd: Command) => {
      const flags = cmd.optsWithGlobals<AuditFlags>();
      const config = loadConfig(io, flags);
      const logger = io.logger ?? createLogger(config.logging, { stderr: true });
      const target = await readTarget(input, io.cwd);

      const auditor = createAuditor(config, { launcher: io.launcher, logger });
      const spinner = startSpinner(io, `Auditing ${input}...`);
      auditor.on('render:complete', () => setSpinnerText(spinner, 'Evaluating rules...'));
      auditor.on('score', ({ score }: { score: number }) => setSpinnerText(spinner, `Saving run (score ${score})...`));

      const outcomes: AuditOutcome[] = [];
      try {
        const outcome = await auditor.audit(target);
        outcomes.push(outcome);

        if (flags.withPdfs && outcome.result.linkedPdfs?.length) {
          setSpinnerText(spinner, `Auditing ${outcome.result.linkedPdfs.length} linked PDF(s)...`);
          const linked = await auditor.auditLinkedPdfs(outcome.result);
          linked.forEach((settled, i) => {
            if (settled.status === 'fulfilled') outcomes.push(settled.value);
            else io.stderr.write(`Skipped ${outcome.result.linkedPdfs?.[i] ?? 'PDF'}: ${describeError(settled.reason)}\n`);
          });
        }
        spinner?.succeed(`Audit complete. Score: ${outcome.result.score}`);
      } catch (error) {
        spinner?.fail('Audit failed');
        throw error;
      } finally {
        await auditor.close();
      }

      const rendered = renderOutcomes(config.report.format, outcomes, { noColor: flags.color === false });
      await emit(io, rendered, config.report.output);

      const threshold = config.report.threshold;
      if (outcomes.some((o) => o.result.status === 'failed')) exitCode = EXIT_FAILED;
      else if (threshold !== undefined && outcomes.some((o) => o.result.score < threshold)) {
        exitCode = EXIT_BELOW_THRESHOLD;
      }
    });

  program
    .command('show')
    .description('Print a stored run')
    .argument('<runId>', 'Run id')
    .addOption(new Option('-f, --format <format>', 'Report format').choices(FORMATS))
    .option('--no-color', 'Disable ANSI colours in console output')
    .action(async (runId: string, _options: unknown, cmd: Command) => {
      const flags = cmd.optsWithGlobals<AuditFlags>();
      const config = loadConfig(io, flags);
      const store = new ReportStore({ dataDir: config.dataDir });
      const result = await store.load(runId);
      const rendered = new ReportGenerator().generate(config.report.format, result, runId, {
        noColor: flags.color === false,
      });
      io.stdout.write(terminated(rendered));
    });

  program
    .command('list')
    .description('List stored runs, oldest first')
    .option('--since <date>', 'Only runs saved at or after this date', parseDate)
    .option('--json', 'Print summaries as JSON')
    .action(async (_options: unknown, cmd: Command) => {
      const flags = cmd.optsWithGlobals<ConfigFlags & { since?: Date; json?: boolean }>();
      const config = loadConfig(io, flags);
      const runs = await new ReportStore({ dataDir: config.dataDir }).list({ since: flags.since });
      io.stdout.write(`${flags.json ? JSON.stringify(runs, null, 2) : formatSummaryTable(runs)}\n`);
    });

  program
    .command('compare')
    .description('Compare two stored runs')
    .argument('<previous>', 'Earlier run id')
    .argument('<current>', 'Later run id')
    .option('--json', 'Print the comparison as JSON')
    .action(async (previousId: string, currentId: string, _options: unknown, cmd: Command) => {
      const flags = cmd.optsWithGlobals<ConfigFlags & { json?: boolean }>();
      const store = new ReportStore({ dataDir: loadConfig(io, flags).dataDir });
      const cmp = compareResults(
        { runId: previousId, result: await store.load(previousId) },
        { runId: currentId, result: await store.load(currentId) },
      );
      io.stdout.write(`${flags.json ? JSON.stringify(cmp, null, 2) : formatComparison(cmp)}\n`);
    });

  program
    .command('sweep')
    .description('Archive stored runs and prune those past retention')
    .action(async (_options: unknown, cmd: Command) => {
      const config = loadConfig(io, cmd.optsWithGlobals<ConfigFlags>());
      const logger = io.logger ?? createLogger(config.logging, { stderr: true });
      const store = new ReportStore({ dataDir: config.dataDir, logger });
      const sweeper = new RetentionSweeper({
        store,
        archiveDir: config.archiveDir,
        retentionDays: config.retentionDays,
        logger,
      });

      const report = await sweeper.sweep();
      const lines = [
        report.bundle ? `Archived ${report.archived.length} run(s) into ${report.bundle}` : 'Nothing archived',
        `Pruned ${report.prunedRuns.length} run(s) and ${report.prunedBundles.length} bundle(s)`,
      ];
      io.stdout.write(`${lines.join('\n')}\n`);
      if (report.archiveError) {
        io.stderr.write(`Archiving failed: ${report.archiveError}\n`);
        exitCode = EXIT_FAILED;
      }
    });

  program
    .command('rules')
    .description('List web rules and PDF checks')
    .argument('[id]', 'Check id to describe')
    .option('--json', 'Print metadata as JSON')
    .action((id: string | undefined, options: { json?: boolean }) => {
      const catalogue: CheckMetadata[] = [...getRuleMetadata(), ...pdfCheckMetadata()];

      if (id === undefined) {
        io.stdout.write(
          options.json
            ? `${JSON.stringify(catalogue, null, 2)}\n`
            : catalogue.map((c) => `${c.id}\t${c.source}\t${c.description}\n`).join(''),
        );
        return;
      }

      const check = catalogue.find((c) => c.id === id);
      if (!check) throw new UsageError(`Unknown check: ${id}`);
      io.stdout.write(
        options.json
          ? `${JSON.stringify(check, null, 2)}\n`
          : [
              `${check.id} (${check.source})`,
              check.description,
              `Severities: ${check.severities.join(', ')}`,
              `WCAG: ${check.wcag.length > 0 ? check.wcag.join(', ') : 'n/a'}`,
              '',
            ].join('\n'),
      );
    });

  program
    .command('init')
    .description('Write a starter config file')
    .option('--path <file>', 'Where to write the config', '.accessauditrc.json')
    .option('--force', 'Overwrite an existing file')
    .action(async (options: { path: string; force?: boolean }) => {
      const outPath = path.resolve(io.cwd, options.path);
      if (existsSync(outPath) && !options.force) {
        throw new UsageError(`${outPath} already exists (use --force to overwrite)`);
      }
      await writeFile(outPath, `${JSON.stringify(initTemplate(), null, 2)}\n`, 'utf8');
      io.stdout.write(`Wrote ${outPath}\n`);
    });

  program
    .command('serve')
    .description('Serve submissions and reports over HTTP')
    .option('-p, --port <port>', 'Port to listen on', parsePort, 8787)
    .option('--host <host>', 'Interface to bind', '127.0.0.1')
    .action(async (_options: unknown, cmd: Command) => {
      const flags = cmd.optsWithGlobals<ConfigFlags & { port: number; host: string }>();
      const config = loadConfig(io, flags);
      const logger = io.logger ?? createLogger(config.logging, { stderr: true });
      const store = new ReportStore({ dataDir: config.dataDir, logger });
      const auditor = createAuditor(config, { launcher: io.launcher, logger, store });
      const sweeper = new RetentionSweeper({
        store,
        archiveDir: config.archiveDir,
        retentionDays: config.retentionDays,
        logger,
      });
      const server = new AuditServer({ auditor, store, logger, port: flags.port, hostname: flags.host });

      server.start();
      const stopSweeping = sweeper.schedule(DAY_MS);
      io.stdout.write(`Listening on ${server.url}\n`);

      try {
        await (io.untilStopped ?? waitForSignal)();
      } finally {
        stopSweeping();
        await server.stop();
        await auditor.close();
      }
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === 'commander.helpDisplayed' || error.code === 'commander.version' ? EXIT_OK : EXIT_FAILED;
    }
    io.stderr.write(`error: ${describeError(error)}\n`);
    return EXIT_FAILED;
  }
}

function loadConfig(io: CliIo, flags: AuditFlags): EngineConfig {
  const configPath = flags.config ? path.resolve(io.cwd, flags.config) : undefined;
  if (configPath && !existsSync(configPath)) throw new UsageError(`Config file not found: ${configPath}`);

  const config = loadEngineConfig({ configPath, cwd: io.cwd, env: io.env, overrides: flagsToOverrides(flags) });
  return resolveConfigPaths(config, io.cwd);
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return `invalid configuration: ${error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`;
  }
  if (error instanceof AuditError) return `${error.code}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

function startSpinner(io: CliIo, text: string): Ora | null {
  return io.spinner ? ora({ text, stream: process.stderr }).start() : null;
}

function setSpinnerText(spinner: Ora | null, text: string): void {
  if (spinner) spinner.text = text;
}

async function emit(io: CliIo, rendered: string, output: string | undefined): Promise<void> {
  if (!output) {
    io.stdout.write(terminated(rendered));
    return;
  }
  const outPath = path.resolve(io.cwd, output);
  await writeFile(outPath, terminated(rendered), 'utf8');
  io.stderr.write(`Wrote ${outPath}\n`);
}

function terminated(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

function parseScore(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 100) throw new InvalidArgumentError('Expected a score from 0 to 100.');
  return n;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65_535) throw new InvalidArgumentError('Expected a port number.');
  return n;
}

function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new InvalidArgumentError('Expected a date.');
  return date;
}
