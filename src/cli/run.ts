import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'node:util';
import { ConfigurationManager } from '../core/config/ConfigurationManager';
import { ConfigurationError, MalformedTargetError } from '../core/errors';
import { IProbeClient } from '../core/interfaces/IProbeClient';
import { createReporter } from '../reporting';
import { AuditConfiguration } from '../types/config';
import { FindingSeverity, LogLevel } from '../types/enums';
import { Logger, LogSink } from '../utils/logger/Logger';
import { runAudit } from '../index';

export const EXIT_OK = 0;
export const EXIT_CRITICAL_FINDINGS = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: webposture <target> [options]

Options:
  --format console|json   Report format (default: console)
  --output <file>         Write the report to a file instead of stdout
  --config <file>         JSON file with configuration overrides
  --timeout <ms>          Primary page timeout
  --probe-timeout <ms>    Timeout per sensitive-path probe
  --concurrency <n>       Simultaneous sensitive-path probes
  --max-duration <ms>     Abort after this long and print a partial report
  --log-level <level>     debug | info | warn | error | silent
  -h, --help              Show this help`;

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  /** Directory .env, --config and --output are resolved against */
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: LogSink;
  client?: IProbeClient;
  /** Aborts the audit from outside, e.g. on SIGINT */
  signal?: AbortSignal;
}

/**
 * Runs the command line and resolves with the process exit code
 */
export async function runCli(argv: string[], context: CliContext = {}): Promise<number> {
  const cwd = context.cwd ?? process.cwd();
  const stdout = context.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const stderr = context.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    stderr(error instanceof Error ? error.message : String(error));
    stderr(USAGE);
    return EXIT_USAGE;
  }

  if (parsed.values.help) {
    stdout(USAGE);
    return EXIT_OK;
  }

  const [input, ...extra] = parsed.positionals;
  if (input === undefined || extra.length > 0) {
    stderr(input === undefined ? 'Missing target' : `Unexpected arguments: ${extra.join(' ')}`);
    stderr(USAGE);
    return EXIT_USAGE;
  }

  const bootLogger = new Logger(LogLevel.WARN, 'webposture', stderr);
  const manager = new ConfigurationManager(bootLogger.child('config'));

  let config: AuditConfiguration;
  let maxDurationMs: number | undefined;
  try {
    const envFile = ConfigurationManager.readEnvFile(path.join(cwd, '.env'));
    manager.loadFromEnv({ ...envFile, ...(context.env ?? process.env) });
    if (parsed.values.config) {
      manager.loadFromFile(path.resolve(cwd, parsed.values.config));
    }
    config = manager.loadFromObject(flagOverrides(parsed.values));
    const rawMaxDuration = parsed.values['max-duration'];
    if (rawMaxDuration !== undefined) {
      maxDurationMs = readPositiveNumber('--max-duration', rawMaxDuration);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stderr(`Configuration error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const logger = new Logger(config.logLevel, 'webposture', stderr);
  const controller = new AbortController();
  const onExternalAbort = (): void => controller.abort();
  context.signal?.addEventListener('abort', onExternalAbort, { once: true });
  if (context.signal?.aborted) controller.abort();

  const deadline =
    maxDurationMs !== undefined
      ? setTimeout(() => {
          logger.warn(`Maximum duration of ${maxDurationMs}ms reached, stopping audit`);
          controller.abort();
        }, maxDurationMs)
      : undefined;

  try {
    const report = await runAudit(input, {
      config,
      signal: controller.signal,
      logger,
      client: context.client,
    });

    const rendered = createReporter(config.reporting.format).render(report);
    if (config.reporting.outputFile) {
      const outputPath = path.resolve(cwd, config.reporting.outputFile);
      fs.writeFileSync(outputPath, `${rendered}\n`, 'utf-8');
      logger.info(`Report written to ${outputPath}`);
    } else {
      stdout(rendered);
    }

    return report.summary[FindingSeverity.CRITICAL] > 0 ? EXIT_CRITICAL_FINDINGS : EXIT_OK;
  } catch (error) {
    if (error instanceof MalformedTargetError) {
      stderr(error.message);
      return EXIT_USAGE;
    }
    throw error;
  } finally {
    if (deadline) clearTimeout(deadline);
    context.signal?.removeEventListener('abort', onExternalAbort);
  }
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      format: { type: 'string' },
      output: { type: 'string', short: 'o' },
      config: { type: 'string', short: 'c' },
      timeout: { type: 'string' },
      'probe-timeout': { type: 'string' },
      concurrency: { type: 'string' },
      'max-duration': { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

type ParsedFlags = ReturnType<typeof parseCommandLine>['values'];

/**
 * Flags are handed to the same validation as a config file, so a bad
 * --format or --log-level is a ConfigurationError like any other
 */
function flagOverrides(flags: ParsedFlags): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const reporting: Record<string, unknown> = {};

  if (flags.timeout !== undefined) overrides['timeoutMs'] = readPositiveNumber('--timeout', flags.timeout);
  if (flags['probe-timeout'] !== undefined) {
    overrides['probeTimeoutMs'] = readPositiveNumber('--probe-timeout', flags['probe-timeout']);
  }
  if (flags.concurrency !== undefined) {
    overrides['maxConcurrency'] = readPositiveNumber('--concurrency', flags.concurrency);
  }
  if (flags['log-level'] !== undefined) overrides['logLevel'] = flags['log-level'].toLowerCase();
  if (flags.format !== undefined) reporting['format'] = flags.format.toLowerCase();
  if (flags.output !== undefined) reporting['outputFile'] = flags.output;
  if (Object.keys(reporting).length > 0) overrides['reporting'] = reporting;

  return overrides;
}

function readPositiveNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${flag} must be a positive number`, [`${flag}=${raw}`]);
  }
  return value;
}
