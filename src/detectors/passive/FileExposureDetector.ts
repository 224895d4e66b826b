import { IProbeClient } from '../../core/interfaces/IProbeClient';
import { cancelledProbe, isCancelled } from '../../core/network/probe-results';
import { AuditPhase, FindingCategory, FindingSeverity, LogLevel } from '../../types/enums';
import { Finding } from '../../types/finding';
import { ProbeResult } from '../../types/probe';
import { FileExposureSummary } from '../../types/report';
import { Target } from '../../types/target';
import { ScannerConfig, SENSITIVE_PATHS, TimeoutConfig } from '../../config/constants';
import { createFinding } from '../../utils/findings/createFinding';
import { executeParallel } from '../../utils/parallel/ParallelExecutor';
import { raceAbort } from '../../utils/async';
import { Logger } from '../../utils/logger/Logger';

export interface FileExposureOptions {
  paths?: readonly string[];
  /** Timeout per probe (ms) */
  timeoutMs?: number;
  /** Simultaneous probes */
  concurrency?: number;
  logger?: Logger;
}

export interface PathProbeOutcome {
  path: string;
  url: string;
  exposed: boolean;
  result: ProbeResult;
}

export interface FileExposureResult {
  /** ExposedFile findings, in path-list order */
  findings: Finding[];
  summary: FileExposureSummary;
  /** One entry per probed path, in path-list order */
  outcomes: PathProbeOutcome[];
}

/**
 * A path counts as exposed only on a 200 that was not reached through a
 * redirect. Failures and every other status count as safe.
 */
export function isExposed(result: ProbeResult): boolean {
  return result.ok && result.status === 200 && !result.redirected;
}

/**
 * FileExposureDetector - Probes a fixed list of sensitive paths on the target.
 *
 * Probes never follow redirects: a redirect to a login page must not read as
 * a 200. Only the status matters, so bodies are never downloaded. Probes run
 * with bounded concurrency, but findings keep the path-list order.
 */
export class FileExposureDetector {
  public readonly name = 'file-exposure';
  public readonly phase = AuditPhase.FILE_EXPOSURE;
  private readonly client: IProbeClient;
  private readonly paths: readonly string[];
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(client: IProbeClient, options: FileExposureOptions = {}) {
    this.client = client;
    this.paths = options.paths ?? SENSITIVE_PATHS;
    this.timeoutMs = options.timeoutMs ?? TimeoutConfig.EXPOSURE_PROBE;
    this.concurrency = options.concurrency ?? ScannerConfig.MAX_CONCURRENT_REQUESTS;
    this.logger = options.logger ?? new Logger(LogLevel.INFO, 'FileExposureDetector');
  }

  public getPaths(): readonly string[] {
    return this.paths;
  }

  /**
   * Probes every path. Once `signal` aborts, paths not yet started and probes
   * cut short are left out of the summary, so exposed + safe == checked
   * still holds.
   */
  public async probe(target: Target, signal?: AbortSignal): Promise<FileExposureResult> {
    this.logger.info(`Probing ${this.paths.length} sensitive paths on ${target.origin}`);

    const tasks = this.paths.map((path) => async (): Promise<PathProbeOutcome> => {
      const url = new URL(path, target.url).href;
      const result = await raceAbort(
        this.client.fetch(url, { timeoutMs: this.timeoutMs, followRedirects: false, readBody: false, signal }),
        signal,
        () => cancelledProbe(url)
      );
      return { path, url, exposed: isExposed(result), result };
    });

    const execution = await executeParallel(tasks, {
      concurrency: this.concurrency,
      signal,
      logger: this.logger.child('pool'),
    });

    const outcomes: PathProbeOutcome[] = [];
    for (const outcome of execution.results) {
      if (outcome) outcomes.push(outcome);
    }

    const findings = outcomes
      .filter((outcome) => outcome.exposed)
      .map((outcome) =>
        createFinding(this.phase, FindingCategory.EXPOSED_FILE, FindingSeverity.CRITICAL, outcome.url, outcome.path)
      );

    const checked = outcomes.filter((outcome) => !isCancelled(outcome.result)).length;
    const summary: FileExposureSummary = { checked, exposed: findings.length };

    if (execution.skippedCount > 0) {
      this.logger.warn(`File exposure probing cancelled, ${execution.skippedCount} paths not probed`);
    }
    this.logger.info(`${summary.checked - summary.exposed}/${summary.checked} paths properly protected`);

    return { findings, summary, outcomes };
  }
}
