import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { IProbeClient } from '../interfaces/IProbeClient';
import { IPassiveDetector } from '../interfaces/IPassiveDetector';
import { defaultAuditConfiguration } from '../config/ConfigurationManager';
import { cancelledProbe } from '../network/probe-results';
import {
  CookieSecurityDetector,
  FileExposureDetector,
  FileExposureResult,
  HeaderSecurityDetector,
  HtmlAnalysis,
  HtmlContentDetector,
  InformationDisclosureDetector,
  InsecureTransmissionDetector,
} from '../../detectors/passive';
import { RecommendationEngine } from '../../reporting/RecommendationEngine';
import { AUDIT_PHASE_ORDER, AuditState } from '../../types/enums';
import { AuditConfiguration } from '../../types/config';
import { Finding } from '../../types/finding';
import { ProbeResult, ProbeSuccess } from '../../types/probe';
import { AuditObservations, AuditReport, PrimaryProbeObservation } from '../../types/report';
import { Target } from '../../types/target';
import { summarizeFindings } from '../../utils/findings/createFinding';
import { raceAbort } from '../../utils/async';
import { Logger } from '../../utils/logger/Logger';

export interface AuditEngineOptions {
  client: IProbeClient;
  config?: AuditConfiguration;
  logger?: Logger;
  recommendationEngine?: RecommendationEngine;
}

export interface AuditRunOptions {
  /** Aborting yields a partial report instead of an error */
  signal?: AbortSignal;
}

export interface StateChangedEvent {
  scanId: string;
  from: AuditState;
  to: AuditState;
}

/**
 * Events: 'auditStarted', 'stateChanged', 'auditCompleted'
 */
export class AuditEngine extends EventEmitter {
  private readonly client: IProbeClient;
  private readonly config: AuditConfiguration;
  private readonly logger: Logger;
  private readonly recommendations: RecommendationEngine;
  private readonly transmission: InsecureTransmissionDetector;
  private readonly fileExposure: FileExposureDetector;
  private readonly htmlContent: HtmlContentDetector;
  private readonly headerSecurity: HeaderSecurityDetector;
  /** Detectors over the primary response, in report order */
  private readonly responseDetectors: IPassiveDetector[];
  private state: AuditState = AuditState.INIT;
  private scanId: string | null = null;

  constructor(options: AuditEngineOptions) {
    super();
    this.client = options.client;
    this.config = options.config ?? defaultAuditConfiguration();
    this.logger = options.logger ?? new Logger(this.config.logLevel, 'AuditEngine');
    this.recommendations = options.recommendationEngine ?? new RecommendationEngine();

    this.transmission = new InsecureTransmissionDetector(this.logger.child('tls'));
    this.headerSecurity = new HeaderSecurityDetector(this.config.securityHeaders, this.logger.child('headers'));
    this.fileExposure = new FileExposureDetector(this.client, {
      paths: this.config.sensitivePaths,
      timeoutMs: this.config.probeTimeoutMs,
      concurrency: this.config.maxConcurrency,
      logger: this.logger.child('files'),
    });
    this.htmlContent = new HtmlContentDetector({
      commentKeywords: this.config.commentKeywords,
      csrfKeywords: this.config.csrfKeywords,
      inlineScriptThreshold: this.config.inlineScriptThreshold,
      maxEmailAddresses: this.config.maxEmailAddresses,
      logger: this.logger.child('html'),
    });
    this.responseDetectors = [
      this.headerSecurity,
      new CookieSecurityDetector(this.logger.child('cookies')),
      new InformationDisclosureDetector(this.config.disclosureHeaders, this.logger.child('disclosure')),
    ];
  }

  public getState(): AuditState {
    return this.state;
  }

  public getScanId(): string | null {
    return this.scanId;
  }

  /**
   * Runs one audit. Never rejects because a probe failed; a cancelled run
   * resolves with a partial report.
   */
  public async run(target: Target, options: AuditRunOptions = {}): Promise<AuditReport> {
    if (this.state === AuditState.PROBING || this.state === AuditState.ANALYZING) {
      throw new Error('An audit is already running on this engine');
    }

    const { signal } = options;
    const scanId = uuidv4();
    const startTime = Date.now();
    this.scanId = scanId;
    this.state = AuditState.INIT;

    this.logger.info(`Starting security audit for: ${target.url}`);
    this.emit('auditStarted', { scanId, target });

    // 1. Primary fetch; file exposure only needs the target, so it starts now
    this.transition(AuditState.PROBING);
    const exposurePromise = this.probeFiles(target, signal);
    const primary = await raceAbort(
      this.fetchPrimary(target, signal),
      signal,
      () => cancelledProbe(target.url)
    );

    // 2. Analysis
    this.transition(AuditState.ANALYZING);
    const findings: Finding[] = [...this.transmission.detect(target, primary)];
    const observations = emptyObservations(primary);

    if (primary.ok) {
      observations.presentHeaders = this.headerSecurity.presentHeaders(primary);
      for (const detector of this.responseDetectors) {
        findings.push(...this.runDetector(detector, primary));
      }

      const html = this.analyzeHtml(primary);
      findings.push(...html.findings);
      observations.commentCount = html.commentCount;
      observations.inlineScriptCount = html.inlineScriptCount;
      observations.externalScripts = html.externalScripts;
      observations.formCount = html.formCount;
      observations.emailAddresses = html.emailAddresses;
    } else {
      this.logger.warn(`Primary fetch failed (${primary.kind}): ${primary.message}`);
    }

    const exposure = await exposurePromise;
    findings.push(...exposure.findings);

    // 3. Report
    const cancelled = signal?.aborted ?? false;
    const finalState = cancelled ? AuditState.CANCELLED : primary.ok ? AuditState.DONE : AuditState.FAILED;
    const ordered = orderByPhase(findings);

    const report: AuditReport = Object.freeze({
      scanId,
      target,
      timestamp: new Date(startTime).toISOString(),
      durationMs: Date.now() - startTime,
      state: finalState,
      partial: cancelled,
      findings: Object.freeze(ordered),
      summary: summarizeFindings(ordered),
      fileExposureSummary: exposure.summary,
      observations,
      recommendations: Object.freeze(this.recommendations.generate(ordered)),
      actionItems: Object.freeze(this.recommendations.actionItems(ordered)),
    });

    this.transition(finalState);
    this.logger.info(
      `Audit ${finalState}: ${ordered.length} findings, ` +
        `${exposure.summary.exposed}/${exposure.summary.checked} sensitive paths exposed`
    );
    this.emit('auditCompleted', report);

    return report;
  }

  private async fetchPrimary(target: Target, signal?: AbortSignal): Promise<ProbeResult> {
    return this.client.fetch(target.url, {
      timeoutMs: this.config.timeoutMs,
      followRedirects: true,
      signal,
    });
  }

  /**
   * File exposure never fails the audit; an unexpected error leaves an
   * empty summary
   */
  private async probeFiles(target: Target, signal?: AbortSignal): Promise<FileExposureResult> {
    try {
      return await this.fileExposure.probe(target, signal);
    } catch (error) {
      this.logger.error('File exposure probing failed:', error);
      return { findings: [], summary: { checked: 0, exposed: 0 }, outcomes: [] };
    }
  }

  private runDetector(detector: IPassiveDetector, response: ProbeSuccess): Finding[] {
    try {
      return detector.detect(response);
    } catch (error) {
      this.logger.error(`Detector ${detector.name} failed:`, error);
      return [];
    }
  }

  private analyzeHtml(response: ProbeSuccess): HtmlAnalysis {
    try {
      return this.htmlContent.analyze(response.body);
    } catch (error) {
      this.logger.error(`Detector ${this.htmlContent.name} failed:`, error);
      return {
        findings: [],
        commentCount: 0,
        inlineScriptCount: 0,
        externalScripts: [],
        formCount: 0,
        emailAddresses: [],
      };
    }
  }

  private transition(to: AuditState): void {
    const from = this.state;
    this.state = to;
    this.logger.debug(`State ${from} -> ${to}`);
    const event: StateChangedEvent = { scanId: this.scanId ?? '', from, to };
    this.emit('stateChanged', event);
  }
}

/**
 * Stable sort by report phase; emission order inside a phase is kept
 */
export function orderByPhase(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) => AUDIT_PHASE_ORDER.indexOf(a.phase) - AUDIT_PHASE_ORDER.indexOf(b.phase)
  );
}

function emptyObservations(primary: ProbeResult): AuditObservations {
  const primaryProbe: PrimaryProbeObservation = primary.ok
    ? { ok: true, status: primary.status, finalUrl: primary.finalUrl }
    : { ok: false, failureKind: primary.kind, message: primary.message };

  return {
    primaryProbe,
    presentHeaders: [],
    commentCount: 0,
    inlineScriptCount: 0,
    externalScripts: [],
    formCount: 0,
    emailAddresses: [],
  };
}
