/**
 * webposture - passive web security posture audits
 */

import { AuditEngine } from './core/engine/AuditEngine';
import { defaultAuditConfiguration } from './core/config/ConfigurationManager';
import { HttpProbeClient } from './core/network/HttpProbeClient';
import { RateLimiter } from './core/network/RateLimiter';
import { parseTarget } from './core/target/parseTarget';
import { IProbeClient } from './core/interfaces/IProbeClient';
import { AuditConfiguration } from './types/config';
import { AuditReport } from './types/report';
import { Logger } from './utils/logger/Logger';

export * from './types';
export * from './core/errors';
export * from './core/interfaces';
export { AuditEngine, orderByPhase } from './core/engine/AuditEngine';
export type { AuditEngineOptions, AuditRunOptions, StateChangedEvent } from './core/engine/AuditEngine';
export { ConfigurationManager, defaultAuditConfiguration } from './core/config/ConfigurationManager';
export { HttpProbeClient, classifyProbeError } from './core/network/HttpProbeClient';
export { HeaderMap } from './core/network/HeaderMap';
export { RateLimiter } from './core/network/RateLimiter';
export { parseTarget } from './core/target/parseTarget';
export * from './detectors/passive';
export * from './reporting';
export { Logger, parseLogLevel } from './utils/logger/Logger';

export interface RunAuditOptions {
  config?: AuditConfiguration;
  signal?: AbortSignal;
  logger?: Logger;
  /** Replaces the HTTP client, e.g. with a stand-in in tests */
  client?: IProbeClient;
}

/**
 * Audits one target and resolves with its report.
 * Rejects with MalformedTargetError before any request when the target
 * cannot be parsed; probe failures never reject.
 */
export async function runAudit(input: string, options: RunAuditOptions = {}): Promise<AuditReport> {
  const target = parseTarget(input);
  const config = options.config ?? defaultAuditConfiguration();
  const logger = options.logger ?? new Logger(config.logLevel, 'webposture');

  const client =
    options.client ??
    new HttpProbeClient({
      maxRedirects: config.maxRedirects,
      userAgent: config.userAgent,
      rateLimiter: new RateLimiter(config.rateLimit, logger.child('rate-limit')),
      logger: logger.child('http'),
    });

  const engine = new AuditEngine({ client, config, logger: logger.child('engine') });
  return engine.run(target, { signal: options.signal });
}
