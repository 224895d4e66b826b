import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { AuditConfiguration, AuditConfigurationOverrides } from '../../types/config';
import { LogLevel, ReportFormat } from '../../types/enums';
import { Logger, parseLogLevel } from '../../utils/logger/Logger';
import { ConfigurationError } from '../errors';
import {
  COMMENT_KEYWORDS,
  CSRF_KEYWORDS,
  DetectionThresholds,
  DISCLOSURE_HEADERS,
  ScannerConfig,
  SECURITY_HEADERS,
  SENSITIVE_PATHS,
  TimeoutConfig,
} from '../../config/constants';
import {
  validateAuditConfiguration,
  validateConfigurationOverrides,
} from '../../utils/validators/config-validator';

/**
 * Built-in configuration. Lists are copied so callers can never mutate the
 * frozen constants through a config object.
 */
export function defaultAuditConfiguration(): AuditConfiguration {
  return {
    timeoutMs: TimeoutConfig.PRIMARY_FETCH,
    probeTimeoutMs: TimeoutConfig.EXPOSURE_PROBE,
    maxConcurrency: ScannerConfig.MAX_CONCURRENT_REQUESTS,
    maxRedirects: ScannerConfig.MAX_REDIRECTS,
    userAgent: ScannerConfig.USER_AGENT,
    rateLimit: {
      requestsPerSecond: ScannerConfig.RATE_LIMIT_RPS,
      burstSize: ScannerConfig.RATE_LIMIT_BURST,
      initialBackoffMs: ScannerConfig.RATE_LIMIT_BACKOFF,
      enabled: true,
    },
    securityHeaders: SECURITY_HEADERS.map((rule) => ({ ...rule })),
    sensitivePaths: [...SENSITIVE_PATHS],
    disclosureHeaders: [...DISCLOSURE_HEADERS],
    commentKeywords: [...COMMENT_KEYWORDS],
    csrfKeywords: [...CSRF_KEYWORDS],
    inlineScriptThreshold: DetectionThresholds.INLINE_SCRIPT_THRESHOLD,
    maxEmailAddresses: DetectionThresholds.MAX_EMAIL_ADDRESSES,
    logLevel: LogLevel.INFO,
    reporting: {
      format: ReportFormat.CONSOLE,
    },
  };
}

/**
 * ConfigurationManager - Builds the audit configuration in layers:
 * defaults, then environment (.env via dotenv), then a JSON file, then
 * explicit overrides. Every layer is validated before it is applied.
 */
export class ConfigurationManager {
  private logger: Logger;
  private currentConfig: AuditConfiguration;

  constructor(logger?: Logger) {
    this.logger = logger ?? new Logger(LogLevel.INFO, 'ConfigurationManager');
    this.currentConfig = defaultAuditConfiguration();
  }

  /**
   * Reads a dotenv file without touching process.env.
   * Returns an empty object when the file does not exist.
   */
  public static readEnvFile(filePath: string): Record<string, string> {
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      return {};
    }
    return dotenv.parse(fs.readFileSync(absolutePath, 'utf-8'));
  }

  /**
   * Applies WEBPOSTURE_* / RATE_LIMIT_* / LOG_LEVEL variables
   */
  public loadFromEnv(env: NodeJS.ProcessEnv = process.env): AuditConfiguration {
    const overrides: AuditConfigurationOverrides = {};
    const rateLimit: NonNullable<AuditConfigurationOverrides['rateLimit']> = {};

    const timeoutMs = readNumber(env, 'WEBPOSTURE_TIMEOUT_MS');
    if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs;

    const probeTimeoutMs = readNumber(env, 'WEBPOSTURE_PROBE_TIMEOUT_MS');
    if (probeTimeoutMs !== undefined) overrides.probeTimeoutMs = probeTimeoutMs;

    const maxConcurrency = readNumber(env, 'WEBPOSTURE_MAX_CONCURRENCY');
    if (maxConcurrency !== undefined) overrides.maxConcurrency = maxConcurrency;

    const maxRedirects = readNumber(env, 'WEBPOSTURE_MAX_REDIRECTS');
    if (maxRedirects !== undefined) overrides.maxRedirects = maxRedirects;

    const userAgent = env['WEBPOSTURE_USER_AGENT']?.trim();
    if (userAgent) overrides.userAgent = userAgent;

    const rps = readNumber(env, 'RATE_LIMIT_RPS');
    if (rps !== undefined) rateLimit.requestsPerSecond = rps;

    const burst = readNumber(env, 'RATE_LIMIT_BURST');
    if (burst !== undefined) rateLimit.burstSize = burst;

    if (Object.keys(rateLimit).length > 0) overrides.rateLimit = rateLimit;

    if (env['LOG_LEVEL']) overrides.logLevel = parseLogLevel(env['LOG_LEVEL'], this.currentConfig.logLevel);

    if (Object.keys(overrides).length > 0) {
      this.logger.debug(`Environment overrides: ${Object.keys(overrides).join(', ')}`);
    }
    return this.mergeConfig(overrides);
  }

  /**
   * Applies a JSON file holding a partial configuration
   */
  public loadFromFile(filePath: string): AuditConfiguration {
    this.logger.info(`Loading configuration from: ${filePath}`);

    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigurationError(`Configuration file not found: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Configuration file is not valid JSON: ${absolutePath}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    return this.loadFromObject(parsed);
  }

  /**
   * Applies a partial configuration object
   */
  public loadFromObject(overrides: unknown): AuditConfiguration {
    const validation = validateConfigurationOverrides(overrides);
    if (!validation.valid) {
      throw new ConfigurationError('Invalid configuration', validation.errors);
    }
    return this.mergeConfig(validation.value);
  }

  /**
   * Merge the current configuration with new options
   */
  public mergeConfig(overrides: AuditConfigurationOverrides): AuditConfiguration {
    const merged: AuditConfiguration = {
      ...this.currentConfig,
      ...overrides,
      rateLimit: { ...this.currentConfig.rateLimit, ...overrides.rateLimit },
      reporting: { ...this.currentConfig.reporting, ...overrides.reporting },
    };

    const validation = validateAuditConfiguration(merged);
    if (!validation.valid) {
      throw new ConfigurationError('Invalid merged configuration', validation.errors);
    }

    this.currentConfig = validation.value;
    return this.getConfig();
  }

  public getConfig(): AuditConfiguration {
    return structuredClone(this.currentConfig);
  }

  /**
   * Back to built-in defaults
   */
  public reset(): void {
    this.currentConfig = defaultAuditConfiguration();
  }

  public exportAsJson(): string {
    return JSON.stringify(this.currentConfig, null, 2);
  }

  public setLogLevel(level: LogLevel): void {
    this.logger.setLevel(level);
  }
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} is not a number`, [`${name}=${raw}`]);
  }
  return parsed;
}

