import { z } from 'zod';
import { LogLevel, ReportFormat } from '../../types/enums';
import { AuditConfiguration, AuditConfigurationOverrides } from '../../types/config';

const positiveInt = z.number().int().positive();

const RateLimitSchema = z
  .object({
    requestsPerSecond: z.number().positive(),
    burstSize: positiveInt.optional(),
    initialBackoffMs: positiveInt.optional(),
    enabled: z.boolean().optional(),
  })
  .strict();

const ReportingSchema = z
  .object({
    format: z.nativeEnum(ReportFormat),
    outputFile: z.string().min(1).optional(),
  })
  .strict();

export const AuditConfigurationSchema = z
  .object({
    timeoutMs: positiveInt,
    probeTimeoutMs: positiveInt,
    maxConcurrency: positiveInt.max(50),
    maxRedirects: z.number().int().min(0).max(20),
    userAgent: z.string().min(1),
    rateLimit: RateLimitSchema,
    securityHeaders: z.array(z.object({ name: z.string().min(1), purpose: z.string() }).strict()),
    sensitivePaths: z.array(z.string().min(1)),
    disclosureHeaders: z.array(z.string().min(1)),
    commentKeywords: z.array(z.string().min(1)),
    csrfKeywords: z.array(z.string().min(1)),
    inlineScriptThreshold: z.number().int().min(0),
    maxEmailAddresses: z.number().int().min(0),
    logLevel: z.nativeEnum(LogLevel),
    reporting: ReportingSchema,
  })
  .strict();

export const AuditConfigurationOverridesSchema = AuditConfigurationSchema.omit({
  rateLimit: true,
  reporting: true,
})
  .partial()
  .extend({
    rateLimit: RateLimitSchema.partial().optional(),
    reporting: ReportingSchema.partial().optional(),
  })
  .strict();

export type ValidationResult<T> = { valid: true; value: T; errors: [] } | { valid: false; errors: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validates a complete configuration
 */
export function validateAuditConfiguration(config: unknown): ValidationResult<AuditConfiguration> {
  const parsed = AuditConfigurationSchema.safeParse(config);
  return parsed.success
    ? { valid: true, value: parsed.data, errors: [] }
    : { valid: false, errors: formatIssues(parsed.error) };
}

/**
 * Validates a partial configuration (config file, CLI flags)
 */
export function validateConfigurationOverrides(overrides: unknown): ValidationResult<AuditConfigurationOverrides> {
  const parsed = AuditConfigurationOverridesSchema.safeParse(overrides);
  return parsed.success
    ? { valid: true, value: parsed.data, errors: [] }
    : { valid: false, errors: formatIssues(parsed.error) };
}
