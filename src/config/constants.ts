/**
 * Centralized configuration constants for the posture scanner.
 * Timeouts, limits and the fixed lookup lists live here; the lists are frozen
 * and injected into detectors through AuditConfiguration.
 */

import { FindingCategory } from '../types/enums';
import { SecurityHeaderRule } from '../types/config';

// =============================================================================
// TIMEOUT CONFIGURATION (in milliseconds)
// =============================================================================

export const TimeoutConfig = {
  // Primary page fetch
  PRIMARY_FETCH: 10000,

  // Each file-exposure probe
  EXPOSURE_PROBE: 5000,
} as const;

// =============================================================================
// SCANNER CONFIGURATION
// =============================================================================

export const ScannerConfig = {
  // Maximum simultaneous connections to the target
  MAX_CONCURRENT_REQUESTS: 5,

  // Request rate limit (requests per second)
  RATE_LIMIT_RPS: 10,

  // Token bucket burst
  RATE_LIMIT_BURST: 20,

  // Backoff after a 429 (ms)
  RATE_LIMIT_BACKOFF: 1000,

  // Redirect hops followed by the primary fetch
  MAX_REDIRECTS: 5,

  // Maximum response body size to analyze (bytes)
  MAX_RESPONSE_BODY_SIZE: 5 * 1024 * 1024,

  USER_AGENT: 'webposture/0.1 (+passive security posture audit)',
} as const;

// =============================================================================
// DETECTION THRESHOLDS
// =============================================================================

export const DetectionThresholds = {
  // Hard cap on Finding.evidence
  MAX_EVIDENCE_LENGTH: 100,

  // Characters of a secret value kept as evidence
  SECRET_PREVIEW_LENGTH: 20,

  // Characters of a present header value kept in observations
  HEADER_PREVIEW_LENGTH: 50,

  // Characters of an HTML comment kept as evidence
  COMMENT_EXCERPT_LENGTH: 100,

  // Inline scripts tolerated before a CSP advisory
  INLINE_SCRIPT_THRESHOLD: 10,

  // Distinct email addresses kept in the report
  MAX_EMAIL_ADDRESSES: 5,
} as const;

// =============================================================================
// FIXED LOOKUP LISTS
// =============================================================================

export const SECURITY_HEADERS: readonly SecurityHeaderRule[] = Object.freeze([
  { name: 'Strict-Transport-Security', purpose: 'HSTS - Forces HTTPS' },
  { name: 'X-Frame-Options', purpose: 'Prevents clickjacking' },
  { name: 'X-Content-Type-Options', purpose: 'Prevents MIME sniffing' },
  { name: 'Content-Security-Policy', purpose: 'Prevents XSS attacks' },
  { name: 'X-XSS-Protection', purpose: 'XSS filter (legacy)' },
  { name: 'Referrer-Policy', purpose: 'Controls referrer information' },
  { name: 'Permissions-Policy', purpose: 'Controls browser features' },
]);

export const SENSITIVE_PATHS: readonly string[] = Object.freeze([
  '.git/config',
  '.env',
  '.env.local',
  '.env.production',
  'config.php',
  'wp-config.php',
  '.htaccess',
  'phpinfo.php',
  'admin',
  'administrator',
  'wp-admin',
  'phpmyadmin',
  'backup.zip',
  'backup.sql',
  'database.sql',
  'robots.txt',
  '.DS_Store',
  'package.json',
  'composer.json',
  '.git/HEAD',
]);

export const DISCLOSURE_HEADERS: readonly string[] = Object.freeze(['Server', 'X-Powered-By']);

export const COMMENT_KEYWORDS: readonly string[] = Object.freeze([
  'password',
  'key',
  'secret',
  'token',
  'api',
]);

export const CSRF_KEYWORDS: readonly string[] = Object.freeze(['csrf', 'token']);

export interface RecommendationRule {
  text: string;
  /** Categories whose presence makes this item an action item */
  categories: readonly FindingCategory[];
}

export const RECOMMENDATION_CHECKLIST: readonly RecommendationRule[] = Object.freeze([
  {
    text: 'Enable all missing security headers (HSTS, CSP, X-Frame-Options)',
    categories: [FindingCategory.HEADER_MISSING],
  },
  {
    text: 'Implement Content Security Policy (CSP) to prevent XSS',
    categories: [FindingCategory.HEADER_MISSING, FindingCategory.INLINE_SCRIPT_OVERUSE],
  },
  { text: 'Add CSRF tokens to all forms', categories: [FindingCategory.NO_CSRF_TOKEN] },
  { text: 'Use HTTPS everywhere (enable HSTS)', categories: [FindingCategory.WEAK_TLS] },
  {
    text: 'Set Secure, HttpOnly, and SameSite flags on cookies',
    categories: [FindingCategory.COOKIE_FLAG],
  },
  {
    text: 'Remove or protect sensitive files (.git, .env, backups)',
    categories: [FindingCategory.EXPOSED_FILE],
  },
  { text: 'Hide server version information', categories: [FindingCategory.INFO_DISCLOSURE] },
  { text: 'Implement rate limiting on forms and API endpoints', categories: [] },
  { text: 'Add input validation and sanitization', categories: [] },
  {
    text: 'Regular security audits and penetration testing',
    categories: [FindingCategory.SENSITIVE_COMMENT, FindingCategory.TARGET_UNREACHABLE],
  },
  {
    text: 'Keep all dependencies and frameworks updated',
    categories: [FindingCategory.INFO_DISCLOSURE],
  },
  {
    text: 'Implement proper authentication and authorization',
    categories: [FindingCategory.EXPOSED_FILE],
  },
  {
    text: 'Use secure password hashing (bcrypt, Argon2)',
    categories: [FindingCategory.EXPOSED_SECRET],
  },
  { text: 'Enable audit logging for security events', categories: [] },
  { text: 'Regular backup and disaster recovery plan', categories: [] },
]);
