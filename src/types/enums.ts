/**
 * Log levels, ordered by verbosity
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Finding categories produced by the passive detectors
 */
export enum FindingCategory {
  HEADER_MISSING = 'HeaderMissing',
  COOKIE_FLAG = 'CookieFlag',
  EXPOSED_FILE = 'ExposedFile',
  SENSITIVE_COMMENT = 'SensitiveComment',
  INLINE_SCRIPT_OVERUSE = 'InlineScriptOveruse',
  NO_CSRF_TOKEN = 'NoCsrfToken',
  EXPOSED_SECRET = 'ExposedSecret',
  WEAK_TLS = 'WeakTls',
  TARGET_UNREACHABLE = 'TargetUnreachable',
  INFO_DISCLOSURE = 'InfoDisclosure',
}

export enum FindingSeverity {
  INFO = 'Info',
  WARNING = 'Warning',
  CRITICAL = 'Critical',
}

/**
 * Audit phases. Declaration order is the order findings appear in a report.
 */
export enum AuditPhase {
  TLS = 'tls',
  HEADERS = 'headers',
  FILE_EXPOSURE = 'file-exposure',
  HTML = 'html',
  DISCLOSURE = 'disclosure',
}

export const AUDIT_PHASE_ORDER: readonly AuditPhase[] = [
  AuditPhase.TLS,
  AuditPhase.HEADERS,
  AuditPhase.FILE_EXPOSURE,
  AuditPhase.HTML,
  AuditPhase.DISCLOSURE,
];

/**
 * Audit lifecycle
 */
export enum AuditState {
  INIT = 'init',
  PROBING = 'probing',
  ANALYZING = 'analyzing',
  DONE = 'done',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * Why a probe produced no HTTP response
 */
export enum ProbeFailureKind {
  CONNECTION_ERROR = 'ConnectionError',
  TIMEOUT = 'Timeout',
  TLS_ERROR = 'TlsError',
  TOO_MANY_REDIRECTS = 'TooManyRedirects',
  CANCELLED = 'Cancelled',
}

export enum ReportFormat {
  CONSOLE = 'console',
  JSON = 'json',
}
