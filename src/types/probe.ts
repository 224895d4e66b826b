import { HeaderMap } from '../core/network/HeaderMap';
import { ProbeFailureKind } from './enums';

export type TargetScheme = 'http' | 'https';

/**
 * A probe that got an HTTP response back, whatever its status
 */
export interface ProbeSuccess {
  ok: true;
  /** URL that was requested */
  url: string;
  status: number;
  headers: HeaderMap;
  body: string;
  /** URL of the response after redirects */
  finalUrl: string;
  scheme: TargetScheme;
  redirected: boolean;
  durationMs: number;
}

/**
 * A probe that got no HTTP response
 */
export interface ProbeFailure {
  ok: false;
  url: string;
  kind: ProbeFailureKind;
  message: string;
  durationMs: number;
}

export type ProbeResult = ProbeSuccess | ProbeFailure;

export interface ProbeOptions {
  /** Deadline for the whole request, body included, in ms; must be > 0 */
  timeoutMs: number;
  followRedirects: boolean;
  /** When false only the status line and headers are read; body is '' */
  readBody?: boolean;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}
