import { Readable } from 'stream';
import axios, { AxiosHeaders, AxiosInstance, AxiosResponse } from 'axios';
import { IProbeClient } from '../interfaces/IProbeClient';
import { ProbeConfigurationError } from '../errors';
import { HeaderMap, RawHeaders } from './HeaderMap';
import { RateLimiter } from './RateLimiter';
import { Logger } from '../../utils/logger/Logger';
import { LogLevel, ProbeFailureKind } from '../../types/enums';
import { ProbeFailure, ProbeOptions, ProbeResult, ProbeSuccess, TargetScheme } from '../../types/probe';
import { ScannerConfig } from '../../config/constants';
import { startDeadline } from '../../utils/async';

export interface HttpProbeClientOptions {
  /** Redirect hops followed when a probe asks for it */
  maxRedirects?: number;
  userAgent?: string;
  /** Bodies are cut at this many bytes */
  maxBodyBytes?: number;
  rateLimiter?: RateLimiter;
  logger?: Logger;
  /** Axios instance to send through; a fresh one by default */
  http?: AxiosInstance;
}

const TLS_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'HOSTNAME_MISMATCH',
  'EPROTO',
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT']);

/**
 * Maps an axios / Node error to a probe failure kind
 */
export function classifyProbeError(error: unknown): ProbeFailureKind {
  if (axios.isCancel(error)) {
    return ProbeFailureKind.CANCELLED;
  }

  const code = errorCode(error);

  if (code === 'ERR_CANCELED' || code === 'ABORT_ERR') {
    return ProbeFailureKind.CANCELLED;
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return ProbeFailureKind.TIMEOUT;
  }
  if (code === 'ERR_FR_TOO_MANY_REDIRECTS') {
    return ProbeFailureKind.TOO_MANY_REDIRECTS;
  }
  if (code && (TLS_ERROR_CODES.has(code) || /^ERR_(SSL|TLS)_/.test(code))) {
    return ProbeFailureKind.TLS_ERROR;
  }
  if (error instanceof Error && /\b(ssl|tls|certificate)\b/i.test(error.message)) {
    return ProbeFailureKind.TLS_ERROR;
  }

  return ProbeFailureKind.CONNECTION_ERROR;
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;

  const cause = error.cause;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = errorCode(error);
    return code && !error.message.includes(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

/**
 * HttpProbeClient - axios-backed IProbeClient.
 * Every status is a success; every thrown error becomes a ProbeFailure.
 */
export class HttpProbeClient implements IProbeClient {
  private readonly http: AxiosInstance;
  private readonly maxRedirects: number;
  private readonly userAgent: string;
  private readonly maxBodyBytes: number;
  private readonly rateLimiter?: RateLimiter;
  private readonly logger: Logger;

  constructor(options: HttpProbeClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.maxRedirects = options.maxRedirects ?? ScannerConfig.MAX_REDIRECTS;
    this.userAgent = options.userAgent ?? ScannerConfig.USER_AGENT;
    this.maxBodyBytes = options.maxBodyBytes ?? ScannerConfig.MAX_RESPONSE_BODY_SIZE;
    this.rateLimiter = options.rateLimiter;
    this.logger = options.logger ?? new Logger(LogLevel.INFO, 'HttpProbeClient');
  }

  public async fetch(url: string, options: ProbeOptions): Promise<ProbeResult> {
    this.assertContract(url, options);
    const startedAt = Date.now();

    if (this.rateLimiter) {
      const granted = await this.rateLimiter.waitForToken(options.signal);
      if (!granted) {
        return this.failure(url, ProbeFailureKind.CANCELLED, 'Probe cancelled before it was sent', startedAt);
      }
    }

    if (options.signal?.aborted) {
      return this.failure(url, ProbeFailureKind.CANCELLED, 'Probe cancelled before it was sent', startedAt);
    }

    // axios' own timeout only notices an idle socket; this one covers the whole exchange
    const deadline = startDeadline(options.timeoutMs, options.signal);

    try {
      const response = await this.http.request<unknown>({
        url,
        method: 'GET',
        maxRedirects: options.followRedirects ? this.maxRedirects : 0,
        validateStatus: () => true,
        responseType: 'stream',
        signal: deadline.signal,
        headers: {
          'User-Agent': this.userAgent,
          ...options.headers,
        },
      });

      this.rateLimiter?.handleResponse(response.status);

      const body =
        options.readBody === false
          ? discardBody(response.data)
          : await readBody(response.data, this.maxBodyBytes, deadline.signal);
      if (body.truncated) {
        this.logger.debug(`GET ${url} body cut at ${this.maxBodyBytes} bytes`);
      }

      this.logger.debug(`GET ${url} -> ${response.status}`);
      return this.success(url, response, body.text, startedAt);
    } catch (error) {
      if (deadline.timedOut()) {
        const message = `timeout of ${options.timeoutMs}ms exceeded`;
        this.logger.debug(`GET ${url} failed (${ProbeFailureKind.TIMEOUT}): ${message}`);
        return this.failure(url, ProbeFailureKind.TIMEOUT, message, startedAt);
      }
      if (options.signal?.aborted) {
        return this.failure(url, ProbeFailureKind.CANCELLED, 'Probe cancelled', startedAt);
      }

      const kind = classifyProbeError(error);
      const message = describeError(error);
      this.logger.debug(`GET ${url} failed (${kind}): ${message}`);
      return this.failure(url, kind, message, startedAt);
    } finally {
      deadline.clear();
    }
  }

  private assertContract(url: string, options: ProbeOptions): void {
    if (!(options.timeoutMs > 0)) {
      throw new ProbeConfigurationError(`timeoutMs must be > 0, got ${options.timeoutMs}`);
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ProbeConfigurationError(`Probe URL must be absolute: ${url}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ProbeConfigurationError(`Probe URL must be http(s): ${url}`);
    }
  }

  private success(url: string, response: AxiosResponse<unknown>, body: string, startedAt: number): ProbeSuccess {
    const finalUrl = resolveFinalUrl(response, url);

    return {
      ok: true,
      url,
      status: response.status,
      headers: HeaderMap.fromRecord(toRawHeaders(response.headers)),
      body,
      finalUrl,
      scheme: schemeOf(finalUrl),
      redirected: normalizeUrl(finalUrl) !== normalizeUrl(url),
      durationMs: Date.now() - startedAt,
    };
  }

  private failure(url: string, kind: ProbeFailureKind, message: string, startedAt: number): ProbeFailure {
    return { ok: false, url, kind, message, durationMs: Date.now() - startedAt };
  }
}

function toRawHeaders(headers: AxiosResponse['headers']): RawHeaders {
  return headers instanceof AxiosHeaders ? headers.toJSON() : { ...headers };
}

interface BodyText {
  text: string;
  truncated: boolean;
}

function clip(bytes: Buffer, limit: number): BodyText {
  return bytes.length > limit
    ? { text: bytes.subarray(0, limit).toString('utf8'), truncated: true }
    : { text: bytes.toString('utf8'), truncated: false };
}

/**
 * Drops the response without reading it; the socket is released at once.
 */
function discardBody(data: unknown): BodyText {
  if (data instanceof Readable) {
    data.destroy();
  }
  return { text: '', truncated: false };
}

/**
 * Reads at most `limit` bytes. A longer body is cut there and the rest is
 * never downloaded.
 */
function readBody(data: unknown, limit: number, signal: AbortSignal): Promise<BodyText> {
  if (typeof data === 'string') return Promise.resolve(clip(Buffer.from(data, 'utf8'), limit));
  if (Buffer.isBuffer(data)) return Promise.resolve(clip(data, limit));
  if (!(data instanceof Readable)) return Promise.resolve({ text: '', truncated: false });

  const stream = data;
  return new Promise<BodyText>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const detach = (): void => {
      stream.off('data', onData);
      stream.off('end', onEnd);
      signal.removeEventListener('abort', onAbort);
    };
    const settle = (truncated: boolean): void => {
      detach();
      resolve({ text: Buffer.concat(chunks).toString('utf8'), truncated });
    };
    const onData = (chunk: Buffer | string): void => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      if (size + bytes.length > limit) {
        chunks.push(bytes.subarray(0, limit - size));
        stream.destroy();
        settle(true);
        return;
      }
      chunks.push(bytes);
      size += bytes.length;
    };
    const onEnd = (): void => settle(false);
    // stays attached after settling so a late socket error is still handled
    const onError = (error: Error): void => {
      detach();
      reject(error);
    };
    const onAbort = (): void => {
      stream.destroy();
      onError(new Error('Response body aborted'));
    };

    stream.on('data', onData);
    stream.once('end', onEnd);
    stream.on('error', onError);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * follow-redirects records the last hop on the underlying response
 */
function resolveFinalUrl(response: AxiosResponse<unknown>, fallback: string): string {
  const responseUrl: unknown = response.request?.res?.responseUrl;
  return typeof responseUrl === 'string' && responseUrl.length > 0 ? responseUrl : fallback;
}

function schemeOf(url: string): TargetScheme {
  return url.toLowerCase().startsWith('http:') ? 'http' : 'https';
}

function normalizeUrl(url: string): string {
  try {
    return new URL(url).href;
  } catch {
    return url;
  }
}
