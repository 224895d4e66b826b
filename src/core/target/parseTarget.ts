import { MalformedTargetError } from '../errors';
import { Target } from '../../types/target';
import { TargetScheme } from '../../types/probe';

const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Parses user input into a frozen Target. Input without a scheme defaults
 * to https://.
 *
 * @throws MalformedTargetError when the input is empty, unparsable, not
 * http(s), or has no host
 */
export function parseTarget(input: string): Target {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new MalformedTargetError(input, 'target is empty');
  }

  const candidate = SCHEME_PREFIX.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new MalformedTargetError(input, 'not a valid URL');
  }

  const scheme = toScheme(parsed.protocol);
  if (!scheme) {
    throw new MalformedTargetError(input, `unsupported scheme "${parsed.protocol.replace(/:$/, '')}"`);
  }

  if (!parsed.hostname) {
    throw new MalformedTargetError(input, 'missing host');
  }

  parsed.hash = '';

  return Object.freeze({
    input,
    url: parsed.href,
    origin: parsed.origin,
    scheme,
    host: parsed.host,
  });
}

function toScheme(protocol: string): TargetScheme | null {
  if (protocol === 'http:') return 'http';
  if (protocol === 'https:') return 'https';
  return null;
}
