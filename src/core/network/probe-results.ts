import { ProbeFailureKind } from '../../types/enums';
import { ProbeFailure, ProbeResult } from '../../types/probe';

/**
 * Stand-in result for a probe cut short by cancellation
 */
export function cancelledProbe(url: string, message: string = 'Audit cancelled'): ProbeFailure {
  return { ok: false, url, kind: ProbeFailureKind.CANCELLED, message, durationMs: 0 };
}

export function isCancelled(result: ProbeResult): boolean {
  return !result.ok && result.kind === ProbeFailureKind.CANCELLED;
}
