import { ProbeOptions, ProbeResult } from '../../types/probe';

/**
 * Issues one GET request and reports the outcome as a value.
 * Implementations never reject for network failures; those come back as
 * ProbeFailure.
 */
export interface IProbeClient {
  fetch(url: string, options: ProbeOptions): Promise<ProbeResult>;
}
