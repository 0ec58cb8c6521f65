import { clamp, roundTo2 } from '../common/utils';

export interface SynthesizedMetrics {
  latencyMs: number;
  throughputGbps: number;
  errorRate: number;
}

export const METRIC_BOUNDS = {
  latencyMs: { min: 1, max: 200 },
  throughputGbps: { min: 1, max: 10 },
  errorRate: { min: 0, max: 5 }
} as const;

/**
 * Nodes whose id falls in the top two buckets of ten are bottleneck-prone
 */
export function nodeBucket(nodeId: number): number {
  return nodeId % 10;
}

export function isBottleneckProne(nodeId: number): boolean {
  return nodeBucket(nodeId) > 7;
}

export function baselineMetrics(nodeId: number): SynthesizedMetrics {
  const factor = nodeBucket(nodeId);

  if (factor > 7) {
    const severity = factor - 7;
    return {
      latencyMs: 50 + severity * 20,
      throughputGbps: 8 - severity * 1.5,
      errorRate: 0.5 + severity * 0.3
    };
  }

  return {
    latencyMs: 10 + factor * 2,
    throughputGbps: 9.5 - factor * 0.1,
    errorRate: 0.1 + factor * 0.02
  };
}

/**
 * Shared slow sine wave, phase-shifted by node id. Resolution is one
 * wall-clock second; the result lies in [-0.3, 0.3].
 */
export function timeVariation(nodeId: number, nowMs: number): number {
  const timeFactor = Math.floor(nowMs / 1000) / 100;
  return Math.sin(timeFactor + nodeId) * 0.3;
}

/**
 * Deterministic metrics for a node at a given instant: bucket baseline,
 * perturbed by the waveform, clamped to the valid ranges and rounded to two
 * decimals.
 */
export function synthesizeTelemetry(nodeId: number, nowMs: number): SynthesizedMetrics {
  const base = baselineMetrics(nodeId);
  const variation = timeVariation(nodeId, nowMs);

  const latencyMs = base.latencyMs * (1 + variation * 0.2);
  const throughputGbps = base.throughputGbps * (1 + variation * 0.1);
  const errorRate = Math.max(0, base.errorRate + variation * 0.1);

  return {
    latencyMs: roundTo2(clamp(latencyMs, METRIC_BOUNDS.latencyMs.min, METRIC_BOUNDS.latencyMs.max)),
    throughputGbps: roundTo2(clamp(throughputGbps, METRIC_BOUNDS.throughputGbps.min, METRIC_BOUNDS.throughputGbps.max)),
    errorRate: roundTo2(clamp(errorRate, METRIC_BOUNDS.errorRate.min, METRIC_BOUNDS.errorRate.max))
  };
}
