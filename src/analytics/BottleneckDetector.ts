import { Clock, IEntityStore, TelemetrySample } from '../types';
import { NotFoundError, ValidationError } from '../common/errors';
import { FrameworkLogger, createLogger } from '../common/logger';
import { MetricBaseline, baseline, hasSignal, mean, zScore } from './statistics';

export const DEFAULT_ANALYSIS_WINDOW_MINUTES = 10;
export const DEFAULT_DEVIATION_THRESHOLD = 2.0;

export const DEVIATION_WEIGHTS = {
  latency: 0.4,
  throughput: 0.4,
  errorRate: 0.2
} as const;

export interface DetectionOptions {
  analysisWindowMinutes?: number;
  /** Standard deviations from the deployment baseline */
  deviationThreshold?: number;
}

export interface BottleneckNode {
  nodeId: number;
  nodeIdentifier: string;
  deploymentId: number;
  latencyMs: number;
  throughputGbps: number;
  errorRate: number;
  latencyDeviation: number;
  throughputDeviation: number;
  errorRateDeviation: number;
  deviationScore: number;
  /** Latest sample contributing to the node's averages */
  timestamp: number;
}

export interface BottleneckReport {
  deploymentId: number;
  detectedAt: number;
  analysisWindowMinutes: number;
  deviationThreshold: number;
  bottlenecks: BottleneckNode[];
  totalBottlenecks: number;
}

export interface DeploymentBaseline {
  latency: MetricBaseline;
  throughput: MetricBaseline;
  errorRate: MetricBaseline;
  sampleCount: number;
}

export interface NodeDeviation {
  latency: number;
  throughput: number;
  errorRate: number;
  score: number;
}

export function computeBaseline(samples: readonly TelemetrySample[]): DeploymentBaseline {
  return {
    latency: baseline(samples.map(s => s.latencyMs)),
    throughput: baseline(samples.map(s => s.throughputGbps)),
    errorRate: baseline(samples.map(s => s.errorRate)),
    sampleCount: samples.length
  };
}

/**
 * Per-metric deviations of a node's averages from the deployment baseline.
 * Throughput is inverted because lower throughput is worse. Only positive
 * (worse than baseline) deviations contribute to the weighted score.
 */
export function computeDeviation(
  averages: { latencyMs: number; throughputGbps: number; errorRate: number },
  reference: DeploymentBaseline
): NodeDeviation {
  const latency = zScore(averages.latencyMs, reference.latency);
  const throughput = hasSignal(reference.throughput)
    ? (reference.throughput.mean - averages.throughputGbps) / reference.throughput.stdev
    : 0;
  const errorRate = zScore(averages.errorRate, reference.errorRate);

  const score =
    Math.max(0, latency) * DEVIATION_WEIGHTS.latency +
    Math.max(0, throughput) * DEVIATION_WEIGHTS.throughput +
    Math.max(0, errorRate) * DEVIATION_WEIGHTS.errorRate;

  return { latency, throughput, errorRate, score };
}

/**
 * Flags nodes whose recent telemetry deviates from their deployment's
 * population. Stateless: every call reads the samples committed at that
 * moment and computes from scratch.
 */
export class BottleneckDetector {
  private readonly logger: FrameworkLogger;

  constructor(
    private readonly store: IEntityStore,
    logger?: FrameworkLogger,
    private readonly now: Clock = Date.now
  ) {
    this.logger = logger ?? createLogger();
  }

  async detectBottlenecks(deploymentId: number, options: DetectionOptions = {}): Promise<BottleneckReport> {
    const analysisWindowMinutes = options.analysisWindowMinutes ?? DEFAULT_ANALYSIS_WINDOW_MINUTES;
    const deviationThreshold = options.deviationThreshold ?? DEFAULT_DEVIATION_THRESHOLD;
    this.validateOptions(analysisWindowMinutes, deviationThreshold);

    const deployment = await this.store.getDeployment(deploymentId);
    if (!deployment) {
      throw new NotFoundError('Deployment', deploymentId);
    }

    const detectedAt = this.now();
    const samples = await this.store.findSamples({
      deploymentId,
      since: detectedAt - analysisWindowMinutes * 60000
    });

    const report: BottleneckReport = {
      deploymentId,
      detectedAt,
      analysisWindowMinutes,
      deviationThreshold,
      bottlenecks: [],
      totalBottlenecks: 0
    };

    if (samples.length === 0) {
      return report;
    }

    const reference = computeBaseline(samples);

    const byNode = new Map<number, TelemetrySample[]>();
    for (const sample of samples) {
      const bucket = byNode.get(sample.nodeId);
      if (bucket) {
        bucket.push(sample);
      } else {
        byNode.set(sample.nodeId, [sample]);
      }
    }

    for (const [nodeId, nodeSamples] of byNode) {
      const averages = {
        latencyMs: mean(nodeSamples.map(s => s.latencyMs)),
        throughputGbps: mean(nodeSamples.map(s => s.throughputGbps)),
        errorRate: mean(nodeSamples.map(s => s.errorRate))
      };
      const deviation = computeDeviation(averages, reference);

      const isBottleneck =
        deviation.latency >= deviationThreshold ||
        deviation.throughput >= deviationThreshold ||
        deviation.errorRate >= deviationThreshold;
      if (!isBottleneck) continue;

      // Samples can outlive a node only if the store lost it; skip those
      const node = await this.store.getNode(nodeId);
      if (!node) continue;

      report.bottlenecks.push({
        nodeId,
        nodeIdentifier: node.nodeId,
        deploymentId,
        ...averages,
        latencyDeviation: deviation.latency,
        throughputDeviation: deviation.throughput,
        errorRateDeviation: deviation.errorRate,
        deviationScore: deviation.score,
        timestamp: nodeSamples.reduce((latest, s) => Math.max(latest, s.timestamp), 0)
      });
    }

    report.bottlenecks.sort((a, b) => b.deviationScore - a.deviationScore || a.nodeId - b.nodeId);
    report.totalBottlenecks = report.bottlenecks.length;

    this.logger.analytics(
      `Deployment ${deploymentId}: ${report.totalBottlenecks} bottleneck(s) across ${byNode.size} node(s), ${samples.length} sample(s)`
    );
    return report;
  }

  private validateOptions(analysisWindowMinutes: number, deviationThreshold: number): void {
    if (!Number.isFinite(analysisWindowMinutes) || analysisWindowMinutes <= 0) {
      throw new ValidationError('analysisWindowMinutes must be a positive number');
    }
    if (!Number.isFinite(deviationThreshold) || deviationThreshold < 0) {
      throw new ValidationError('deviationThreshold must be a non-negative number');
    }
  }
}
