import { Clock, IEntityStore, TelemetrySample } from '../types';
import { NotFoundError, ValidationError } from '../common/errors';

export interface RecordSampleInput {
  nodeId: number;
  deploymentId: number;
  latencyMs: number;
  throughputGbps: number;
  errorRate: number;
  timestamp?: number;
}

export interface TelemetryQuery {
  nodeId?: number;
  startTime?: number;
  endTime?: number;
  limit?: number;
}

/**
 * Storing and querying telemetry samples
 */
export class TelemetryService {
  constructor(private readonly store: IEntityStore, private readonly now: Clock = Date.now) {}

  /**
   * Persist one sample in its own transaction
   */
  async recordSample(input: RecordSampleInput): Promise<TelemetrySample> {
    return this.store.transaction(tx => tx.insertSample({
      nodeId: input.nodeId,
      deploymentId: input.deploymentId,
      latencyMs: input.latencyMs,
      throughputGbps: input.throughputGbps,
      errorRate: input.errorRate,
      timestamp: input.timestamp ?? this.now()
    }));
  }

  /**
   * Samples for a deployment, newest first
   */
  async getTelemetryForDeployment(deploymentId: number, query: TelemetryQuery = {}): Promise<TelemetrySample[]> {
    const limit = query.limit ?? 100;
    if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
      throw new ValidationError('limit must be an integer between 1 and 1000');
    }
    if (!(await this.store.getDeployment(deploymentId))) {
      throw new NotFoundError('Deployment', deploymentId);
    }

    return this.store.findSamples({
      deploymentId,
      nodeId: query.nodeId,
      since: query.startTime,
      until: query.endTime,
      order: 'desc',
      limit
    });
  }

  /**
   * Samples for one node over the trailing `minutes`, oldest first
   */
  async getRecentTelemetryForNode(nodeId: number, minutes = 5): Promise<TelemetrySample[]> {
    return this.store.findSamples({
      nodeId,
      since: this.now() - minutes * 60000,
      order: 'asc'
    });
  }
}
