import { Clock, IEntityStore, NodeState } from '../types';
import { CycleSummary, PeriodicTask, PeriodicTaskConfig } from '../common/PeriodicTask';
import { FrameworkLogger } from '../common/logger';
import { TelemetryService } from '../services/TelemetryService';
import { synthesizeTelemetry } from './TelemetrySynthesizer';

export type TelemetryGeneratorConfig = PeriodicTaskConfig;

export const DEFAULT_TELEMETRY_CONFIG: TelemetryGeneratorConfig = {
  interval: 5000,
  backoffInterval: 5000,
  runImmediately: true
};

/**
 * Writes one synthesized sample per RUNNING node per cycle
 */
export class TelemetryGenerator extends PeriodicTask {
  private readonly telemetry: TelemetryService;

  constructor(
    private readonly store: IEntityStore,
    config: Partial<TelemetryGeneratorConfig> = {},
    logger?: FrameworkLogger,
    private readonly now: Clock = Date.now
  ) {
    super('TelemetryGenerator', { ...DEFAULT_TELEMETRY_CONFIG, ...config }, logger);
    this.telemetry = new TelemetryService(store, now);
  }

  protected async executeCycle(): Promise<CycleSummary> {
    const running = await this.store.findNodes({ states: [NodeState.RUNNING] });
    let applied = 0;
    let failed = 0;

    for (const node of running) {
      try {
        const timestamp = this.now();
        const metrics = synthesizeTelemetry(node.id, timestamp);
        await this.telemetry.recordSample({
          nodeId: node.id,
          deploymentId: node.deploymentId,
          timestamp,
          ...metrics
        });
        applied++;
      } catch (error) {
        failed++;
        this.reportNodeError(node.id, error);
      }
    }

    if (running.length > 0) {
      this.logger.telemetry(`Recorded ${applied}/${running.length} samples`);
    }
    return { processed: running.length, applied, failed, durationMs: 0 };
  }
}
