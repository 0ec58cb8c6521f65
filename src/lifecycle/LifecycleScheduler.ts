import { Clock, IEntityStore } from '../types';
import { CycleSummary, PeriodicTask, PeriodicTaskConfig } from '../common/PeriodicTask';
import { FrameworkLogger } from '../common/logger';
import { NodeService } from '../services/NodeService';
import { IN_FLIGHT_STATES, planTransition } from './NodeStateMachine';

export type LifecycleSchedulerConfig = PeriodicTaskConfig;

export const DEFAULT_LIFECYCLE_CONFIG: LifecycleSchedulerConfig = {
  interval: 2000,
  backoffInterval: 5000,
  runImmediately: true
};

/**
 * Advances in-flight nodes through the lifecycle state machine.
 *
 * Each cycle fetches every node not yet in a terminal state and applies at
 * most one transition per node, each committed in its own transaction.
 * Terminal nodes are never fetched, so work is bounded by in-flight nodes.
 */
export class LifecycleScheduler extends PeriodicTask {
  private readonly nodes: NodeService;

  constructor(
    store: IEntityStore,
    config: Partial<LifecycleSchedulerConfig> = {},
    logger?: FrameworkLogger,
    private readonly now: Clock = Date.now
  ) {
    super('LifecycleScheduler', { ...DEFAULT_LIFECYCLE_CONFIG, ...config }, logger);
    this.nodes = new NodeService(store, now);
  }

  protected async executeCycle(): Promise<CycleSummary> {
    const inFlight = await this.nodes.getNodesInStates([...IN_FLIGHT_STATES]);
    let applied = 0;
    let failed = 0;

    for (const node of inFlight) {
      const planned = planTransition(node, this.now());
      if (!planned) continue;

      try {
        const patch = planned.ipAddress !== undefined ? { ipAddress: planned.ipAddress } : {};
        await this.nodes.transitionNodeState(node.id, planned.toState, planned.message, patch);
        applied++;
        this.logger.lifecycle(`${node.nodeId} (deployment ${node.deploymentId}): ${node.state} -> ${planned.toState}`);
      } catch (error) {
        failed++;
        this.reportNodeError(node.id, error);
      }
    }

    return { processed: inFlight.length, applied, failed, durationMs: 0 };
  }
}
