import { Clock, Deployment, IEntityStore, NodeState, PageOptions } from '../types';
import { NotFoundError, ValidationError } from '../common/errors';
import { formatOrdinal } from '../common/utils';

export const MAX_NODES_PER_DEPLOYMENT = 1000;
export const MAX_PAGE_SIZE = 1000;

export interface CreateDeploymentInput {
  name: string;
  description?: string | null;
  targetNodeCount: number;
}

export interface DeploymentDetail extends Deployment {
  currentNodeCount: number;
}

/**
 * Deployment creation and queries
 */
export class DeploymentService {
  constructor(private readonly store: IEntityStore, private readonly now: Clock = Date.now) {}

  /**
   * Create a deployment together with its PENDING nodes and a
   * DEPLOYMENT_CREATED audit event, in one transaction.
   */
  async createDeployment(input: CreateDeploymentInput): Promise<Deployment> {
    this.validateCreateInput(input);

    return this.store.transaction(tx => {
      const timestamp = this.now();
      const deployment = tx.insertDeployment({
        name: input.name,
        description: input.description ?? null,
        targetNodeCount: input.targetNodeCount,
        createdAt: timestamp,
        updatedAt: timestamp
      });

      for (let ordinal = 1; ordinal <= input.targetNodeCount; ordinal++) {
        tx.insertNode({
          deploymentId: deployment.id,
          nodeId: `node-${formatOrdinal(ordinal)}`,
          state: NodeState.PENDING,
          hostname: `switch-${deployment.id}-${formatOrdinal(ordinal)}`,
          ipAddress: null, // Assigned when provisioning starts
          createdAt: timestamp,
          updatedAt: timestamp,
          stateChangedAt: timestamp
        });
      }

      tx.appendEvent({
        deploymentId: deployment.id,
        nodeId: null,
        eventType: 'DEPLOYMENT_CREATED',
        message: `Deployment '${deployment.name}' created with ${input.targetNodeCount} nodes`,
        metadata: { targetNodeCount: input.targetNodeCount },
        createdAt: timestamp
      });

      return deployment;
    });
  }

  async getDeployment(id: number): Promise<Deployment> {
    const deployment = await this.store.getDeployment(id);
    if (!deployment) {
      throw new NotFoundError('Deployment', id);
    }
    return deployment;
  }

  async getDeploymentDetail(id: number): Promise<DeploymentDetail> {
    const deployment = await this.getDeployment(id);
    const currentNodeCount = await this.store.countNodes({ deploymentId: id });
    return { ...deployment, currentNodeCount };
  }

  /**
   * Most recent first
   */
  async listDeployments(options: PageOptions = {}): Promise<Deployment[]> {
    const offset = options.offset ?? 0;
    const limit = options.limit ?? 100;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError('offset must be a non-negative integer');
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    return this.store.listDeployments({ offset, limit });
  }

  async countDeployments(): Promise<number> {
    return this.store.countDeployments();
  }

  /**
   * Remove a deployment with its nodes, samples and events
   */
  async deleteDeployment(id: number): Promise<void> {
    await this.store.transaction(tx => tx.deleteDeployment(id));
  }

  private validateCreateInput(input: CreateDeploymentInput): void {
    const name = typeof input.name === 'string' ? input.name : '';
    if (name.length < 1 || name.length > 255) {
      throw new ValidationError('name must be between 1 and 255 characters');
    }
    const count = input.targetNodeCount;
    if (!Number.isInteger(count) || count < 1 || count > MAX_NODES_PER_DEPLOYMENT) {
      throw new ValidationError(`targetNodeCount must be an integer between 1 and ${MAX_NODES_PER_DEPLOYMENT}`);
    }
  }
}
