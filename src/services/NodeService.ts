import { Clock, IEntityStore, NetworkNode, NodePatch, NodeState } from '../types';
import { InvalidTransitionError, NotFoundError } from '../common/errors';
import { canTransition } from '../lifecycle/NodeStateMachine';

export interface TransitionResult {
  node: NetworkNode;
  fromState: NodeState;
}

/**
 * Node reads and lifecycle transitions
 */
export class NodeService {
  constructor(private readonly store: IEntityStore, private readonly now: Clock = Date.now) {}

  async getNode(id: number): Promise<NetworkNode> {
    const node = await this.store.getNode(id);
    if (!node) {
      throw new NotFoundError('Node', id);
    }
    return node;
  }

  async getNodesByDeployment(deploymentId: number): Promise<NetworkNode[]> {
    const deployment = await this.store.getDeployment(deploymentId);
    if (!deployment) {
      throw new NotFoundError('Deployment', deploymentId);
    }
    return this.store.findNodes({ deploymentId });
  }

  async getNodesInStates(states: NodeState[]): Promise<NetworkNode[]> {
    return this.store.findNodes({ states });
  }

  /**
   * Move a node to `newState`. The state, its timestamps, any extra field
   * changes and the STATE_CHANGE audit event commit together or not at all.
   * The transition is checked against the node's committed state inside the
   * transaction.
   */
  async transitionNodeState(
    id: number,
    newState: NodeState,
    message?: string,
    patch: Omit<NodePatch, 'state' | 'stateChangedAt' | 'updatedAt'> = {}
  ): Promise<TransitionResult> {
    return this.store.transaction(tx => {
      const current = tx.getNode(id);
      if (!current) {
        throw new NotFoundError('Node', id);
      }
      if (!canTransition(current.state, newState)) {
        throw new InvalidTransitionError(current.state, newState);
      }

      const timestamp = this.now();
      const node = tx.updateNode(id, {
        ...patch,
        state: newState,
        stateChangedAt: timestamp,
        updatedAt: timestamp
      });

      tx.appendEvent({
        deploymentId: node.deploymentId,
        nodeId: node.id,
        eventType: 'STATE_CHANGE',
        message: message ?? `Node ${node.nodeId} transitioned from ${current.state} to ${newState}`,
        metadata: {
          fromState: current.state,
          toState: newState,
          nodeIdentifier: node.nodeId
        },
        createdAt: timestamp
      });

      return { node, fromState: current.state };
    });
  }
}
