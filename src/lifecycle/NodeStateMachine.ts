import { NetworkNode, NodeState } from '../types';

/**
 * Node lifecycle state machine:
 *
 *   PENDING -> PROVISIONING -> CONFIGURING -> RUNNING | FAILED
 *
 * Timing and outcomes are derived from the node's store identifier rather
 * than a random source, so replaying the same data reproduces the same run.
 * The mapping functions below are a stable contract; tests depend on them.
 */

export const ALLOWED_TRANSITIONS: Readonly<Record<NodeState, readonly NodeState[]>> = {
  [NodeState.PENDING]: [NodeState.PROVISIONING],
  [NodeState.PROVISIONING]: [NodeState.CONFIGURING],
  [NodeState.CONFIGURING]: [NodeState.RUNNING, NodeState.FAILED],
  [NodeState.RUNNING]: [],
  [NodeState.FAILED]: []
};

export const IN_FLIGHT_STATES: readonly NodeState[] = [
  NodeState.PENDING,
  NodeState.PROVISIONING,
  NodeState.CONFIGURING
];

export function isTerminalState(state: NodeState): boolean {
  return ALLOWED_TRANSITIONS[state].length === 0;
}

export function canTransition(from: NodeState, to: NodeState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** 3-7 seconds */
export function provisioningDurationMs(nodeId: number): number {
  return (3 + (nodeId % 5)) * 1000;
}

/** 5-11 seconds */
export function configuringDurationMs(nodeId: number): number {
  return (5 + (nodeId % 7)) * 1000;
}

/**
 * Roughly one node in twenty fails configuration
 */
export function isConfigurationFailure(nodeId: number, deploymentId: number): boolean {
  return (nodeId + deploymentId) % 20 === 0;
}

/**
 * Simulated address, unique within a deployment for node ids below 65536
 */
export function assignIpAddress(deploymentId: number, nodeId: number): string {
  return `10.${deploymentId % 256}.${Math.floor(nodeId / 256) % 256}.${nodeId % 256}`;
}

export interface PlannedTransition {
  toState: NodeState;
  message: string;
  ipAddress?: string;
}

/**
 * Decide the single transition a node is eligible for at `now`, or null when
 * it must keep waiting (or is already terminal).
 */
export function planTransition(node: NetworkNode, now: number): PlannedTransition | null {
  const stateAge = now - node.stateChangedAt;

  switch (node.state) {
    case NodeState.PENDING:
      return {
        toState: NodeState.PROVISIONING,
        message: `Starting hardware provisioning for ${node.nodeId}`,
        ipAddress: assignIpAddress(node.deploymentId, node.id)
      };

    case NodeState.PROVISIONING:
      if (stateAge < provisioningDurationMs(node.id)) return null;
      return {
        toState: NodeState.CONFIGURING,
        message: `Hardware provisioned, starting configuration for ${node.nodeId}`
      };

    case NodeState.CONFIGURING:
      if (stateAge < configuringDurationMs(node.id)) return null;
      if (isConfigurationFailure(node.id, node.deploymentId)) {
        return { toState: NodeState.FAILED, message: `Configuration failed for ${node.nodeId}` };
      }
      return { toState: NodeState.RUNNING, message: `Node ${node.nodeId} is now running` };

    case NodeState.RUNNING:
    case NodeState.FAILED:
      return null;
  }
}
