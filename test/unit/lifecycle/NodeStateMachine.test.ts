import {
  assignIpAddress,
  canTransition,
  configuringDurationMs,
  isConfigurationFailure,
  isTerminalState,
  planTransition,
  provisioningDurationMs
} from '../../../src/lifecycle/NodeStateMachine';
import { NetworkNode, NodeState } from '../../../src/types';
import { T0 } from '../../helpers/clock';

function makeNode(overrides: Partial<NetworkNode> = {}): NetworkNode {
  return {
    id: 1,
    deploymentId: 1,
    nodeId: 'node-001',
    state: NodeState.PENDING,
    hostname: 'switch-1-001',
    ipAddress: null,
    createdAt: T0,
    updatedAt: T0,
    stateChangedAt: T0,
    ...overrides
  };
}

describe('NodeStateMachine', () => {
  describe('Transition table', () => {
    test('should allow only forward edges', () => {
      expect(canTransition(NodeState.PENDING, NodeState.PROVISIONING)).toBe(true);
      expect(canTransition(NodeState.PROVISIONING, NodeState.CONFIGURING)).toBe(true);
      expect(canTransition(NodeState.CONFIGURING, NodeState.RUNNING)).toBe(true);
      expect(canTransition(NodeState.CONFIGURING, NodeState.FAILED)).toBe(true);

      expect(canTransition(NodeState.PENDING, NodeState.RUNNING)).toBe(false);
      expect(canTransition(NodeState.PROVISIONING, NodeState.PENDING)).toBe(false);
      expect(canTransition(NodeState.RUNNING, NodeState.FAILED)).toBe(false);
      expect(canTransition(NodeState.FAILED, NodeState.PENDING)).toBe(false);
    });

    test('should treat RUNNING and FAILED as terminal', () => {
      expect(isTerminalState(NodeState.RUNNING)).toBe(true);
      expect(isTerminalState(NodeState.FAILED)).toBe(true);
      expect(isTerminalState(NodeState.CONFIGURING)).toBe(false);
    });
  });

  describe('Deterministic timing', () => {
    test('should derive provisioning time of 3-7 seconds from the node id', () => {
      expect([1, 2, 3, 4, 5].map(provisioningDurationMs)).toEqual([4000, 5000, 6000, 7000, 3000]);
    });

    test('should derive configuring time of 5-11 seconds from the node id', () => {
      expect([1, 6, 7, 13].map(configuringDurationMs)).toEqual([6000, 11000, 5000, 11000]);
    });

    test('should fail configuration when node and deployment ids sum to a multiple of 20', () => {
      expect(isConfigurationFailure(19, 1)).toBe(true);
      expect(isConfigurationFailure(15, 25)).toBe(true);
      expect(isConfigurationFailure(20, 1)).toBe(false);
    });

    test('should build addresses from deployment and node ids', () => {
      expect(assignIpAddress(1, 5)).toBe('10.1.0.5');
      expect(assignIpAddress(300, 513)).toBe('10.44.2.1');
    });
  });

  describe('planTransition', () => {
    test('should start provisioning immediately and assign an address', () => {
      expect(planTransition(makeNode({ id: 7, deploymentId: 3 }), T0)).toEqual({
        toState: NodeState.PROVISIONING,
        message: 'Starting hardware provisioning for node-001',
        ipAddress: '10.3.0.7'
      });
    });

    test('should wait out the provisioning duration', () => {
      const node = makeNode({ state: NodeState.PROVISIONING });

      expect(planTransition(node, T0 + 3999)).toBeNull();
      expect(planTransition(node, T0 + 4000)).toEqual({
        toState: NodeState.CONFIGURING,
        message: 'Hardware provisioned, starting configuration for node-001'
      });
    });

    test('should finish configuration as RUNNING or FAILED', () => {
      const healthy = makeNode({ state: NodeState.CONFIGURING });
      const doomed = makeNode({ id: 19, nodeId: 'node-019', state: NodeState.CONFIGURING });

      expect(planTransition(healthy, T0 + 5999)).toBeNull();
      expect(planTransition(healthy, T0 + 6000)).toEqual({
        toState: NodeState.RUNNING,
        message: 'Node node-001 is now running'
      });
      // node 19: 5 + 19 % 7 = 10 seconds
      expect(planTransition(doomed, T0 + 10000)).toEqual({
        toState: NodeState.FAILED,
        message: 'Configuration failed for node-019'
      });
    });

    test('should never move terminal nodes', () => {
      expect(planTransition(makeNode({ state: NodeState.RUNNING }), T0 + 3600000)).toBeNull();
      expect(planTransition(makeNode({ state: NodeState.FAILED }), T0 + 3600000)).toBeNull();
    });
  });
});
