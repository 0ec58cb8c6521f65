import { NodeService } from '../../../src/services/NodeService';
import { DeploymentService } from '../../../src/services/DeploymentService';
import { EventService } from '../../../src/services/EventService';
import { InMemoryEntityStore } from '../../../src/persistence/memory/InMemoryEntityStore';
import { NodeState } from '../../../src/types';
import { InvalidTransitionError, NotFoundError } from '../../../src/common/errors';
import { ManualClock, T0 } from '../../helpers/clock';

describe('NodeService', () => {
  let clock: ManualClock;
  let store: InMemoryEntityStore;
  let nodes: NodeService;
  let events: EventService;

  beforeEach(async () => {
    clock = new ManualClock();
    store = new InMemoryEntityStore();
    await store.open();
    nodes = new NodeService(store, clock.now);
    events = new EventService(store);
    await new DeploymentService(store, clock.now).createDeployment({ name: 'fabric', targetNodeCount: 2 });
  });

  afterEach(async () => {
    await store.close();
  });

  describe('Reads', () => {
    test('should fetch a node by id', async () => {
      expect((await nodes.getNode(2)).nodeId).toBe('node-002');
      await expect(nodes.getNode(9)).rejects.toThrow('Node 9 not found');
    });

    test('should list the nodes of a deployment', async () => {
      expect((await nodes.getNodesByDeployment(1)).map(n => n.id)).toEqual([1, 2]);
      await expect(nodes.getNodesByDeployment(5)).rejects.toThrow(NotFoundError);
    });

    test('should filter nodes by state', async () => {
      await nodes.transitionNodeState(1, NodeState.PROVISIONING);

      expect((await nodes.getNodesInStates([NodeState.PENDING])).map(n => n.id)).toEqual([2]);
      expect((await nodes.getNodesInStates([NodeState.PENDING, NodeState.PROVISIONING])).map(n => n.id)).toEqual([1, 2]);
    });
  });

  describe('transitionNodeState', () => {
    test('should update state timestamps and extra fields together', async () => {
      clock.advance(2500);

      const result = await nodes.transitionNodeState(1, NodeState.PROVISIONING, 'Starting', { ipAddress: '10.1.0.1' });

      expect(result.fromState).toBe(NodeState.PENDING);
      expect(result.node).toMatchObject({
        state: NodeState.PROVISIONING,
        ipAddress: '10.1.0.1',
        stateChangedAt: T0 + 2500,
        updatedAt: T0 + 2500,
        createdAt: T0
      });
      expect(await nodes.getNode(1)).toEqual(result.node);
    });

    test('should append a STATE_CHANGE event with transition metadata', async () => {
      await nodes.transitionNodeState(2, NodeState.PROVISIONING);

      const [event] = await events.listEvents({ nodeId: 2 });
      expect(event).toMatchObject({
        deploymentId: 1,
        nodeId: 2,
        eventType: 'STATE_CHANGE',
        message: 'Node node-002 transitioned from PENDING to PROVISIONING',
        metadata: { fromState: 'PENDING', toState: 'PROVISIONING', nodeIdentifier: 'node-002' }
      });
    });

    test('should reject edges outside the state machine without writing anything', async () => {
      await expect(nodes.transitionNodeState(1, NodeState.RUNNING)).rejects.toThrow(
        new InvalidTransitionError(NodeState.PENDING, NodeState.RUNNING)
      );

      expect((await nodes.getNode(1)).state).toBe(NodeState.PENDING);
      expect(await events.listEvents({ eventType: 'STATE_CHANGE' })).toEqual([]);
    });

    test('should never leave a terminal state', async () => {
      await nodes.transitionNodeState(1, NodeState.PROVISIONING);
      await nodes.transitionNodeState(1, NodeState.CONFIGURING);
      await nodes.transitionNodeState(1, NodeState.FAILED);

      await expect(nodes.transitionNodeState(1, NodeState.RUNNING)).rejects.toThrow(
        'Invalid node state transition FAILED -> RUNNING'
      );
    });

    test('should raise NotFoundError for unknown nodes', async () => {
      await expect(nodes.transitionNodeState(42, NodeState.PROVISIONING)).rejects.toThrow(NotFoundError);
    });
  });
});
