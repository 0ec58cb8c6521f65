import {
  AuditEvent,
  Deployment,
  EntityTransaction,
  EventFilter,
  IEntityStore,
  NetworkNode,
  NewAuditEvent,
  NewDeployment,
  NewNetworkNode,
  NewTelemetrySample,
  NodeFilter,
  NodePatch,
  PageOptions,
  SampleFilter,
  TelemetrySample
} from '../../types';
import { NotFoundError, StoreClosedError } from '../../common/errors';
import { EntityCounters, EntityOperation } from '../types';

function copyEvent(event: AuditEvent): AuditEvent {
  return { ...event, metadata: event.metadata ? { ...event.metadata } : null };
}

function matchesNode(node: NetworkNode, filter: NodeFilter): boolean {
  if (filter.deploymentId !== undefined && node.deploymentId !== filter.deploymentId) return false;
  if (filter.states !== undefined && !filter.states.includes(node.state)) return false;
  return true;
}

/**
 * Transaction that stages operations against a private overlay of the store.
 * Identifiers are drawn from a copy of the store counters so a rollback
 * leaves the committed sequence untouched.
 */
class StagedTransaction implements EntityTransaction {
  readonly operations: EntityOperation[] = [];
  readonly counters: EntityCounters;
  private stagedNodes = new Map<number, NetworkNode>();
  private stagedDeployments = new Set<number>();
  private deletedDeployments = new Set<number>();

  constructor(private readonly store: InMemoryEntityStore, counters: EntityCounters) {
    this.counters = { ...counters };
  }

  getNode(id: number): NetworkNode | undefined {
    const staged = this.stagedNodes.get(id);
    if (staged) {
      return this.deletedDeployments.has(staged.deploymentId) ? undefined : { ...staged };
    }
    const committed = this.store.peekNode(id);
    if (!committed || this.deletedDeployments.has(committed.deploymentId)) {
      return undefined;
    }
    return { ...committed };
  }

  insertDeployment(input: NewDeployment): Deployment {
    const record: Deployment = { ...input, id: ++this.counters.deployment };
    this.stagedDeployments.add(record.id);
    this.operations.push({ op: 'insertDeployment', record });
    return { ...record };
  }

  insertNode(input: NewNetworkNode): NetworkNode {
    this.requireDeployment(input.deploymentId);
    const record: NetworkNode = { ...input, id: ++this.counters.node };
    this.stagedNodes.set(record.id, record);
    this.operations.push({ op: 'insertNode', record });
    return { ...record };
  }

  updateNode(id: number, patch: NodePatch): NetworkNode {
    const current = this.getNode(id);
    if (!current) {
      throw new NotFoundError('Node', id);
    }
    const updated: NetworkNode = { ...current, ...patch };
    this.stagedNodes.set(id, updated);
    this.operations.push({ op: 'updateNode', id, patch: { ...patch } });
    return { ...updated };
  }

  insertSample(input: NewTelemetrySample): TelemetrySample {
    if (!this.getNode(input.nodeId)) {
      throw new NotFoundError('Node', input.nodeId);
    }
    const record: TelemetrySample = { ...input, id: ++this.counters.sample };
    this.operations.push({ op: 'insertSample', record });
    return { ...record };
  }

  appendEvent(input: NewAuditEvent): AuditEvent {
    if (input.deploymentId !== null) {
      this.requireDeployment(input.deploymentId);
    }
    const record: AuditEvent = { ...input, id: ++this.counters.event };
    this.operations.push({ op: 'appendEvent', record });
    return copyEvent(record);
  }

  deleteDeployment(id: number): void {
    this.requireDeployment(id);
    this.deletedDeployments.add(id);
    this.operations.push({ op: 'deleteDeployment', id });
  }

  private requireDeployment(id: number): void {
    const exists = this.stagedDeployments.has(id) || this.store.peekDeployment(id) !== undefined;
    if (!exists || this.deletedDeployments.has(id)) {
      throw new NotFoundError('Deployment', id);
    }
  }
}

/**
 * In-memory entity store. Transactions are serialized, so each commits as a
 * unit against the state left by the previous one; reads see only committed
 * state and always return copies.
 */
export class InMemoryEntityStore implements IEntityStore {
  protected deployments = new Map<number, Deployment>();
  protected nodes = new Map<number, NetworkNode>();
  protected samples = new Map<number, TelemetrySample>();
  protected events = new Map<number, AuditEvent>();
  protected counters: EntityCounters = { deployment: 0, node: 0, sample: 0, event: 0 };
  protected closed = false;
  private writeQueue: Promise<unknown> = Promise.resolve();

  async open(): Promise<void> {
    this.closed = false;
  }

  async close(): Promise<void> {
    // Let queued writes land before refusing new work
    await this.writeQueue;
    this.closed = true;
  }

  isOpen(): boolean {
    return !this.closed;
  }

  async getDeployment(id: number): Promise<Deployment | undefined> {
    this.ensureOpen();
    const deployment = this.deployments.get(id);
    return deployment ? { ...deployment } : undefined;
  }

  async listDeployments(options: PageOptions = {}): Promise<Deployment[]> {
    this.ensureOpen();
    const offset = options.offset ?? 0;
    const ordered = [...this.deployments.values()].sort((a, b) => b.id - a.id);
    const page = options.limit === undefined
      ? ordered.slice(offset)
      : ordered.slice(offset, offset + options.limit);
    return page.map(d => ({ ...d }));
  }

  async countDeployments(): Promise<number> {
    this.ensureOpen();
    return this.deployments.size;
  }

  async getNode(id: number): Promise<NetworkNode | undefined> {
    this.ensureOpen();
    const node = this.nodes.get(id);
    return node ? { ...node } : undefined;
  }

  async findNodes(filter: NodeFilter = {}): Promise<NetworkNode[]> {
    this.ensureOpen();
    return [...this.nodes.values()]
      .filter(node => matchesNode(node, filter))
      .sort((a, b) => a.id - b.id)
      .map(node => ({ ...node }));
  }

  async countNodes(filter: NodeFilter = {}): Promise<number> {
    this.ensureOpen();
    let count = 0;
    for (const node of this.nodes.values()) {
      if (matchesNode(node, filter)) count++;
    }
    return count;
  }

  async findSamples(filter: SampleFilter = {}): Promise<TelemetrySample[]> {
    this.ensureOpen();
    const direction = filter.order === 'desc' ? -1 : 1;
    const matched = [...this.samples.values()].filter(sample => {
      if (filter.deploymentId !== undefined && sample.deploymentId !== filter.deploymentId) return false;
      if (filter.nodeId !== undefined && sample.nodeId !== filter.nodeId) return false;
      if (filter.since !== undefined && sample.timestamp < filter.since) return false;
      if (filter.until !== undefined && sample.timestamp > filter.until) return false;
      return true;
    });

    matched.sort((a, b) => direction * (a.timestamp - b.timestamp || a.id - b.id));
    const limited = filter.limit === undefined ? matched : matched.slice(0, filter.limit);
    return limited.map(sample => ({ ...sample }));
  }

  async findEvents(filter: EventFilter = {}): Promise<AuditEvent[]> {
    this.ensureOpen();
    return [...this.events.values()]
      .filter(event => {
        if (filter.deploymentId !== undefined && event.deploymentId !== filter.deploymentId) return false;
        if (filter.nodeId !== undefined && event.nodeId !== filter.nodeId) return false;
        if (filter.eventType !== undefined && event.eventType !== filter.eventType) return false;
        return true;
      })
      .sort((a, b) => a.id - b.id)
      .map(copyEvent);
  }

  async transaction<T>(work: (tx: EntityTransaction) => T | Promise<T>): Promise<T> {
    this.ensureOpen();
    const run = this.writeQueue.then(async () => {
      this.ensureOpen();
      const tx = new StagedTransaction(this, this.counters);
      const result = await work(tx);
      if (tx.operations.length > 0) {
        await this.commit(tx.operations, tx.counters);
      }
      return result;
    });
    // A failed transaction must not poison the ones queued behind it
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  /** @internal committed deployment lookup for staged transactions */
  peekDeployment(id: number): Deployment | undefined {
    return this.deployments.get(id);
  }

  /** @internal committed node lookup for staged transactions */
  peekNode(id: number): NetworkNode | undefined {
    return this.nodes.get(id);
  }

  protected async commit(operations: EntityOperation[], counters: EntityCounters): Promise<void> {
    for (const operation of operations) {
      this.applyOperation(operation);
    }
    this.counters = { ...counters };
  }

  protected applyOperation(operation: EntityOperation): void {
    switch (operation.op) {
      case 'insertDeployment':
        this.deployments.set(operation.record.id, { ...operation.record });
        break;
      case 'insertNode':
        this.nodes.set(operation.record.id, { ...operation.record });
        break;
      case 'updateNode': {
        const current = this.nodes.get(operation.id);
        if (current) {
          this.nodes.set(operation.id, { ...current, ...operation.patch });
        }
        break;
      }
      case 'insertSample':
        this.samples.set(operation.record.id, { ...operation.record });
        break;
      case 'appendEvent':
        this.events.set(operation.record.id, copyEvent(operation.record));
        break;
      case 'deleteDeployment':
        this.cascadeDelete(operation.id);
        break;
    }
  }

  private cascadeDelete(deploymentId: number): void {
    this.deployments.delete(deploymentId);
    for (const [id, node] of this.nodes) {
      if (node.deploymentId === deploymentId) this.nodes.delete(id);
    }
    for (const [id, sample] of this.samples) {
      if (sample.deploymentId === deploymentId) this.samples.delete(id);
    }
    for (const [id, event] of this.events) {
      if (event.deploymentId === deploymentId) this.events.delete(id);
    }
  }

  protected ensureOpen(): void {
    if (this.closed) {
      throw new StoreClosedError();
    }
  }
}
