/**
 * Type definitions for the netdeploy simulation core
 */

export enum NodeState {
  PENDING = 'PENDING',
  PROVISIONING = 'PROVISIONING',
  CONFIGURING = 'CONFIGURING',
  RUNNING = 'RUNNING',
  FAILED = 'FAILED'
}

export type AuditEventType = 'DEPLOYMENT_CREATED' | 'STATE_CHANGE';

export interface Deployment {
  id: number;
  name: string;
  description: string | null;
  targetNodeCount: number;
  createdAt: number;
  updatedAt: number;
}

export interface NetworkNode {
  id: number;
  deploymentId: number;
  /** Identifier unique within the owning deployment, e.g. `node-001` */
  nodeId: string;
  state: NodeState;
  hostname: string | null;
  ipAddress: string | null;
  createdAt: number;
  updatedAt: number;
  stateChangedAt: number;
}

export interface TelemetrySample {
  id: number;
  nodeId: number;
  deploymentId: number;
  timestamp: number;
  latencyMs: number;
  throughputGbps: number;
  /** Percentage, 0-100 */
  errorRate: number;
}

export interface AuditEvent {
  id: number;
  deploymentId: number | null;
  nodeId: number | null;
  eventType: AuditEventType;
  message: string;
  metadata: Record<string, unknown> | null;
  createdAt: number;
}

export type NewDeployment = Omit<Deployment, 'id'>;
export type NewNetworkNode = Omit<NetworkNode, 'id'>;
export type NewTelemetrySample = Omit<TelemetrySample, 'id'>;
export type NewAuditEvent = Omit<AuditEvent, 'id'>;

export type NodePatch = Partial<Pick<NetworkNode, 'state' | 'hostname' | 'ipAddress' | 'updatedAt' | 'stateChangedAt'>>;

export interface PageOptions {
  offset?: number;
  limit?: number;
}

export interface NodeFilter {
  deploymentId?: number;
  states?: NodeState[];
}

export interface SampleFilter {
  deploymentId?: number;
  nodeId?: number;
  /** Inclusive lower bound on `timestamp` */
  since?: number;
  /** Inclusive upper bound on `timestamp` */
  until?: number;
  order?: 'asc' | 'desc';
  limit?: number;
}

export interface EventFilter {
  deploymentId?: number;
  nodeId?: number;
  eventType?: AuditEventType;
}

/**
 * Writes staged inside a transaction. Nothing becomes visible to readers
 * until the surrounding `transaction()` call resolves.
 */
export interface EntityTransaction {
  getNode(id: number): NetworkNode | undefined;
  insertDeployment(input: NewDeployment): Deployment;
  insertNode(input: NewNetworkNode): NetworkNode;
  updateNode(id: number, patch: NodePatch): NetworkNode;
  insertSample(input: NewTelemetrySample): TelemetrySample;
  appendEvent(input: NewAuditEvent): AuditEvent;
  deleteDeployment(id: number): void;
}

// Persistence Layer Interfaces
export interface IEntityStore {
  open(): Promise<void>;
  close(): Promise<void>;

  getDeployment(id: number): Promise<Deployment | undefined>;
  listDeployments(options?: PageOptions): Promise<Deployment[]>;
  countDeployments(): Promise<number>;

  getNode(id: number): Promise<NetworkNode | undefined>;
  findNodes(filter?: NodeFilter): Promise<NetworkNode[]>;
  countNodes(filter?: NodeFilter): Promise<number>;

  findSamples(filter?: SampleFilter): Promise<TelemetrySample[]>;
  findEvents(filter?: EventFilter): Promise<AuditEvent[]>;

  transaction<T>(work: (tx: EntityTransaction) => T | Promise<T>): Promise<T>;
}

export type Clock = () => number;
