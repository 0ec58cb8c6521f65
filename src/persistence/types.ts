import {
  AuditEvent,
  Deployment,
  NetworkNode,
  NodePatch,
  TelemetrySample
} from '../types';
import { WALConfig } from './wal/types';

/**
 * A single committed write. A transaction commits as an ordered list of these,
 * which is also the payload journaled to the write-ahead log.
 */
export type EntityOperation =
  | { op: 'insertDeployment'; record: Deployment }
  | { op: 'insertNode'; record: NetworkNode }
  | { op: 'updateNode'; id: number; patch: NodePatch }
  | { op: 'insertSample'; record: TelemetrySample }
  | { op: 'appendEvent'; record: AuditEvent }
  | { op: 'deleteDeployment'; id: number };

export interface EntityCounters {
  deployment: number;
  node: number;
  sample: number;
  event: number;
}

export interface EntityStoreConfig {
  type: 'memory' | 'wal';
  walConfig?: WALConfig;
}
