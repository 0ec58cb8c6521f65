import { NodeState } from '../types';

export class NotFoundError extends Error {
  constructor(public readonly entity: string, public readonly entityId: number) {
    super(`${entity} ${entityId} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(public readonly fromState: NodeState, public readonly toState: NodeState) {
    super(`Invalid node state transition ${fromState} -> ${toState}`);
    this.name = 'InvalidTransitionError';
  }
}

export class StoreClosedError extends Error {
  constructor() {
    super('Entity store is closed');
    this.name = 'StoreClosedError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
