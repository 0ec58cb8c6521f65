import { AuditEvent, EventFilter, IEntityStore } from '../types';

export class EventService {
  constructor(private readonly store: IEntityStore) {}

  async listEvents(filter: EventFilter = {}): Promise<AuditEvent[]> {
    return this.store.findEvents(filter);
  }
}
