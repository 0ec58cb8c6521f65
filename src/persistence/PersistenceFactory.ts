import { IEntityStore } from '../types';
import { FrameworkLogger } from '../common/logger';
import { InMemoryEntityStore } from './memory/InMemoryEntityStore';
import { JournaledEntityStore } from './wal/JournaledEntityStore';
import { EntityStoreConfig } from './types';

/**
 * Create an entity store for the given configuration. The store still has to
 * be opened before use.
 */
export function createEntityStore(
  config: EntityStoreConfig = { type: 'memory' },
  logger?: FrameworkLogger
): IEntityStore {
  switch (config.type) {
    case 'memory':
      return new InMemoryEntityStore();
    case 'wal':
      return new JournaledEntityStore(config.walConfig, logger);
    default: {
      const unsupported: never = config.type;
      throw new Error(`Unsupported entity store type: ${String(unsupported)}`);
    }
  }
}
