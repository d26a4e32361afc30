import type { ServerConfig } from '../config';
import type { RequestStats } from '../stats/requestStats';
import type { ItemStore } from './itemStore';
import type { SessionRegistry } from './sessions';

/**
 * Everything a handler may read or mutate. One context is built per app
 * instance, so each test gets fresh state while the running server keeps a
 * single process-wide one.
 */
export interface ServerContext {
  config: ServerConfig;
  items: ItemStore;
  sessions: SessionRegistry;
  stats: RequestStats;
  startedAt: number;
  now: () => number;
}
