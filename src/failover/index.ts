export { FailoverManager, FAILOVER_AGENT_ID } from './manager.js';
export type { FailoverOptions } from './manager.js';
export { KeyedMutex } from './keyed-mutex.js';
