/**
 * @tg-relay/storage
 *
 * In-process implementations of the ledger and storage contracts.
 */

export {
  InMemoryTrafficLedger,
  defaultTrafficLimits,
  type TrafficLimits,
  type TrafficUsage,
} from './trafficLedger.js';
export { InMemoryHistoryStore } from './historyStore.js';
export { InMemoryBatchStore } from './batchStore.js';
