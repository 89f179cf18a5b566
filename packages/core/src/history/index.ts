export { DrizzleHistoryStore, toHistoryEntry } from './drizzle-store'
export { buildResponseMetadata, entryFromState, toHistoryStats } from './entry'
export { MemoryHistoryStore } from './memory-store'
export {
  DEFAULT_HISTORY_LIMIT,
  type HistoryEntry,
  type HistoryStats,
  type HistoryStore,
  type NewHistoryEntry,
  type ResponseMetadata,
} from './types'
