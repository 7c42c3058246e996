/**
 * Store module exports
 */

export { FileStateStore, type StateStore } from './state-store.js';
export { MemoryStateStore, type StoreOperation, type FaultInjector } from './memory-store.js';
export { Ledger, LEDGER_HEADER, formatEntry, parseLedger, type AppendResult } from './ledger.js';
export {
  DEFAULT_LAYOUT,
  layoutFromConfig,
  artifactPath,
  artifactFileName,
  parseArtifactFileName,
  type WorkspaceLayout,
} from './paths.js';
