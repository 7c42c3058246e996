/**
 * taskrelay - capability-routed task coordination with a file-based ledger
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Utils
export * from './utils/index.js';

// Coordination
export * from './coordination/index.js';

// Store
export * from './store/index.js';

// Agents
export * from './agents/index.js';

// Manager
export { Manager, MANAGER_IDENTITY, type ManagerOptions, type SubmitOptions, type ManagerStatus } from './core/manager.js';
