/**
 * Agents module exports
 */

export {
  AgentRuntime,
  Worker,
  type AgentRuntimeOptions,
  type WorkerOptions,
} from './runtime.js';

export { Router, WORKER_FAILURE_CODE, type RouterOptions, type RouterStatus, type RecoverySummary, type ConsolidationOutcome } from './router.js';

export { ProbeWorker, PROBE_REPORT } from './probe.js';

export {
  parseRosterMarkdown,
  parseRosterJson,
  buildRoster,
  loadRoster,
  requiredCapabilities,
  satisfies,
  selectAgent,
  type RosterAgent,
  type SelectOptions,
} from './roster.js';
