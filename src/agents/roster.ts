/**
 * Capability roster - declarative identity → capability mapping and the
 * matching function the router delegates with
 */

import type { Capability, CapabilitySet, MatchPolicy, Roster } from '../types.js';
import { CAPABILITIES } from '../types.js';
import { NotFoundError } from '../errors.js';
import { AgentIdSchema, RosterDocumentSchema, isCapability, validate } from '../utils/validation.js';
import type { StateStore } from '../store/state-store.js';
import { logger } from '../utils/logger.js';

const log = logger.child('roster');

export interface RosterAgent {
  agentId: string;
  capabilities: string[];
  permissions: string[];
}

/**
 * Parse the Markdown roster:
 *
 *   ## probe
 *   capabilities:
 *     - probe
 *   permissions:
 *     - write_logs
 */
export function parseRosterMarkdown(text: string): RosterAgent[] {
  const agents: RosterAgent[] = [];
  let current: RosterAgent | null = null;
  let section: 'capabilities' | 'permissions' | null = null;

  for (const line of text.split('\n')) {
    const stripped = line.trim();

    if (stripped.startsWith('##') && !stripped.startsWith('###')) {
      const agentId = stripped.slice(2).trim();
      current = agentId ? { agentId, capabilities: [], permissions: [] } : null;
      section = null;
      if (current) agents.push(current);
      continue;
    }

    if (!current) continue;

    if (stripped.includes(':') && !stripped.startsWith('-')) {
      const heading = stripped.toLowerCase();
      if (heading.includes('capabilities')) {
        section = 'capabilities';
      } else if (heading.includes('permissions')) {
        section = 'permissions';
      } else {
        section = null;
      }
      continue;
    }

    if (section && stripped.startsWith('-')) {
      const item = stripped.slice(1).trim();
      if (item) current[section].push(item);
    }
  }

  return agents;
}

/**
 * Parse the JSON roster: { "agents": { "<id>": { "capabilities": [...] } } }
 */
export function parseRosterJson(value: unknown): RosterAgent[] {
  const result = validate(RosterDocumentSchema, value);
  if (!result.success) {
    throw new TypeError(`Invalid roster document: ${result.errors.join('; ')}`);
  }

  return Object.entries(result.data.agents).map(([agentId, agent]) => ({
    agentId,
    capabilities: agent.capabilities,
    permissions: agent.permissions ?? [],
  }));
}

/**
 * Freeze parsed agents into a Roster. Identities the bus would reject and
 * unknown capability tags are skipped with a warning; a repeated identity
 * keeps its first declaration.
 */
export function buildRoster(agents: RosterAgent[]): Roster {
  const roster = new Map<string, CapabilitySet>();

  for (const agent of agents) {
    if (!AgentIdSchema.safeParse(agent.agentId).success) {
      log.warn('Invalid agent identity in roster skipped', { agentId: agent.agentId });
      continue;
    }
    if (roster.has(agent.agentId)) {
      log.warn('Duplicate roster entry ignored', { agentId: agent.agentId });
      continue;
    }

    const capabilities = new Set<Capability>();
    for (const tag of agent.capabilities) {
      const normalized = tag.trim().toLowerCase();
      if (isCapability(normalized)) {
        capabilities.add(normalized);
      } else {
        log.warn('Unknown capability tag skipped', { agentId: agent.agentId, tag });
      }
    }
    roster.set(agent.agentId, capabilities);
  }

  return roster;
}

/**
 * Load the roster once at startup. An inline roster (from the config file)
 * wins over the document on disk.
 */
export async function loadRoster(
  store: StateStore,
  path: string,
  inline?: unknown
): Promise<Roster> {
  if (inline !== undefined) {
    const roster = buildRoster(parseRosterJson(inline));
    log.info('Roster loaded from config', { agents: Array.from(roster.keys()) });
    return roster;
  }

  let text: string;
  try {
    text = await store.read(path);
  } catch (error) {
    if (error instanceof NotFoundError) {
      log.warn('Roster document not found, no agent can be delegated to', { path });
      return new Map();
    }
    throw error;
  }

  const agents = path.endsWith('.json')
    ? parseRosterJson(JSON.parse(text))
    : parseRosterMarkdown(text);

  const roster = buildRoster(agents);
  log.info('Roster loaded', { path, agents: Array.from(roster.keys()) });
  return roster;
}

function mentions(text: string, phrase: string): boolean {
  const boundary = /[^a-z0-9_]/;
  let from = text.indexOf(phrase);
  while (from !== -1) {
    const before = from === 0 ? ' ' : text.charAt(from - 1);
    const after = text.charAt(from + phrase.length) || ' ';
    if (boundary.test(before) && boundary.test(after)) return true;
    from = text.indexOf(phrase, from + 1);
  }
  return false;
}

/**
 * Capability tags the payload names as whole words, in enumeration order.
 * `task_routing` also matches "task routing".
 */
export function requiredCapabilities(payload: string): Capability[] {
  const text = payload.toLowerCase();
  return CAPABILITIES.filter(tag =>
    mentions(text, tag) || (tag.includes('_') && mentions(text, tag.replace(/_/g, ' ')))
  );
}

export interface SelectOptions {
  policy?: MatchPolicy;
  /** Identities that never qualify (the router itself) */
  exclude?: Iterable<string>;
}

export function satisfies(
  capabilities: CapabilitySet,
  required: readonly Capability[],
  policy: MatchPolicy
): boolean {
  if (required.length === 0) return false;
  return policy === 'superset'
    ? required.every(tag => capabilities.has(tag))
    : required.some(tag => capabilities.has(tag));
}

/**
 * Pick the agent to delegate to: every qualifying identity, sorted, first
 * one wins. Null when nothing qualifies or nothing is required.
 */
export function selectAgent(
  roster: Roster,
  required: readonly Capability[],
  options: SelectOptions = {}
): string | null {
  const policy = options.policy ?? 'superset';
  const excluded = new Set(options.exclude ?? []);

  const candidates = Array.from(roster.entries())
    .filter(([agentId, capabilities]) =>
      !excluded.has(agentId) && satisfies(capabilities, required, policy)
    )
    .map(([agentId]) => agentId)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  return candidates[0] ?? null;
}
