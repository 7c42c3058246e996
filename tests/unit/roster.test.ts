/**
 * Roster parsing and capability matching tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  buildRoster,
  loadRoster,
  parseRosterJson,
  parseRosterMarkdown,
  requiredCapabilities,
  satisfies,
  selectAgent,
} from '../../src/agents/roster.js';
import { MemoryStateStore } from '../../src/store/memory-store.js';
import type { Capability, Roster } from '../../src/types.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

const MARKDOWN_ROSTER = `# Agent Roster

Agents and what they may do.

## librarian

capabilities:
- task_routing
- spec_consolidation
- coordination

permissions:
- read: logs/

## probe

capabilities:
  - probe
  - Telepathy
`;

function roster(entries: Record<string, Capability[]>): Roster {
  return new Map(Object.entries(entries).map(([id, tags]) => [id, new Set(tags)]));
}

describe('parseRosterMarkdown', () => {
  it('should read identities with their capabilities and permissions', () => {
    expect(parseRosterMarkdown(MARKDOWN_ROSTER)).toEqual([
      {
        agentId: 'librarian',
        capabilities: ['task_routing', 'spec_consolidation', 'coordination'],
        permissions: ['read: logs/'],
      },
      {
        agentId: 'probe',
        capabilities: ['probe', 'Telepathy'],
        permissions: [],
      },
    ]);
  });

  it('should ignore list items outside a known section', () => {
    const agents = parseRosterMarkdown('## probe\n\nnotes:\n- not a capability\n');
    expect(agents).toEqual([{ agentId: 'probe', capabilities: [], permissions: [] }]);
  });
});

describe('parseRosterJson', () => {
  it('should read the JSON document', () => {
    expect(parseRosterJson({ agents: { probe: { capabilities: ['probe'] } } })).toEqual([
      { agentId: 'probe', capabilities: ['probe'], permissions: [] },
    ]);
  });

  it('should reject malformed documents', () => {
    expect(() => parseRosterJson({ agents: [] })).toThrow('Invalid roster document');
  });
});

describe('buildRoster', () => {
  it('should normalize tags and skip unknown ones', () => {
    const built = buildRoster(parseRosterMarkdown(MARKDOWN_ROSTER));

    expect(Array.from(built.keys())).toEqual(['librarian', 'probe']);
    expect(Array.from(built.get('probe') ?? [])).toEqual(['probe']);
  });

  it('should skip identities the bus would reject', () => {
    const built = buildRoster(
      parseRosterMarkdown('## probe agent\ncapabilities:\n  - probe\n\n## probe\ncapabilities:\n  - probe\n')
    );

    expect(Array.from(built.keys())).toEqual(['probe']);
  });

  it('should keep the first declaration of a repeated identity', () => {
    const built = buildRoster([
      { agentId: 'probe', capabilities: ['probe'], permissions: [] },
      { agentId: 'probe', capabilities: ['testing'], permissions: [] },
    ]);

    expect(Array.from(built.get('probe') ?? [])).toEqual(['probe']);
  });
});

describe('loadRoster', () => {
  it('should load the Markdown document from the store', async () => {
    const store = new MemoryStateStore({ 'docs/agent_roster.md': MARKDOWN_ROSTER });

    const loaded = await loadRoster(store, 'docs/agent_roster.md');

    expect(loaded.get('librarian')?.has('task_routing')).toBe(true);
  });

  it('should load a JSON document by extension', async () => {
    const store = new MemoryStateStore({
      'docs/roster.json': JSON.stringify({ agents: { reviewer: { capabilities: ['code_review'] } } }),
    });

    const loaded = await loadRoster(store, 'docs/roster.json');

    expect(Array.from(loaded.keys())).toEqual(['reviewer']);
  });

  it('should prefer an inline roster', async () => {
    const store = new MemoryStateStore({ 'docs/agent_roster.md': MARKDOWN_ROSTER });

    const loaded = await loadRoster(store, 'docs/agent_roster.md', {
      agents: { solo: { capabilities: ['probe'] } },
    });

    expect(Array.from(loaded.keys())).toEqual(['solo']);
  });

  it('should return an empty roster when the document is missing', async () => {
    const loaded = await loadRoster(new MemoryStateStore(), 'docs/agent_roster.md');

    expect(loaded.size).toBe(0);
  });
});

describe('requiredCapabilities', () => {
  it('should find tags named in the payload', () => {
    expect(requiredCapabilities('probe validation test')).toEqual(['probe']);
  });

  it('should match underscored tags written with spaces', () => {
    expect(requiredCapabilities('Please do a Code Review, then testing')).toEqual(['code_review', 'testing']);
  });

  it('should match whole words only', () => {
    expect(requiredCapabilities('probes and retesting')).toEqual([]);
    expect(requiredCapabilities('probe-only task')).toEqual(['probe']);
  });

  it('should return tags in enumeration order', () => {
    expect(requiredCapabilities('research then probe then task_routing')).toEqual([
      'task_routing',
      'probe',
      'research',
    ]);
  });
});

describe('satisfies', () => {
  const caps: ReadonlySet<Capability> = new Set<Capability>(['probe', 'testing']);

  it('should require every tag under superset', () => {
    expect(satisfies(caps, ['probe', 'testing'], 'superset')).toBe(true);
    expect(satisfies(caps, ['probe', 'research'], 'superset')).toBe(false);
  });

  it('should require any tag under intersect', () => {
    expect(satisfies(caps, ['probe', 'research'], 'intersect')).toBe(true);
    expect(satisfies(caps, ['research'], 'intersect')).toBe(false);
  });

  it('should never match an empty requirement', () => {
    expect(satisfies(caps, [], 'superset')).toBe(false);
  });
});

describe('selectAgent', () => {
  const team = roster({
    librarian: ['task_routing', 'probe'],
    zeta: ['probe', 'testing'],
    alpha: ['probe'],
    reviewer: ['code_review'],
  });

  it('should pick the lexicographically smallest qualifying identity', () => {
    expect(selectAgent(team, ['probe'])).toBe('alpha');
  });

  it('should exclude the given identities', () => {
    const withRouterFirst = roster({ aaa: ['probe'], probe: ['probe'] });
    expect(selectAgent(withRouterFirst, ['probe'], { exclude: ['aaa'] })).toBe('probe');
  });

  it('should apply the superset policy by default', () => {
    expect(selectAgent(team, ['probe', 'testing'])).toBe('zeta');
  });

  it('should apply the intersect policy when asked', () => {
    expect(selectAgent(team, ['testing', 'code_review'], { policy: 'intersect' })).toBe('reviewer');
  });

  it('should return null when nothing qualifies', () => {
    expect(selectAgent(team, ['documentation'])).toBeNull();
    expect(selectAgent(team, [])).toBeNull();
    expect(selectAgent(new Map(), ['probe'])).toBeNull();
  });

  it('should be deterministic regardless of roster order', () => {
    const reversed = new Map(Array.from(team.entries()).reverse());
    expect(selectAgent(reversed, ['probe'])).toBe(selectAgent(team, ['probe']));
  });
});
