/**
 * Terminal formatting utilities for CLI output
 */

import type { TaskState, TaskStatusSnapshot } from '../../types.js';

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
} as const;

export function stateIcon(state: TaskState): string {
  switch (state) {
    case 'SUBMITTED':
      return '\u25cb'; // ○ empty circle
    case 'DELEGATED':
      return '\u25cf'; // ● filled circle
    case 'COMPLETED':
      return '\u2713'; // ✓ check mark
    case 'FAILED':
      return '\u2717'; // ✗ x mark
  }
}

export function stateColor(state: TaskState): string {
  switch (state) {
    case 'SUBMITTED':
      return colors.gray;
    case 'DELEGATED':
      return colors.yellow;
    case 'COMPLETED':
      return colors.green;
    case 'FAILED':
      return colors.red;
  }
}

/**
 * Truncate text to max length with ellipsis
 */
export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) {
    return text;
  }
  return text.slice(0, maxLen - 1) + '\u2026';
}

/**
 * One line per task: icon, padded id, state. Colors only when asked.
 */
export function formatSnapshot(snapshot: TaskStatusSnapshot, useColors = false): string[] {
  const ids = Object.keys(snapshot);
  const width = Math.max(0, ...ids.map(id => id.length));

  return ids.map(id => {
    const state = snapshot[id];
    if (state === undefined) return id;
    const line = `${stateIcon(state)} ${id.padEnd(width)}  ${state}`;
    return useColors ? `${stateColor(state)}${line}${colors.reset}` : line;
  });
}

export function shouldUseColors(): boolean {
  return process.stdout.isTTY === true && process.env.NO_COLOR === undefined;
}
