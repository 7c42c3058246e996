/**
 * Probe worker - validates routing, signaling and file-based state end to end
 */

import type { DelegatedTask } from '../types.js';
import { Worker, type WorkerOptions } from './runtime.js';

export const PROBE_REPORT = `# Probe Agent Report

The router delegated this task correctly.
Event signaling works.
File-based state works.
`;

export class ProbeWorker extends Worker {
  constructor(options: Omit<WorkerOptions, 'id' | 'capabilities'> & { id?: string }) {
    super({ ...options, id: options.id ?? 'probe', capabilities: ['probe'] });
  }

  protected async perform(_task: DelegatedTask): Promise<string> {
    return PROBE_REPORT;
  }
}
