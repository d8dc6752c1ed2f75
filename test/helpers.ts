import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ChatProvider } from '../src/chat-provider.js';
import { buildRuntimeConfig } from '../src/runtime-config.js';
import type { RuntimeConfig } from '../src/runtime-config.js';
import type { StateHeader } from '../src/state-header.js';

export function makeTempDir(prefix = 'keelson-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(overrides: unknown = null): RuntimeConfig {
  return buildRuntimeConfig(overrides);
}

export function sampleStateHeader(overrides: Partial<StateHeader> = {}): StateHeader {
  return {
    schemaVersion: 1,
    identityPrinciplesHash: 'identity-v1-abcd1234',
    safetyPosture: 'strict',
    currentObjective: 'Ship a safe writeback guard',
    openLoops: ['Add fuzz tests'],
    nextActions: ['Run integration tests'],
    commitments: ['Keep immutable fields stable'],
    recentContextSummary: 'Planning and validation in progress.',
    lastUpdatedAt: '2026-02-16T10:00:00Z',
    ...overrides
  };
}

/** Wire-form writeback payload built from a state header. */
export function writebackPayloadFor(state: StateHeader, memoryAppend?: unknown): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    state_header: {
      schema_version: state.schemaVersion,
      identity_principles_hash: state.identityPrinciplesHash,
      safety_posture: state.safetyPosture,
      current_objective: state.currentObjective,
      open_loops: state.openLoops,
      next_actions: state.nextActions,
      commitments: state.commitments,
      recent_context_summary: state.recentContextSummary,
      last_updated_at: state.lastUpdatedAt
    }
  };
  if (memoryAppend !== undefined) payload.memory_append = memoryAppend;
  return payload;
}

export type RecordedCall = {
  systemPrompt: string | null;
  message: string;
  model: string;
  temperature: number;
};

type ScriptedReply = string | Error | ((call: RecordedCall) => string);

/** Replays scripted replies in order; the last reply repeats once the script runs out. */
export class ScriptedProvider implements ChatProvider {
  readonly calls: RecordedCall[] = [];
  private index = 0;

  constructor(private readonly replies: ScriptedReply[]) {}

  async chatWithSystem(systemPrompt: string | null, message: string, model: string, temperature: number): Promise<string> {
    const call = { systemPrompt, message, model, temperature };
    this.calls.push(call);
    const reply = this.replies[Math.min(this.index, this.replies.length - 1)];
    this.index += 1;
    if (reply === undefined) throw new Error('no scripted reply');
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(call);
    return reply;
  }
}
