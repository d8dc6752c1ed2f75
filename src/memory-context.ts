import type { Memory } from './memory-types.js';
import type { TenantPolicyContext } from './tenant-policy.js';

const RECALL_LIMIT = 8;
const EXTERNAL_SLOT_PREFIX = 'external.';
const EXTERNAL_OMITTED = '[external payload omitted by replay-ban policy]';

export type ContextBuilder = {
  build(entityId: string, userMessage: string, policyContext: TenantPolicyContext): Promise<string>;
};

/**
 * Prompt preamble from recalled memory. Raw external payloads are never
 * replayed into the prompt; only their slot key is shown.
 */
export async function buildMemoryContext(
  memory: Memory,
  entityId: string,
  userMessage: string,
  policyContext: TenantPolicyContext
): Promise<string> {
  const entries = await memory.recall({ entityId, query: userMessage, limit: RECALL_LIMIT, policyContext });
  if (entries.length === 0) return '';
  const lines = ['[Memory context]'];
  for (const entry of entries) {
    const value = entry.slotKey.startsWith(EXTERNAL_SLOT_PREFIX) ? EXTERNAL_OMITTED : entry.value;
    lines.push(`- ${entry.slotKey}: ${value}`);
  }
  return `${lines.join('\n')}\n\n`;
}

export function createMemoryContextBuilder(memory: Memory): ContextBuilder {
  return {
    build(entityId, userMessage, policyContext) {
      return buildMemoryContext(memory, entityId, userMessage, policyContext);
    }
  };
}
