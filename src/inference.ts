import { createMemoryEvent, provenanceFor } from './memory-types.js';
import type { Memory, MemoryEventInput } from './memory-types.js';
import { enforceWriteScope } from './tenant-policy.js';
import type { MemoryWriteContext } from './tenant-policy.js';
import { enforceInferenceWritePolicy } from './write-policy.js';

const INFERRED_PREFIX = 'INFERRED_CLAIM ';
const CONTRADICTION_PREFIX = 'CONTRADICTION_EVENT ';

export type InferenceEvent = {
  kind: 'inferred_claim' | 'contradiction';
  slotKey: string;
  value: string;
};

function parseInferencePayload(payload: string): { slotKey: string; value: string } | null {
  const separator = payload.indexOf('=>');
  if (separator < 0) return null;
  const slotKey = payload.slice(0, separator).trim();
  const value = payload.slice(separator + 2).trim();
  if (!slotKey || !value) return null;
  return { slotKey, value };
}

/** Directive lines in an answer, e.g. `INFERRED_CLAIM pref.lang => TypeScript`. */
export function parseInferenceEvents(assistantResponse: string): InferenceEvent[] {
  const events: InferenceEvent[] = [];
  for (const rawLine of assistantResponse.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith(INFERRED_PREFIX)) {
      const parsed = parseInferencePayload(line.slice(INFERRED_PREFIX.length));
      if (parsed) events.push({ kind: 'inferred_claim', ...parsed });
    } else if (line.startsWith(CONTRADICTION_PREFIX)) {
      const parsed = parseInferencePayload(line.slice(CONTRADICTION_PREFIX.length));
      if (parsed) events.push({ kind: 'contradiction', ...parsed });
    }
  }
  return events;
}

export function inferenceEventInput(entityId: string, event: InferenceEvent): MemoryEventInput {
  if (event.kind === 'inferred_claim') {
    const reference = 'inference.post_turn.inferred_claim';
    return createMemoryEvent(
      { entityId, slotKey: event.slotKey, eventType: 'inferred_claim', value: event.value, source: 'inferred', privacyLevel: 'private' },
      {
        layer: 'semantic',
        confidence: 0.7,
        importance: 0.5,
        sourceKind: 'conversation',
        sourceRef: reference,
        provenance: provenanceFor('inferred', reference)
      }
    );
  }
  const reference = 'inference.post_turn.contradiction_event';
  return createMemoryEvent(
    { entityId, slotKey: event.slotKey, eventType: 'contradiction_marked', value: event.value, source: 'system', privacyLevel: 'private' },
    {
      layer: 'episodic',
      confidence: 0.85,
      importance: 0.8,
      sourceKind: 'conversation',
      sourceRef: reference,
      provenance: provenanceFor('system', reference)
    }
  );
}

/** Returns the number of events written. */
export async function runPostTurnInferencePass(
  memory: Memory,
  writeContext: MemoryWriteContext,
  assistantResponse: string
): Promise<number> {
  enforceWriteScope(writeContext);
  const events = parseInferenceEvents(assistantResponse);
  for (const event of events) {
    const input = inferenceEventInput(writeContext.entityId, event);
    enforceInferenceWritePolicy(input);
    await memory.appendEvent(input);
  }
  return events.length;
}
