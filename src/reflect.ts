import type { ChatProvider } from './chat-provider.js';
import { isJsonObject } from './json-helpers.js';
import { logger } from './logger.js';
import { createMemoryEvent, personEntityId, provenanceFor } from './memory-types.js';
import type { Memory } from './memory-types.js';
import { recordWritebackVerdict } from './metrics.js';
import type { PersonaStatePersistence } from './persona-state.js';
import type { PersonaLimits } from './runtime-config.js';
import { immutableFieldsOf, stateHeaderToJson, validateWritebackCandidate } from './state-header.js';
import type { StateHeader } from './state-header.js';
import { PERSONA_WRITEBACK_SLOT_PREFIX, enforcePersonaLongTermWritePolicy } from './write-policy.js';
import { validateWritebackPayload } from './writeback-guard.js';

const MEMORY_APPEND_PROVENANCE_REF = 'persona.reflect.memory_append';

export const PERSONA_REFLECT_SYSTEM_PROMPT = `You are a deterministic reflection/writeback stage.
Output must be a single strict JSON object, with no markdown and no extra text.

Required top-level shape:
{
  "state_header": {
    "schema_version": number,
    "identity_principles_hash": string,
    "safety_posture": string,
    "current_objective": string,
    "open_loops": string[],
    "next_actions": string[],
    "commitments": string[],
    "recent_context_summary": string,
    "last_updated_at": string (RFC3339)
  },
  "memory_append": string[]
}

Do not include unknown keys.
Do not change immutable fields.
If uncertain, keep mutable values close to current state.`;

export function buildReflectMessage(canonical: StateHeader | null, userMessage: string, answer: string): string {
  const canonicalJson = canonical ? JSON.stringify(stateHeaderToJson(canonical), null, 2) : 'null';
  return `Current canonical state header (JSON):\n${canonicalJson}\n\n`
    + `Latest user message:\n${userMessage}\n\n`
    + `Latest assistant answer:\n${answer}\n\n`
    + 'Return only the strict JSON payload.';
}

export function parseReflectPayload(raw: string): Record<string, unknown> {
  const payload: unknown = JSON.parse(raw.trim());
  if (!isJsonObject(payload)) {
    throw new Error('reflect output must be a JSON object');
  }
  return payload;
}

export type ReflectWritebackParams = {
  memory: Memory;
  persistence: PersonaStatePersistence;
  provider: ChatProvider;
  model: string;
  personId: string;
  limits: PersonaLimits;
  userMessage: string;
  answer: string;
};

export type ReflectWritebackOutcome = 'persisted' | 'no_canonical_state' | 'rejected';

/**
 * Ask the reflect provider for a state-header writeback and persist it when
 * the guard accepts. Guard rejections are reported, not thrown; provider,
 * parse and storage failures throw for the caller to log.
 */
export async function runPersonaReflectWriteback(params: ReflectWritebackParams): Promise<ReflectWritebackOutcome> {
  const canonical = await params.persistence.loadCanonical();
  const raw = await params.provider.chatWithSystem(
    PERSONA_REFLECT_SYSTEM_PROMPT,
    buildReflectMessage(canonical, params.userMessage, params.answer),
    params.model,
    0
  );
  const payload = parseReflectPayload(raw);

  if (!canonical) {
    logger.warn({ personId: params.personId }, 'persona reflect produced payload but canonical state header is missing');
    return 'no_canonical_state';
  }

  const verdict = validateWritebackPayload(payload, immutableFieldsOf(canonical));
  recordWritebackVerdict(verdict.status);
  if (verdict.status === 'rejected') {
    logger.warn({ personId: params.personId, reason: verdict.reason }, 'persona writeback rejected by guard');
    return 'rejected';
  }

  const accepted = verdict.payload;
  const candidate: StateHeader = {
    ...immutableFieldsOf(canonical),
    currentObjective: accepted.stateHeader.currentObjective,
    openLoops: accepted.stateHeader.openLoops,
    nextActions: accepted.stateHeader.nextActions,
    commitments: accepted.stateHeader.commitments,
    recentContextSummary: accepted.stateHeader.recentContextSummary,
    lastUpdatedAt: accepted.stateHeader.lastUpdatedAt
  };
  validateWritebackCandidate(canonical, candidate, params.limits);
  await params.persistence.persistAndSync(candidate);

  for (const [idx, entry] of accepted.memoryAppend.entries()) {
    const sourceRef = `persona-reflect-memory-append:${idx}`;
    const event = createMemoryEvent(
      {
        entityId: personEntityId(params.personId),
        slotKey: `${PERSONA_WRITEBACK_SLOT_PREFIX}${idx}`,
        eventType: 'summary_compacted',
        value: entry,
        source: 'system',
        privacyLevel: 'private'
      },
      {
        layer: 'semantic',
        confidence: 0.9,
        importance: 0.8,
        sourceKind: 'manual',
        sourceRef,
        provenance: provenanceFor('system', MEMORY_APPEND_PROVENANCE_REF),
        occurredAt: candidate.lastUpdatedAt
      }
    );
    enforcePersonaLongTermWritePolicy(event, params.personId);
    await params.memory.appendEvent(event);
  }
  return 'persisted';
}
