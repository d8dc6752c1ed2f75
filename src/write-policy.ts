import { WritePolicyError } from './errors.js';
import { personEntityId } from './memory-types.js';
import type { MemoryEventInput } from './memory-types.js';

export const VERIFY_REPAIR_ESCALATION_SLOT = 'autonomy.verify_repair.escalation';
export const AUTOSAVE_USER_SLOT = 'conversation.user_msg';
export const AUTOSAVE_ASSISTANT_SLOT = 'conversation.assistant_resp';
export const PERSONA_WRITEBACK_SLOT_PREFIX = 'persona.writeback.';

/** Slot namespaces owned by the control plane; model output may not write into them. */
export const RESERVED_SLOT_PREFIXES = [
  'persona/',
  PERSONA_WRITEBACK_SLOT_PREFIX,
  'autonomy.',
  'conversation.',
  'consolidation.'
] as const;

export function isReservedSlotKey(slotKey: string): boolean {
  return RESERVED_SLOT_PREFIXES.some((prefix) => slotKey.startsWith(prefix));
}

export function personaCanonicalSlotPrefix(personId: string): string {
  return `persona/${personId}/state_header/`;
}

function deny(message: string): never {
  throw new WritePolicyError(message);
}

function requireCommonWriteMetadata(event: MemoryEventInput): void {
  if (event.sourceRef === null) deny('write policy requires source_ref');
  if (!event.sourceRef.trim()) deny('write policy source_ref must not be empty');
  if (!event.provenance) deny('write policy requires provenance');
  if (event.provenance.sourceClass !== event.source) {
    deny('write policy requires provenance.source_class to match source');
  }
  if (!event.provenance.reference.trim()) deny('write policy requires provenance.reference');
}

/**
 * Persona writes are system-sourced, private, manual and scoped to the
 * persona's own entity. Long-term notes live under `persona.writeback.*`,
 * the canonical state header under `persona/<id>/state_header/`.
 */
export function enforcePersonaLongTermWritePolicy(event: MemoryEventInput, personId: string): void {
  if (event.source !== 'system') deny('persona writeback policy requires source=system');
  if (event.privacyLevel !== 'private') deny('persona writeback policy requires privacy_level=private');
  if (event.sourceKind !== 'manual') deny('persona writeback policy requires source_kind=manual');
  requireCommonWriteMetadata(event);
  if (event.entityId !== personEntityId(personId)) deny('persona writeback policy entity_id mismatch');

  if (event.slotKey.startsWith(PERSONA_WRITEBACK_SLOT_PREFIX)) {
    if (event.eventType !== 'summary_compacted') {
      deny('persona writeback entries must use event_type=summary_compacted');
    }
    return;
  }
  if (event.slotKey.startsWith(personaCanonicalSlotPrefix(personId))) {
    if (event.eventType !== 'fact_updated') {
      deny('persona canonical state writes must use event_type=fact_updated');
    }
    return;
  }
  deny('persona writeback policy rejected slot_key');
}

export function enforceAgentAutosaveWritePolicy(event: MemoryEventInput): void {
  if (event.privacyLevel !== 'private') deny('agent autosave policy requires privacy_level=private');
  if (event.sourceKind !== 'conversation') deny('agent autosave policy requires source_kind=conversation');
  if (event.eventType !== 'fact_added') deny('agent autosave policy requires event_type=fact_added');
  if (event.slotKey !== AUTOSAVE_USER_SLOT && event.slotKey !== AUTOSAVE_ASSISTANT_SLOT) {
    deny('agent autosave policy rejected slot_key');
  }
  if (event.source !== 'explicit_user' && event.source !== 'system') {
    deny('agent autosave policy rejected source');
  }
  requireCommonWriteMetadata(event);
}

export function enforceInferenceWritePolicy(event: MemoryEventInput): void {
  if (event.privacyLevel !== 'private') deny('inference write policy requires privacy_level=private');
  if (event.sourceKind !== 'conversation') deny('inference write policy requires source_kind=conversation');
  if (event.source !== 'inferred' && event.source !== 'system') {
    deny('inference write policy rejected source');
  }
  if (event.eventType !== 'inferred_claim' && event.eventType !== 'contradiction_marked') {
    deny('inference write policy rejected event_type');
  }
  if (isReservedSlotKey(event.slotKey)) deny('inference write policy rejected reserved slot_key');
  requireCommonWriteMetadata(event);
}

export function enforceVerifyRepairWritePolicy(event: MemoryEventInput): void {
  if (event.source !== 'system') deny('verify-repair write policy requires source=system');
  if (event.privacyLevel !== 'private') deny('verify-repair write policy requires privacy_level=private');
  if (event.sourceKind !== 'manual') deny('verify-repair write policy requires source_kind=manual');
  if (event.slotKey !== VERIFY_REPAIR_ESCALATION_SLOT) deny('verify-repair write policy rejected slot_key');
  if (event.eventType !== 'summary_compacted') {
    deny('verify-repair write policy requires event_type=summary_compacted');
  }
  requireCommonWriteMetadata(event);
}
