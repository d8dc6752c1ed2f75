import type { TenantPolicyContext } from './tenant-policy.js';

export type MemoryEventType =
  | 'fact_added'
  | 'fact_updated'
  | 'inferred_claim'
  | 'contradiction_marked'
  | 'summary_compacted';

export type MemorySource = 'explicit_user' | 'system' | 'inferred';

export type PrivacyLevel = 'public' | 'private' | 'secret';

export type MemoryLayer = 'working' | 'episodic' | 'semantic';

export type SourceKind = 'conversation' | 'manual' | 'api';

export type MemoryProvenance = {
  sourceClass: MemorySource;
  reference: string;
};

export type MemoryEventInput = {
  entityId: string;
  slotKey: string;
  layer: MemoryLayer;
  eventType: MemoryEventType;
  value: string;
  source: MemorySource;
  confidence: number;
  importance: number;
  provenance: MemoryProvenance | null;
  sourceKind: SourceKind | null;
  sourceRef: string | null;
  privacyLevel: PrivacyLevel;
  occurredAt: string;
};

export type MemoryEvent = {
  eventId: string;
  entityId: string;
  slotKey: string;
  layer: MemoryLayer;
  eventType: MemoryEventType;
  value: string;
  source: MemorySource;
  confidence: number;
  importance: number;
  provenance: MemoryProvenance | null;
  sourceKind: SourceKind | null;
  sourceRef: string | null;
  privacyLevel: PrivacyLevel;
  occurredAt: string;
  ingestedAt: string;
};

export type BeliefSlot = {
  entityId: string;
  slotKey: string;
  value: string;
  source: MemorySource;
  confidence: number;
  importance: number;
  privacyLevel: PrivacyLevel;
  updatedAt: string;
};

export type RecallQuery = {
  entityId: string;
  query: string;
  limit: number;
  policyContext: TenantPolicyContext;
};

export type MemoryRecallItem = {
  entityId: string;
  slotKey: string;
  value: string;
  source: MemorySource;
  confidence: number;
  importance: number;
  privacyLevel: PrivacyLevel;
  score: number;
  occurredAt: string;
};

export type MemoryEventFilter = {
  entityId?: string;
  slotKey?: string;
  limit?: number;
};

export type Memory = {
  appendEvent(input: MemoryEventInput): Promise<MemoryEvent>;
  countEvents(entityId?: string): Promise<number>;
  resolveSlot(entityId: string, slotKey: string): Promise<BeliefSlot | null>;
  listEvents(filter: MemoryEventFilter): Promise<MemoryEvent[]>;
  recall(query: RecallQuery): Promise<MemoryRecallItem[]>;
};

const DEFAULT_CONFIDENCE: Record<MemorySource, number> = {
  explicit_user: 0.95,
  system: 0.9,
  inferred: 0.7
};

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Build an event input from the required fields. Optional fields take the
 * store defaults: working layer, source-derived confidence, importance 0.5,
 * no provenance and the current time.
 */
export function createMemoryEvent(
  required: Pick<MemoryEventInput, 'entityId' | 'slotKey' | 'eventType' | 'value' | 'source' | 'privacyLevel'>,
  optional: Partial<Omit<MemoryEventInput, 'entityId' | 'slotKey' | 'eventType' | 'value' | 'source' | 'privacyLevel'>> = {}
): MemoryEventInput {
  return {
    ...required,
    layer: optional.layer ?? 'working',
    confidence: clampUnit(optional.confidence ?? DEFAULT_CONFIDENCE[required.source]),
    importance: clampUnit(optional.importance ?? 0.5),
    provenance: optional.provenance ?? null,
    sourceKind: optional.sourceKind ?? null,
    sourceRef: optional.sourceRef ?? null,
    occurredAt: optional.occurredAt ?? new Date().toISOString()
  };
}

/** Provenance whose source class mirrors the event source, as the write policies require. */
export function provenanceFor(source: MemorySource, reference: string): MemoryProvenance {
  return { sourceClass: source, reference };
}

export function personEntityId(personId: string): string {
  return `person:${personId}`;
}
