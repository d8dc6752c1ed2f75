import Database from 'better-sqlite3';
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { enforceRecallScope } from './tenant-policy.js';
import type {
  BeliefSlot,
  Memory,
  MemoryEvent,
  MemoryEventFilter,
  MemoryEventInput,
  MemoryEventType,
  MemoryLayer,
  MemoryRecallItem,
  MemorySource,
  PrivacyLevel,
  RecallQuery,
  SourceKind
} from './memory-types.js';

type MemoryEventRow = {
  event_id: string;
  entity_id: string;
  slot_key: string;
  layer: MemoryLayer;
  event_type: MemoryEventType;
  value: string;
  source: MemorySource;
  confidence: number;
  importance: number;
  provenance_source_class: MemorySource | null;
  provenance_reference: string | null;
  source_kind: SourceKind | null;
  source_ref: string | null;
  privacy_level: PrivacyLevel;
  occurred_at: string;
  ingested_at: string;
};

const SOURCE_PRIORITY: Record<MemorySource, number> = {
  explicit_user: 3,
  system: 2,
  inferred: 1
};

type SlotStanding = Pick<BeliefSlotRow, 'source' | 'confidence' | 'updated_at'>;

function compareTimestamps(a: string, b: string): number {
  const left = Date.parse(a);
  const right = Date.parse(b);
  if (Number.isNaN(left) || Number.isNaN(right)) return a.localeCompare(b);
  return Math.sign(left - right);
}

/**
 * Slot winner rule: higher source priority, then higher confidence, then a
 * strictly later occurrence. Ties keep the incumbent.
 */
export function candidateReplacesSlot(
  candidate: { source: MemorySource; confidence: number; occurredAt: string },
  incumbent: { source: MemorySource; confidence: number; updatedAt: string } | null
): boolean {
  if (!incumbent) return true;
  const priority = SOURCE_PRIORITY[candidate.source] - SOURCE_PRIORITY[incumbent.source];
  if (priority !== 0) return priority > 0;
  if (candidate.confidence !== incumbent.confidence) return candidate.confidence > incumbent.confidence;
  return compareTimestamps(candidate.occurredAt, incumbent.updatedAt) > 0;
}

type BeliefSlotRow = {
  entity_id: string;
  slot_key: string;
  value: string;
  source: MemorySource;
  confidence: number;
  importance: number;
  privacy_level: PrivacyLevel;
  updated_at: string;
};

const DEFAULT_LIST_LIMIT = 50;
const MIN_RECALL_TOKEN_CHARS = 3;

function rowToEvent(row: MemoryEventRow): MemoryEvent {
  return {
    eventId: row.event_id,
    entityId: row.entity_id,
    slotKey: row.slot_key,
    layer: row.layer,
    eventType: row.event_type,
    value: row.value,
    source: row.source,
    confidence: row.confidence,
    importance: row.importance,
    provenance: row.provenance_source_class && row.provenance_reference !== null
      ? { sourceClass: row.provenance_source_class, reference: row.provenance_reference }
      : null,
    sourceKind: row.source_kind,
    sourceRef: row.source_ref,
    privacyLevel: row.privacy_level,
    occurredAt: row.occurred_at,
    ingestedAt: row.ingested_at
  };
}

function rowToSlot(row: BeliefSlotRow): BeliefSlot {
  return {
    entityId: row.entity_id,
    slotKey: row.slot_key,
    value: row.value,
    source: row.source,
    confidence: row.confidence,
    importance: row.importance,
    privacyLevel: row.privacy_level,
    updatedAt: row.updated_at
  };
}

function recallTokens(query: string): string[] {
  const tokens = query
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= MIN_RECALL_TOKEN_CHARS);
  return Array.from(new Set(tokens));
}

/**
 * Append-only event log with a materialized latest-value view per
 * (entity, slot). Backed by better-sqlite3; pass ':memory:' for an
 * ephemeral store.
 */
export class SqliteMemory implements Memory {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 3000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memory_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id TEXT NOT NULL UNIQUE,
        entity_id TEXT NOT NULL,
        slot_key TEXT NOT NULL,
        layer TEXT NOT NULL,
        event_type TEXT NOT NULL,
        value TEXT NOT NULL,
        source TEXT NOT NULL,
        confidence REAL NOT NULL,
        importance REAL NOT NULL,
        provenance_source_class TEXT,
        provenance_reference TEXT,
        source_kind TEXT,
        source_ref TEXT,
        privacy_level TEXT NOT NULL,
        occurred_at TEXT NOT NULL,
        ingested_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_memory_events_entity_slot ON memory_events(entity_id, slot_key);

      CREATE TABLE IF NOT EXISTS belief_slots (
        entity_id TEXT NOT NULL,
        slot_key TEXT NOT NULL,
        value TEXT NOT NULL,
        source TEXT NOT NULL,
        confidence REAL NOT NULL,
        importance REAL NOT NULL,
        privacy_level TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (entity_id, slot_key)
      );
    `);
  }

  async appendEvent(input: MemoryEventInput): Promise<MemoryEvent> {
    if (!input.entityId.trim()) throw new Error('memory event entity_id must not be empty');
    if (!input.slotKey.trim()) throw new Error('memory event slot_key must not be empty');
    const row: MemoryEventRow = {
      event_id: crypto.randomUUID(),
      entity_id: input.entityId,
      slot_key: input.slotKey,
      layer: input.layer,
      event_type: input.eventType,
      value: input.value,
      source: input.source,
      confidence: input.confidence,
      importance: input.importance,
      provenance_source_class: input.provenance?.sourceClass ?? null,
      provenance_reference: input.provenance?.reference ?? null,
      source_kind: input.sourceKind,
      source_ref: input.sourceRef,
      privacy_level: input.privacyLevel,
      occurred_at: input.occurredAt,
      ingested_at: new Date().toISOString()
    };
    const insertEvent = this.db.prepare<MemoryEventRow>(`
      INSERT INTO memory_events (
        event_id, entity_id, slot_key, layer, event_type, value, source, confidence, importance,
        provenance_source_class, provenance_reference, source_kind, source_ref, privacy_level,
        occurred_at, ingested_at
      ) VALUES (
        @event_id, @entity_id, @slot_key, @layer, @event_type, @value, @source, @confidence, @importance,
        @provenance_source_class, @provenance_reference, @source_kind, @source_ref, @privacy_level,
        @occurred_at, @ingested_at
      )
    `);
    const upsertSlot = this.db.prepare<BeliefSlotRow>(`
      INSERT INTO belief_slots (entity_id, slot_key, value, source, confidence, importance, privacy_level, updated_at)
      VALUES (@entity_id, @slot_key, @value, @source, @confidence, @importance, @privacy_level, @updated_at)
      ON CONFLICT(entity_id, slot_key) DO UPDATE SET
        value = excluded.value,
        source = excluded.source,
        confidence = excluded.confidence,
        importance = excluded.importance,
        privacy_level = excluded.privacy_level,
        updated_at = excluded.updated_at
    `);
    const currentSlot = this.db.prepare<[string, string], SlotStanding>(
      'SELECT source, confidence, updated_at FROM belief_slots WHERE entity_id = ? AND slot_key = ?'
    );
    const tx = this.db.transaction(() => {
      insertEvent.run(row);
      const incumbent = currentSlot.get(row.entity_id, row.slot_key);
      const replaces = candidateReplacesSlot(
        { source: row.source, confidence: row.confidence, occurredAt: row.occurred_at },
        incumbent
          ? { source: incumbent.source, confidence: incumbent.confidence, updatedAt: incumbent.updated_at }
          : null
      );
      if (!replaces) return;
      upsertSlot.run({
        entity_id: row.entity_id,
        slot_key: row.slot_key,
        value: row.value,
        source: row.source,
        confidence: row.confidence,
        importance: row.importance,
        privacy_level: row.privacy_level,
        updated_at: row.occurred_at
      });
    });
    tx();
    return rowToEvent(row);
  }

  async countEvents(entityId?: string): Promise<number> {
    if (entityId === undefined) {
      const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM memory_events').get();
      return row?.count ?? 0;
    }
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM memory_events WHERE entity_id = ?')
      .get(entityId);
    return row?.count ?? 0;
  }

  async resolveSlot(entityId: string, slotKey: string): Promise<BeliefSlot | null> {
    const row = this.db
      .prepare<[string, string], BeliefSlotRow>('SELECT * FROM belief_slots WHERE entity_id = ? AND slot_key = ?')
      .get(entityId, slotKey);
    return row ? rowToSlot(row) : null;
  }

  async listEvents(filter: MemoryEventFilter): Promise<MemoryEvent[]> {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.entityId !== undefined) {
      clauses.push('entity_id = ?');
      params.push(filter.entityId);
    }
    if (filter.slotKey !== undefined) {
      clauses.push('slot_key = ?');
      params.push(filter.slotKey);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = Math.max(1, Math.floor(filter.limit ?? DEFAULT_LIST_LIMIT));
    const rows = this.db
      .prepare<string[], MemoryEventRow>(`SELECT * FROM memory_events ${where} ORDER BY seq DESC LIMIT ${limit}`)
      .all(...params);
    return rows.map(rowToEvent);
  }

  /**
   * Keyword recall over the latest slot values of one entity. Secret
   * entries are never returned.
   */
  async recall(query: RecallQuery): Promise<MemoryRecallItem[]> {
    enforceRecallScope(query.policyContext, query.entityId);
    const tokens = recallTokens(query.query);
    if (tokens.length === 0 || query.limit <= 0) return [];
    const rows = this.db
      .prepare<[string], BeliefSlotRow>(
        "SELECT * FROM belief_slots WHERE entity_id = ? AND privacy_level != 'secret'"
      )
      .all(query.entityId);

    const scored: MemoryRecallItem[] = [];
    for (const row of rows) {
      const haystack = `${row.slot_key} ${row.value}`.toLowerCase();
      const hits = tokens.filter((token) => haystack.includes(token)).length;
      if (hits === 0) continue;
      scored.push({
        entityId: row.entity_id,
        slotKey: row.slot_key,
        value: row.value,
        source: row.source,
        confidence: row.confidence,
        importance: row.importance,
        privacyLevel: row.privacy_level,
        score: hits / tokens.length,
        occurredAt: row.updated_at
      });
    }
    scored.sort((a, b) => b.score - a.score || b.importance - a.importance);
    return scored.slice(0, query.limit);
  }

  close(): void {
    this.db.close();
  }
}
