import fs from 'fs';
import path from 'path';
import { createMemoryEvent, personEntityId, provenanceFor } from './memory-types.js';
import type { Memory } from './memory-types.js';
import type { PersonaLimits } from './runtime-config.js';
import { parseStateHeaderJson, stateHeaderToJson, validateStateHeader } from './state-header.js';
import type { StateHeader } from './state-header.js';
import { enforcePersonaLongTermWritePolicy, personaCanonicalSlotPrefix } from './write-policy.js';

const STATE_HEADER_MIRROR_HEADER = '# Persona State Header\n\nbackend_canonical: true\n\n';
const CANONICAL_SOURCE_REF = 'persona.state_header.canonical';

export type PersonaStatePersistence = {
  loadCanonical(): Promise<StateHeader | null>;
  persistAndSync(state: StateHeader): Promise<void>;
};

export function canonicalStateSlot(personId: string): string {
  return `${personaCanonicalSlotPrefix(personId)}v1`;
}

export function renderStateHeaderMirror(state: StateHeader): string {
  const json = JSON.stringify(stateHeaderToJson(state), null, 2);
  return `${STATE_HEADER_MIRROR_HEADER}\`\`\`json\n${json}\n\`\`\`\n`;
}

/** Accepts the rendered Markdown mirror or a bare JSON document. */
export function parseStateHeaderMirror(raw: string): StateHeader {
  const start = raw.indexOf('```json');
  if (start >= 0) {
    const afterStart = raw.slice(start + '```json'.length);
    const end = afterStart.indexOf('```');
    if (end >= 0) {
      return parseStateHeaderJson(JSON.parse(afterStart.slice(0, end).trim()));
    }
  }
  return parseStateHeaderJson(JSON.parse(raw.trim()));
}

function writeAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, content);
  try {
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw new Error(
      `failed replacing mirror file atomically: ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * The memory backend holds the canonical state header; the workspace file
 * is a human-readable mirror that is rewritten from the backend on every
 * load and persist.
 */
export class BackendCanonicalStatePersistence implements PersonaStatePersistence {
  constructor(
    private readonly memory: Memory,
    private readonly workspaceDir: string,
    private readonly personId: string,
    private readonly mirrorFilename: string,
    private readonly limits: PersonaLimits
  ) {}

  mirrorPath(): string {
    return path.join(this.workspaceDir, this.mirrorFilename);
  }

  async loadBackendCanonical(): Promise<StateHeader | null> {
    const slotKey = canonicalStateSlot(this.personId);
    const entry = await this.memory.resolveSlot(personEntityId(this.personId), slotKey);
    if (!entry) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(entry.value);
    } catch (err) {
      throw new Error(
        `failed to parse backend canonical state header key: ${slotKey}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    const state = parseStateHeaderJson(raw);
    validateStateHeader(state, this.limits);
    return state;
  }

  /** Loads the canonical state and repairs a missing or divergent mirror. */
  async loadCanonical(): Promise<StateHeader | null> {
    const canonical = await this.loadBackendCanonical();
    if (!canonical) return null;
    this.syncMirror(canonical);
    return canonical;
  }

  async persistAndSync(state: StateHeader): Promise<void> {
    validateStateHeader(state, this.limits);
    const event = createMemoryEvent(
      {
        entityId: personEntityId(this.personId),
        slotKey: canonicalStateSlot(this.personId),
        eventType: 'fact_updated',
        value: JSON.stringify(stateHeaderToJson(state)),
        source: 'system',
        privacyLevel: 'private'
      },
      {
        layer: 'semantic',
        confidence: 0.95,
        importance: 1.0,
        sourceKind: 'manual',
        sourceRef: CANONICAL_SOURCE_REF,
        provenance: provenanceFor('system', CANONICAL_SOURCE_REF),
        occurredAt: state.lastUpdatedAt
      }
    );
    enforcePersonaLongTermWritePolicy(event, this.personId);
    await this.memory.appendEvent(event);
    this.syncMirror(state);
  }

  readMirrorState(): StateHeader | null {
    const mirrorPath = this.mirrorPath();
    if (!fs.existsSync(mirrorPath)) return null;
    const state = parseStateHeaderMirror(fs.readFileSync(mirrorPath, 'utf-8'));
    validateStateHeader(state, this.limits);
    return state;
  }

  private syncMirror(state: StateHeader): void {
    writeAtomic(this.mirrorPath(), renderStateHeaderMirror(state));
  }
}
