import { isJsonObject } from './json-helpers.js';
import { sanitizeApiError } from './scrub.js';
import { isRfc3339 } from './timestamps.js';

const MAX_CURRENT_OBJECTIVE_CHARS = 280;
const MAX_RECENT_CONTEXT_SUMMARY_CHARS = 1200;
const MAX_LAST_UPDATED_AT_CHARS = 64;
const MAX_LIST_ITEM_CHARS = 240;
const MAX_MEMORY_APPEND_ITEMS = 8;
const MAX_MEMORY_APPEND_ITEM_CHARS = 240;
const MAX_OPEN_LOOPS = 7;
const MAX_NEXT_ACTIONS = 3;
const MAX_COMMITMENTS = 5;

const STATE_HEADER_CONTEXT = 'payload.state_header';

const ALLOWED_TOP_LEVEL_FIELDS: ReadonlySet<string> = new Set(['state_header', 'memory_append']);

const ALLOWED_STATE_HEADER_FIELDS: ReadonlySet<string> = new Set([
  'schema_version',
  'identity_principles_hash',
  'safety_posture',
  'current_objective',
  'open_loops',
  'next_actions',
  'commitments',
  'recent_context_summary',
  'last_updated_at'
]);

/**
 * Known injection phrasings. This is a first line of defense for
 * persisted self state, not a complete prompt-injection filter.
 */
const POISON_PATTERNS: readonly string[] = [
  'ignore previous instructions',
  'ignore all previous instructions',
  'system prompt',
  'developer message',
  'override safety',
  'bypass safety',
  'disable guard',
  'exfiltrate',
  'reveal secrets',
  'tool jailbreak'
];

export type ImmutableStateHeader = {
  schemaVersion: number;
  identityPrinciplesHash: string;
  safetyPosture: string;
};

export type StateHeaderWriteback = {
  currentObjective: string;
  openLoops: string[];
  nextActions: string[];
  commitments: string[];
  recentContextSummary: string;
  lastUpdatedAt: string;
};

export type WritebackPayload = {
  stateHeader: StateHeaderWriteback;
  memoryAppend: string[];
};

export type WritebackGuardVerdict =
  | { status: 'accepted'; payload: WritebackPayload }
  | { status: 'rejected'; reason: string };

type Validation<T> = { ok: true; value: T } | { ok: false; reason: string };

function ok<T>(value: T): Validation<T> {
  return { ok: true, value };
}

function fail<T>(reason: string): Validation<T> {
  return { ok: false, reason };
}

function reject(reason: string): WritebackGuardVerdict {
  return { status: 'rejected', reason: sanitizeApiError(reason) };
}

function charCount(value: string): number {
  return [...value].length;
}

export function containsPoisonPattern(input: string): boolean {
  const normalized = input.toLowerCase();
  return POISON_PATTERNS.some((pattern) => normalized.includes(pattern));
}

function ensureNoUnknownFields(
  object: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  context: string
): string | null {
  for (const key of Object.keys(object)) {
    if (!allowed.has(key)) return `${context} contains unknown field: ${key}`;
  }
  return null;
}

/** Trimmed, non-empty, bounded, poison-free text; `label` names it in reasons. */
function validateText(raw: unknown, label: string, maxChars: number): Validation<string> {
  if (typeof raw !== 'string') return fail(`${label} must be a string`);
  const sanitized = raw.trim();
  if (!sanitized) return fail(`${label} cannot be empty`);
  if (charCount(sanitized) > maxChars) return fail(`${label} exceeds max length (${maxChars})`);
  if (containsPoisonPattern(sanitized)) return fail(`${label} contains unsafe content pattern`);
  return ok(sanitized);
}

function validateStringField(
  object: Record<string, unknown>,
  field: string,
  maxChars: number,
  context: string
): Validation<string> {
  if (!Object.hasOwn(object, field)) return fail(`${context}.${field} is required`);
  return validateText(object[field], `${context}.${field}`, maxChars);
}

function validateTextList(
  raw: unknown,
  label: string,
  maxItems: number,
  maxItemChars: number
): Validation<string[]> {
  if (!Array.isArray(raw)) return fail(`${label} must be an array`);
  if (raw.length > maxItems) return fail(`${label} exceeds max items (${maxItems})`);
  const out: string[] = [];
  for (const [index, item] of raw.entries()) {
    const checked = validateText(item, `${label}[${index}]`, maxItemChars);
    if (!checked.ok) return checked;
    out.push(checked.value);
  }
  return ok(out);
}

function validateStringArrayField(
  object: Record<string, unknown>,
  field: string,
  maxItems: number,
  context: string
): Validation<string[]> {
  if (!Object.hasOwn(object, field)) return fail(`${context}.${field} is required`);
  return validateTextList(object[field], `${context}.${field}`, maxItems, MAX_LIST_ITEM_CHARS);
}

function validateOptionalMemoryAppend(root: Record<string, unknown>): Validation<string[]> {
  if (!Object.hasOwn(root, 'memory_append')) return ok([]);
  return validateTextList(
    root.memory_append,
    'payload.memory_append',
    MAX_MEMORY_APPEND_ITEMS,
    MAX_MEMORY_APPEND_ITEM_CHARS
  );
}

function validateImmutableFields(
  stateHeader: Record<string, unknown>,
  immutable: ImmutableStateHeader
): string | null {
  const schemaVersion = stateHeader.schema_version;
  if (typeof schemaVersion !== 'number' || !Number.isInteger(schemaVersion) || schemaVersion < 0) {
    return `${STATE_HEADER_CONTEXT}.schema_version must be an integer`;
  }
  if (schemaVersion !== immutable.schemaVersion) {
    return `immutable field mismatch: ${STATE_HEADER_CONTEXT}.schema_version`;
  }

  const identityHash = stateHeader.identity_principles_hash;
  if (typeof identityHash !== 'string') {
    return `${STATE_HEADER_CONTEXT}.identity_principles_hash must be a string`;
  }
  if (identityHash !== immutable.identityPrinciplesHash) {
    return `immutable field mismatch: ${STATE_HEADER_CONTEXT}.identity_principles_hash`;
  }

  const safetyPosture = stateHeader.safety_posture;
  if (typeof safetyPosture !== 'string') {
    return `${STATE_HEADER_CONTEXT}.safety_posture must be a string`;
  }
  if (safetyPosture !== immutable.safetyPosture) {
    return `immutable field mismatch: ${STATE_HEADER_CONTEXT}.safety_posture`;
  }
  return null;
}

function validateStateHeader(
  stateHeader: Record<string, unknown>,
  immutable: ImmutableStateHeader
): Validation<StateHeaderWriteback> {
  const unknownField = ensureNoUnknownFields(stateHeader, ALLOWED_STATE_HEADER_FIELDS, STATE_HEADER_CONTEXT);
  if (unknownField) return fail(unknownField);

  const immutableProblem = validateImmutableFields(stateHeader, immutable);
  if (immutableProblem) return fail(immutableProblem);

  const currentObjective = validateStringField(
    stateHeader, 'current_objective', MAX_CURRENT_OBJECTIVE_CHARS, STATE_HEADER_CONTEXT
  );
  if (!currentObjective.ok) return currentObjective;
  const openLoops = validateStringArrayField(stateHeader, 'open_loops', MAX_OPEN_LOOPS, STATE_HEADER_CONTEXT);
  if (!openLoops.ok) return openLoops;
  const nextActions = validateStringArrayField(stateHeader, 'next_actions', MAX_NEXT_ACTIONS, STATE_HEADER_CONTEXT);
  if (!nextActions.ok) return nextActions;
  const commitments = validateStringArrayField(stateHeader, 'commitments', MAX_COMMITMENTS, STATE_HEADER_CONTEXT);
  if (!commitments.ok) return commitments;
  const recentContextSummary = validateStringField(
    stateHeader, 'recent_context_summary', MAX_RECENT_CONTEXT_SUMMARY_CHARS, STATE_HEADER_CONTEXT
  );
  if (!recentContextSummary.ok) return recentContextSummary;
  const lastUpdatedAt = validateStringField(
    stateHeader, 'last_updated_at', MAX_LAST_UPDATED_AT_CHARS, STATE_HEADER_CONTEXT
  );
  if (!lastUpdatedAt.ok) return lastUpdatedAt;
  if (!isRfc3339(lastUpdatedAt.value)) {
    return fail(`${STATE_HEADER_CONTEXT}.last_updated_at must be RFC3339`);
  }

  return ok({
    currentObjective: currentObjective.value,
    openLoops: openLoops.value,
    nextActions: nextActions.value,
    commitments: commitments.value,
    recentContextSummary: recentContextSummary.value,
    lastUpdatedAt: lastUpdatedAt.value
  });
}

/**
 * Decide whether a model-proposed writeback may touch persisted self state.
 * Total: every input yields a verdict, and an accepted payload carries only
 * trimmed, validated values. Rejection reasons name the offending field and
 * limit but never echo the offending text.
 */
export function validateWritebackPayload(
  payload: unknown,
  immutable: ImmutableStateHeader
): WritebackGuardVerdict {
  if (!isJsonObject(payload)) return reject('payload must be a JSON object');
  const unknownField = ensureNoUnknownFields(payload, ALLOWED_TOP_LEVEL_FIELDS, 'payload');
  if (unknownField) return reject(unknownField);

  if (!Object.hasOwn(payload, 'state_header')) return reject('payload.state_header is required');
  const stateHeaderValue = payload.state_header;
  if (!isJsonObject(stateHeaderValue)) return reject('payload.state_header must be an object');

  const stateHeader = validateStateHeader(stateHeaderValue, immutable);
  if (!stateHeader.ok) return reject(stateHeader.reason);

  const memoryAppend = validateOptionalMemoryAppend(payload);
  if (!memoryAppend.ok) return reject(memoryAppend.reason);

  return {
    status: 'accepted',
    payload: {
      stateHeader: stateHeader.value,
      memoryAppend: memoryAppend.value
    }
  };
}
