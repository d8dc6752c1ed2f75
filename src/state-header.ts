import { z } from 'zod';
import type { PersonaLimits } from './runtime-config.js';
import { isRfc3339 } from './timestamps.js';
import type { ImmutableStateHeader } from './writeback-guard.js';

export const STATE_HEADER_SCHEMA_VERSION = 1;

/** Wire form of the canonical persona state header. Unknown keys are refused. */
const stateHeaderJsonSchema = z.object({
  schema_version: z.number().int().nonnegative(),
  identity_principles_hash: z.string(),
  safety_posture: z.string(),
  current_objective: z.string(),
  open_loops: z.array(z.string()),
  next_actions: z.array(z.string()),
  commitments: z.array(z.string()),
  recent_context_summary: z.string(),
  last_updated_at: z.string()
}).strict();

export type StateHeaderJson = z.infer<typeof stateHeaderJsonSchema>;

export type StateHeader = {
  schemaVersion: number;
  identityPrinciplesHash: string;
  safetyPosture: string;
  currentObjective: string;
  openLoops: string[];
  nextActions: string[];
  commitments: string[];
  recentContextSummary: string;
  lastUpdatedAt: string;
};

export function stateHeaderToJson(state: StateHeader): StateHeaderJson {
  return {
    schema_version: state.schemaVersion,
    identity_principles_hash: state.identityPrinciplesHash,
    safety_posture: state.safetyPosture,
    current_objective: state.currentObjective,
    open_loops: [...state.openLoops],
    next_actions: [...state.nextActions],
    commitments: [...state.commitments],
    recent_context_summary: state.recentContextSummary,
    last_updated_at: state.lastUpdatedAt
  };
}

/** Parse the wire form; throws with the first schema issue. */
export function parseStateHeaderJson(value: unknown): StateHeader {
  const parsed = stateHeaderJsonSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new Error(`invalid state header: ${where}${issue ? issue.message : 'unknown error'}`);
  }
  const json = parsed.data;
  return {
    schemaVersion: json.schema_version,
    identityPrinciplesHash: json.identity_principles_hash,
    safetyPosture: json.safety_posture,
    currentObjective: json.current_objective,
    openLoops: json.open_loops,
    nextActions: json.next_actions,
    commitments: json.commitments,
    recentContextSummary: json.recent_context_summary,
    lastUpdatedAt: json.last_updated_at
  };
}

export function immutableFieldsOf(state: StateHeader): ImmutableStateHeader {
  return {
    schemaVersion: state.schemaVersion,
    identityPrinciplesHash: state.identityPrinciplesHash,
    safetyPosture: state.safetyPosture
  };
}

function validateNonEmpty(field: string, value: string): void {
  if (!value.trim()) throw new Error(`${field} must not be empty`);
}

function validateTextLength(field: string, value: string, maxLength: number): void {
  validateNonEmpty(field, value);
  if ([...value].length > maxLength) throw new Error(`${field} exceeds max length of ${maxLength}`);
}

function validateItems(field: string, items: string[], maxItems: number, maxItemLength: number): void {
  if (items.length > maxItems) throw new Error(`${field} exceeds max items of ${maxItems}`);
  for (const item of items) {
    if (!item.trim()) throw new Error(`${field} contains empty item`);
    if ([...item].length > maxItemLength) throw new Error(`${field} item exceeds max length of ${maxItemLength}`);
  }
}

export function validateStateHeader(state: StateHeader, limits: PersonaLimits): void {
  if (state.schemaVersion !== STATE_HEADER_SCHEMA_VERSION) {
    throw new Error(`invalid schema_version: expected ${STATE_HEADER_SCHEMA_VERSION}, got ${state.schemaVersion}`);
  }
  validateNonEmpty('identity_principles_hash', state.identityPrinciplesHash);
  validateNonEmpty('safety_posture', state.safetyPosture);
  validateTextLength('current_objective', state.currentObjective, limits.maxCurrentObjectiveChars);
  validateTextLength('recent_context_summary', state.recentContextSummary, limits.maxRecentContextSummaryChars);
  validateItems('open_loops', state.openLoops, limits.maxOpenLoops, limits.maxListItemChars);
  validateItems('next_actions', state.nextActions, limits.maxNextActions, limits.maxListItemChars);
  validateItems('commitments', state.commitments, limits.maxCommitments, limits.maxListItemChars);
  if (!isRfc3339(state.lastUpdatedAt)) throw new Error('last_updated_at must be RFC3339');
}

/**
 * Second check before persistence: the candidate must be valid on its own
 * and keep every immutable field of the previous canonical state.
 */
export function validateWritebackCandidate(previous: StateHeader, candidate: StateHeader, limits: PersonaLimits): void {
  validateStateHeader(candidate, limits);
  if (candidate.schemaVersion !== previous.schemaVersion) {
    throw new Error('immutable field changed: schema_version');
  }
  if (candidate.identityPrinciplesHash !== previous.identityPrinciplesHash) {
    throw new Error('immutable field changed: identity_principles_hash');
  }
  if (candidate.safetyPosture !== previous.safetyPosture) {
    throw new Error('immutable field changed: safety_posture');
  }
}
