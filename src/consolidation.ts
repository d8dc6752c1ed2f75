import path from 'path';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { createMemoryEvent, provenanceFor } from './memory-types.js';
import type { Memory } from './memory-types.js';
import { recordBestEffortFailure } from './metrics.js';
import { collapseWhitespace, loadJson, saveJson, truncateWithEllipsis } from './utils.js';

const STATE_FILE = 'memory_consolidation_state.json';
export const CONSOLIDATION_SLOT_KEY = 'consolidation.semantic.latest';
const CONSOLIDATION_PROVENANCE_REF = 'memory.consolidation.session_to_semantic';

const consolidationStateSchema = z.object({
  watermarks: z.record(z.number().int().nonnegative()).default({})
});

type ConsolidationState = z.infer<typeof consolidationStateSchema>;

export type ConsolidationInput = {
  entityId: string;
  checkpointEventCount: number;
  userMessage: string;
  assistantResponse: string;
};

export type ConsolidationDisposition = 'consolidated' | 'skipped_no_signal' | 'skipped_checkpoint';

export type ConsolidationOutput = {
  disposition: ConsolidationDisposition;
  previousWatermark: number;
  appliedWatermark: number;
};

export function consolidationStatePath(workspaceDir: string): string {
  return path.join(workspaceDir, 'state', STATE_FILE);
}

function loadState(workspaceDir: string): ConsolidationState {
  const statePath = consolidationStatePath(workspaceDir);
  let raw: unknown;
  try {
    raw = loadJson(statePath) ?? {};
  } catch (err) {
    logger.warn({ statePath, error: errorMessage(err) }, 'consolidation state unreadable; watermarks reset');
    raw = {};
  }
  const parsed = consolidationStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : { watermarks: {} };
}

export function buildConsolidationValue(input: ConsolidationInput): string {
  const user = truncateWithEllipsis(collapseWhitespace(input.userMessage), 120);
  const assistant = truncateWithEllipsis(collapseWhitespace(input.assistantResponse), 240);
  return `checkpoint=${input.checkpointEventCount} | user=${user} | assistant=${assistant}`;
}

const stateFileLocks = new Map<string, Promise<void>>();

/**
 * Serialize `task` behind any earlier task on the same watermark file. All
 * entities share one file, so the load/append/save cycle is exclusive.
 */
async function withStateFileLock<T>(statePath: string, task: () => Promise<T>): Promise<T> {
  const previous = stateFileLocks.get(statePath) ?? Promise.resolve();
  let release: () => void = () => {};
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => current);
  stateFileLocks.set(statePath, tail);
  await previous;
  try {
    return await task();
  } finally {
    release();
    if (stateFileLocks.get(statePath) === tail) stateFileLocks.delete(statePath);
  }
}

/**
 * Fold the turn into one semantic summary event when the entity's event
 * count moved past the stored watermark. Replaying a checkpoint is a no-op.
 */
export async function runConsolidationOnce(
  memory: Memory,
  workspaceDir: string,
  input: ConsolidationInput
): Promise<ConsolidationOutput> {
  if (!input.userMessage.trim() && !input.assistantResponse.trim()) {
    return { disposition: 'skipped_no_signal', previousWatermark: 0, appliedWatermark: 0 };
  }

  return withStateFileLock(consolidationStatePath(workspaceDir), async () => {
    const state = loadState(workspaceDir);
    const previousWatermark = state.watermarks[input.entityId] ?? 0;
    if (input.checkpointEventCount <= previousWatermark) {
      return {
        disposition: 'skipped_checkpoint',
        previousWatermark,
        appliedWatermark: previousWatermark
      };
    }

    await memory.appendEvent(createMemoryEvent(
      {
        entityId: input.entityId,
        slotKey: CONSOLIDATION_SLOT_KEY,
        eventType: 'summary_compacted',
        value: buildConsolidationValue(input),
        source: 'system',
        privacyLevel: 'private'
      },
      {
        layer: 'semantic',
        confidence: 0.85,
        importance: 0.65,
        provenance: provenanceFor('system', CONSOLIDATION_PROVENANCE_REF)
      }
    ));

    state.watermarks[input.entityId] = input.checkpointEventCount;
    saveJson(consolidationStatePath(workspaceDir), state);
    return {
      disposition: 'consolidated',
      previousWatermark,
      appliedWatermark: input.checkpointEventCount
    };
  });
}

/**
 * Detached post-turn consolidation. Returns the task promise for callers
 * that want to await it (tests, shutdown); the turn itself never does.
 */
export function enqueueConsolidationTask(
  memory: Memory,
  workspaceDir: string,
  input: ConsolidationInput
): Promise<void> {
  return runConsolidationOnce(memory, workspaceDir, input).then(
    (output) => {
      logger.debug({ entityId: input.entityId, ...output }, 'post-turn consolidation finished');
    },
    (err) => {
      recordBestEffortFailure('consolidation');
      logger.warn({ entityId: input.entityId, error: errorMessage(err) }, 'post-turn consolidation task failed; answer path preserved');
    }
  );
}
