import { TurnControlError, WriteScopeDeniedError, errorMessage } from './errors.js';
import type { VerifyFailureClass } from './errors.js';
import { logger } from './logger.js';
import { createMemoryEvent, provenanceFor } from './memory-types.js';
import type { Memory } from './memory-types.js';
import { recordBestEffortFailure, recordVerifyRepairEscalation, recordVerifyRepairRetry } from './metrics.js';
import type { RuntimeConfig } from './runtime-config.js';
import { sanitizeApiError } from './scrub.js';
import { VERIFY_REPAIR_ESCALATION_SLOT, enforceVerifyRepairWritePolicy } from './write-policy.js';

const ESCALATION_SOURCE_REF = 'verify-repair.escalation';

export type VerifyRepairCaps = {
  maxAttempts: number;
  maxRepairDepth: number;
};

export function verifyRepairCapsFromConfig(config: RuntimeConfig): VerifyRepairCaps {
  return {
    maxAttempts: config.autonomy.verifyRepair.maxAttempts,
    maxRepairDepth: config.autonomy.verifyRepair.maxRepairDepth
  };
}

export type VerifyRepairEscalationReason =
  | 'max_attempts_reached'
  | 'max_repair_depth_reached'
  | 'non_retryable_failure';

export type VerifyFailureAnalysis = {
  failureClass: VerifyFailureClass;
  retryable: boolean;
};

export type VerifyRepairEscalation = {
  reason: VerifyRepairEscalationReason;
  attempts: number;
  repairDepth: number;
  maxAttempts: number;
  maxRepairDepth: number;
  failureClass: VerifyFailureClass;
  lastError: string;
};

export function escalationContractMessage(escalation: VerifyRepairEscalation): string {
  return 'verify/repair escalated:'
    + ` reason=${escalation.reason}`
    + ` attempts=${escalation.attempts}`
    + ` repair_depth=${escalation.repairDepth}`
    + ` max_attempts=${escalation.maxAttempts}`
    + ` max_repair_depth=${escalation.maxRepairDepth}`
    + ` failure_class=${escalation.failureClass}`
    + ` last_error=${escalation.lastError}`;
}

export function escalationEventPayload(escalation: VerifyRepairEscalation): Record<string, string | number> {
  return {
    reason: escalation.reason,
    attempts: escalation.attempts,
    repair_depth: escalation.repairDepth,
    max_attempts: escalation.maxAttempts,
    max_repair_depth: escalation.maxRepairDepth,
    failure_class: escalation.failureClass,
    last_error: escalation.lastError
  };
}

/** Terminal error of the verify/repair loop; never retried by callers. */
export class VerifyRepairEscalatedError extends TurnControlError {
  readonly escalation: VerifyRepairEscalation;

  constructor(escalation: VerifyRepairEscalation) {
    super('escalation', escalationContractMessage(escalation), escalation.failureClass);
    this.name = 'VerifyRepairEscalatedError';
    this.escalation = escalation;
  }
}

function hasClientErrorStatus(lower: string): boolean {
  for (const run of lower.split(/[^0-9]+/)) {
    if (!run) continue;
    const code = Number(run);
    if (code > 65_535) continue;
    if (code >= 400 && code < 500 && code !== 408 && code !== 429) return true;
  }
  return false;
}

/**
 * Classify a turn failure. Typed control-plane errors carry their own
 * class; everything else is classified from its message.
 */
export function analyzeVerifyFailure(error: unknown): VerifyFailureAnalysis {
  if (error instanceof TurnControlError && error.failureClass) {
    return { failureClass: error.failureClass, retryable: error.failureClass === 'transient_failure' };
  }
  const lower = errorMessage(error).toLowerCase();
  if (lower.includes('action limit exceeded') || lower.includes('daily cost limit exceeded')) {
    return { failureClass: 'policy_limit', retryable: false };
  }
  if (
    lower.includes('insufficient_quota')
    || lower.includes('exceeded your current quota')
    || (lower.includes('429') && lower.includes('billing'))
  ) {
    return { failureClass: 'quota_exhausted', retryable: false };
  }
  if (hasClientErrorStatus(lower)) {
    return { failureClass: 'non_retryable_provider_error', retryable: false };
  }
  return { failureClass: 'transient_failure', retryable: true };
}

/** Precedence: attempts cap, then repair-depth cap, then retryability. */
export function decideVerifyRepairEscalation(
  caps: VerifyRepairCaps,
  attempts: number,
  repairDepth: number,
  analysis: VerifyFailureAnalysis,
  lastError: unknown
): VerifyRepairEscalation | null {
  let reason: VerifyRepairEscalationReason;
  if (attempts >= caps.maxAttempts) {
    reason = 'max_attempts_reached';
  } else if (repairDepth >= caps.maxRepairDepth) {
    reason = 'max_repair_depth_reached';
  } else if (!analysis.retryable) {
    reason = 'non_retryable_failure';
  } else {
    return null;
  }
  return {
    reason,
    attempts,
    repairDepth,
    maxAttempts: caps.maxAttempts,
    maxRepairDepth: caps.maxRepairDepth,
    failureClass: analysis.failureClass,
    lastError: sanitizeApiError(errorMessage(lastError))
  };
}

export async function emitVerifyRepairEscalationEvent(
  memory: Memory,
  entityId: string,
  escalation: VerifyRepairEscalation
): Promise<void> {
  const event = createMemoryEvent(
    {
      entityId,
      slotKey: VERIFY_REPAIR_ESCALATION_SLOT,
      eventType: 'summary_compacted',
      value: JSON.stringify(escalationEventPayload(escalation)),
      source: 'system',
      privacyLevel: 'private'
    },
    {
      confidence: 1.0,
      importance: 0.9,
      sourceKind: 'manual',
      sourceRef: ESCALATION_SOURCE_REF,
      provenance: provenanceFor('system', ESCALATION_SOURCE_REF)
    }
  );
  enforceVerifyRepairWritePolicy(event);
  await memory.appendEvent(event);
}

export type VerifyRepairParams<T> = {
  caps: VerifyRepairCaps;
  memory: Memory;
  entityId: string;
  attempt: (attemptNumber: number) => Promise<T>;
};

/**
 * Run a whole turn, retrying it on recoverable failures until a cap or a
 * non-retryable failure escalates. Escalation writes an audit event (best
 * effort, skipped for write-scope denials) and then throws
 * VerifyRepairEscalatedError.
 */
export async function runWithVerifyRepair<T>(params: VerifyRepairParams<T>): Promise<T> {
  const { caps, memory, entityId } = params;
  let attempts = 0;
  let repairDepth = 0;

  for (;;) {
    attempts += 1;
    try {
      return await params.attempt(attempts);
    } catch (err) {
      const analysis = analyzeVerifyFailure(err);
      const escalation = decideVerifyRepairEscalation(caps, attempts, repairDepth, analysis, err);
      if (escalation) {
        recordVerifyRepairEscalation(escalation.reason, escalation.failureClass);
        if (err instanceof WriteScopeDeniedError) {
          // The entity is outside the write scope, so no audit row may land under it
          logger.warn({ entityId, reason: escalation.reason }, 'verify/repair escalation audit skipped; entity outside write scope');
          throw new VerifyRepairEscalatedError(escalation);
        }
        try {
          await emitVerifyRepairEscalationEvent(memory, entityId, escalation);
        } catch (emitErr) {
          recordBestEffortFailure('escalation_audit');
          logger.warn({
            entityId,
            error: errorMessage(emitErr)
          }, 'verify/repair escalation event write failed');
        }
        throw new VerifyRepairEscalatedError(escalation);
      }

      repairDepth += 1;
      recordVerifyRepairRetry(analysis.failureClass);
      logger.warn({
        entityId,
        attempts,
        repairDepth,
        maxAttempts: caps.maxAttempts,
        maxRepairDepth: caps.maxRepairDepth,
        failureClass: analysis.failureClass,
        error: sanitizeApiError(errorMessage(err))
      }, 'verify/repair retrying turn');
    }
  }
}
