import { afterEach, describe, expect, it } from 'vitest';
import { BudgetExceededError, PolicyDeniedError } from '../src/errors.js';
import { SqliteMemory } from '../src/memory-store.js';
import type { Memory } from '../src/memory-types.js';
import {
  VerifyRepairEscalatedError,
  analyzeVerifyFailure,
  decideVerifyRepairEscalation,
  escalationContractMessage,
  runWithVerifyRepair
} from '../src/verify-repair.js';
import type { VerifyRepairEscalation } from '../src/verify-repair.js';
import { VERIFY_REPAIR_ESCALATION_SLOT } from '../src/write-policy.js';

const caps = { maxAttempts: 3, maxRepairDepth: 2 };

async function captureEscalation(promise: Promise<unknown>): Promise<VerifyRepairEscalation> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof VerifyRepairEscalatedError) return err.escalation;
    throw err;
  }
  throw new Error('expected escalation');
}

describe('analyzeVerifyFailure', () => {
  it('classifies policy limit messages', () => {
    expect(analyzeVerifyFailure(new Error('blocked by security policy: action limit exceeded')))
      .toEqual({ failureClass: 'policy_limit', retryable: false });
    expect(analyzeVerifyFailure(new Error('Daily cost limit exceeded')))
      .toEqual({ failureClass: 'policy_limit', retryable: false });
  });

  it('classifies quota exhaustion', () => {
    expect(analyzeVerifyFailure(new Error('insufficient_quota')).failureClass).toBe('quota_exhausted');
    expect(analyzeVerifyFailure(new Error('HTTP 429: check your billing details')).failureClass).toBe('quota_exhausted');
  });

  it('classifies 4xx statuses except 408 and 429 as non-retryable', () => {
    expect(analyzeVerifyFailure(new Error('provider returned 401 unauthorized')))
      .toEqual({ failureClass: 'non_retryable_provider_error', retryable: false });
    expect(analyzeVerifyFailure(new Error('provider returned 429 too many requests')))
      .toEqual({ failureClass: 'transient_failure', retryable: true });
    expect(analyzeVerifyFailure(new Error('request timed out with 408')).retryable).toBe(true);
  });

  it('treats everything else as transient', () => {
    expect(analyzeVerifyFailure(new Error('socket hang up')))
      .toEqual({ failureClass: 'transient_failure', retryable: true });
    expect(analyzeVerifyFailure('plain string failure').retryable).toBe(true);
  });

  it('uses the class carried by typed control errors', () => {
    expect(analyzeVerifyFailure(new BudgetExceededError(2, 1)))
      .toEqual({ failureClass: 'policy_limit', retryable: false });
    expect(analyzeVerifyFailure(new PolicyDeniedError('denied')).failureClass).toBe('policy_limit');
  });
});

describe('decideVerifyRepairEscalation', () => {
  const transient = { failureClass: 'transient_failure', retryable: true } as const;

  it('returns null while retries remain', () => {
    expect(decideVerifyRepairEscalation(caps, 1, 0, transient, new Error('x'))).toBeNull();
  });

  it('checks the attempts cap before the repair-depth cap', () => {
    const escalation = decideVerifyRepairEscalation(caps, 3, 2, transient, new Error('x'));
    expect(escalation?.reason).toBe('max_attempts_reached');
  });

  it('escalates on the repair-depth cap', () => {
    const escalation = decideVerifyRepairEscalation({ maxAttempts: 5, maxRepairDepth: 1 }, 2, 1, transient, new Error('x'));
    expect(escalation?.reason).toBe('max_repair_depth_reached');
  });

  it('scrubs secrets from last_error', () => {
    const escalation = decideVerifyRepairEscalation(
      caps,
      3,
      2,
      transient,
      new Error('upstream rejected api_key=test-secret')
    );
    expect(escalation?.lastError).toBe('upstream rejected [REDACTED]');
  });
});

describe('runWithVerifyRepair', () => {
  let memory: SqliteMemory;

  afterEach(() => {
    memory.close();
  });

  it('escalates with max_attempts_reached after three transient failures', async () => {
    memory = new SqliteMemory(':memory:');
    let calls = 0;
    const escalation = await captureEscalation(runWithVerifyRepair({
      caps,
      memory,
      entityId: 'default',
      attempt: async () => {
        calls += 1;
        throw new Error('connection reset');
      }
    }));

    expect(calls).toBe(3);
    expect(escalation).toEqual({
      reason: 'max_attempts_reached',
      attempts: 3,
      repairDepth: 2,
      maxAttempts: 3,
      maxRepairDepth: 2,
      failureClass: 'transient_failure',
      lastError: 'connection reset'
    });
    expect(escalationContractMessage(escalation)).toBe(
      'verify/repair escalated: reason=max_attempts_reached attempts=3 repair_depth=2 max_attempts=3'
        + ' max_repair_depth=2 failure_class=transient_failure last_error=connection reset'
    );

    const events = await memory.listEvents({ entityId: 'default', slotKey: VERIFY_REPAIR_ESCALATION_SLOT });
    expect(events).toHaveLength(1);
    expect(JSON.parse(events[0].value)).toEqual({
      reason: 'max_attempts_reached',
      attempts: 3,
      repair_depth: 2,
      max_attempts: 3,
      max_repair_depth: 2,
      failure_class: 'transient_failure',
      last_error: 'connection reset'
    });
    expect(events[0].source).toBe('system');
    expect(events[0].eventType).toBe('summary_compacted');
  });

  it('escalates a non-retryable failure on the first attempt', async () => {
    memory = new SqliteMemory(':memory:');
    let calls = 0;
    const escalation = await captureEscalation(runWithVerifyRepair({
      caps,
      memory,
      entityId: 'default',
      attempt: async () => {
        calls += 1;
        throw new Error('blocked by security policy: action limit exceeded');
      }
    }));
    expect(calls).toBe(1);
    expect(escalation.reason).toBe('non_retryable_failure');
    expect(escalation.attempts).toBe(1);
    expect(escalation.repairDepth).toBe(0);
    expect(escalation.failureClass).toBe('policy_limit');
  });

  it('returns the first successful attempt', async () => {
    memory = new SqliteMemory(':memory:');
    const attempts: number[] = [];
    const result = await runWithVerifyRepair({
      caps,
      memory,
      entityId: 'default',
      attempt: async (n) => {
        attempts.push(n);
        if (n === 1) throw new Error('temporary outage');
        return 'answer';
      }
    });
    expect(result).toBe('answer');
    expect(attempts).toEqual([1, 2]);
    expect(await memory.countEvents()).toBe(0);
  });

  it('still escalates when the audit write fails', async () => {
    memory = new SqliteMemory(':memory:');
    const failingMemory: Memory = {
      appendEvent: async () => {
        throw new Error('disk full');
      },
      countEvents: (entityId) => memory.countEvents(entityId),
      resolveSlot: (entityId, slotKey) => memory.resolveSlot(entityId, slotKey),
      listEvents: (filter) => memory.listEvents(filter),
      recall: (query) => memory.recall(query)
    };
    const escalation = await captureEscalation(runWithVerifyRepair({
      caps,
      memory: failingMemory,
      entityId: 'default',
      attempt: async () => {
        throw new Error('provider returned 400 bad request');
      }
    }));
    expect(escalation.reason).toBe('non_retryable_failure');
    expect(escalation.failureClass).toBe('non_retryable_provider_error');
  });
});
