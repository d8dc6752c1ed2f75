import { describe, expect, it } from 'vitest';
import { PolicyDeniedError } from '../src/errors.js';
import {
  ACTION_LIMIT_EXCEEDED_ERROR,
  ActionTracker,
  COST_LIMIT_EXCEEDED_ERROR,
  CostTracker,
  EntityRateLimiter,
  SecurityPolicy
} from '../src/security-policy.js';
import { testConfig } from './helpers.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

function fakeClock(start = 10 * DAY_MS) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    }
  };
}

describe('ActionTracker', () => {
  it('forgets actions older than an hour', () => {
    const clock = fakeClock();
    const tracker = new ActionTracker(clock.now);
    tracker.record();
    clock.advance(30 * 60 * 1000);
    expect(tracker.record()).toBe(2);
    clock.advance(30 * 60 * 1000);
    expect(tracker.count()).toBe(1);
  });
});

describe('CostTracker', () => {
  it('commits spend under the cap and resets at the next UTC day', () => {
    const clock = fakeClock();
    const costs = new CostTracker(clock.now);
    expect(costs.record(300, 500)).toBe(true);
    expect(costs.record(300, 500)).toBe(false);
    expect(costs.spentToday()).toBe(300);
    clock.advance(DAY_MS);
    expect(costs.spentToday()).toBe(0);
  });
});

describe('EntityRateLimiter', () => {
  it('forgets entities whose window has emptied', () => {
    const clock = fakeClock();
    const limiter = new EntityRateLimiter(100, 5, clock.now);
    expect(limiter.checkAndRecord('a')).toBeNull();
    expect(limiter.checkAndRecord('b')).toBeNull();
    expect(limiter.checkAndRecord('c')).toBeNull();
    expect(limiter.trackedEntityCount()).toBe(3);

    clock.advance(HOUR_MS + 1);
    expect(limiter.checkAndRecord('d')).toBeNull();
    expect(limiter.trackedEntityCount()).toBe(1);
  });

  it('limits per entity and globally', () => {
    const clock = fakeClock();
    const limiter = new EntityRateLimiter(3, 2, clock.now);
    expect(limiter.checkAndRecord('a')).toBeNull();
    expect(limiter.checkAndRecord('a')).toBeNull();
    expect(limiter.checkAndRecord('a')).toEqual({ kind: 'entity_exhausted', entityId: 'a' });
    expect(limiter.checkAndRecord('b')).toBeNull();
    expect(limiter.checkAndRecord('c')).toEqual({ kind: 'global_exhausted' });
    clock.advance(HOUR_MS);
    expect(limiter.checkAndRecord('a')).toBeNull();
  });
});

describe('SecurityPolicy', () => {
  it('denies the action past the hourly cap', () => {
    const autonomy = { ...testConfig().autonomy, maxActionsPerHour: 2 };
    const policy = SecurityPolicy.fromAutonomyConfig(autonomy, fakeClock().now);
    policy.consumeActionAndCost(0);
    policy.consumeActionAndCost(0);
    expect(policy.isRateLimited()).toBe(true);
    expect(() => policy.consumeActionAndCost(0)).toThrow(new PolicyDeniedError(ACTION_LIMIT_EXCEEDED_ERROR));
  });

  it('denies spend past the daily cost cap', () => {
    const autonomy = { ...testConfig().autonomy, maxCostPerDayCents: 100 };
    const policy = SecurityPolicy.fromAutonomyConfig(autonomy, fakeClock().now);
    policy.consumeActionAndCost(80);
    expect(() => policy.consumeActionAndCost(30)).toThrow(COST_LIMIT_EXCEEDED_ERROR);
    expect(policy.spentTodayCents()).toBe(80);
  });

  it('clamps with the band of its autonomy level', () => {
    const autonomy = { ...testConfig().autonomy, level: 'read_only' as const };
    const policy = SecurityPolicy.fromAutonomyConfig(autonomy);
    expect(policy.effectiveAutonomyLevel()).toBe('read_only');
    expect(policy.clampTemperature(0.9)).toBe(0.2);
  });
});
