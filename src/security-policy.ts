import { clampTemperature, effectiveAutonomyLevel, selectedTemperatureBand } from './autonomy.js';
import type { TemperaturePolicy } from './autonomy.js';
import { PolicyDeniedError } from './errors.js';
import type { AutonomyConfig, AutonomyLevel, TemperatureBand } from './runtime-config.js';

export const ACTION_LIMIT_EXCEEDED_ERROR = 'blocked by security policy: action limit exceeded';
export const COST_LIMIT_EXCEEDED_ERROR = 'blocked by security policy: daily cost limit exceeded';

const ACTION_WINDOW_MS = 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

export type Clock = () => number;

/** Sliding one-hour window of recorded actions. */
export class ActionTracker {
  private actions: number[] = [];

  constructor(private readonly clock: Clock = Date.now) {}

  private prune(now: number): void {
    const cutoff = now - ACTION_WINDOW_MS;
    this.actions = this.actions.filter((t) => t > cutoff);
  }

  /** Records an action and returns the count inside the window, including it. */
  record(): number {
    const now = this.clock();
    this.prune(now);
    this.actions.push(now);
    return this.actions.length;
  }

  count(): number {
    this.prune(this.clock());
    return this.actions.length;
  }
}

/** Daily spend in cents, rolling over at UTC midnight. */
export class CostTracker {
  private day: number;
  private spentCents = 0;

  constructor(private readonly clock: Clock = Date.now) {
    this.day = Math.floor(clock() / DAY_MS);
  }

  private rollover(): void {
    const today = Math.floor(this.clock() / DAY_MS);
    if (today !== this.day) {
      this.day = today;
      this.spentCents = 0;
    }
  }

  /**
   * A zero-cent record only checks the current spend; otherwise the
   * amount is committed when it fits under the daily cap.
   */
  record(additionalCents: number, maxCentsPerDay: number): boolean {
    this.rollover();
    if (additionalCents === 0) return this.spentCents <= maxCentsPerDay;
    if (this.spentCents + additionalCents > maxCentsPerDay) return false;
    this.spentCents += additionalCents;
    return true;
  }

  spentToday(): number {
    this.rollover();
    return this.spentCents;
  }
}

export type RateLimitDenial =
  | { kind: 'global_exhausted' }
  | { kind: 'entity_exhausted'; entityId: string };

/** Global plus per-entity hourly action limits shared by concurrent turns. */
export class EntityRateLimiter {
  private readonly global: ActionTracker;
  private readonly perEntity = new Map<string, ActionTracker>();

  constructor(
    private readonly globalMax: number,
    private readonly perEntityMax: number,
    private readonly clock: Clock = Date.now
  ) {
    this.global = new ActionTracker(clock);
  }

  /** Entities with a live tracker; idle ones are dropped on the next check. */
  trackedEntityCount(): number {
    return this.perEntity.size;
  }

  private dropIdleTrackers(): void {
    for (const [entityId, tracker] of this.perEntity) {
      if (tracker.count() === 0) this.perEntity.delete(entityId);
    }
  }

  checkAndRecord(entityId: string): RateLimitDenial | null {
    this.dropIdleTrackers();
    if (this.global.count() >= this.globalMax) return { kind: 'global_exhausted' };
    let tracker = this.perEntity.get(entityId);
    if (!tracker) {
      tracker = new ActionTracker(this.clock);
      this.perEntity.set(entityId, tracker);
    }
    if (tracker.count() >= this.perEntityMax) return { kind: 'entity_exhausted', entityId };
    this.global.record();
    tracker.record();
    return null;
  }
}

export type SecurityPolicyOptions = Pick<
  AutonomyConfig,
  'level' | 'rollout' | 'temperatureBands' | 'maxActionsPerHour' | 'maxCostPerDayCents'
>;

/**
 * Shared per-process policy handle. Counter updates are synchronous, so
 * concurrent turns on the event loop never interleave inside one call.
 */
export class SecurityPolicy implements TemperaturePolicy {
  private readonly tracker: ActionTracker;
  private readonly costTracker: CostTracker;

  constructor(private readonly options: SecurityPolicyOptions, clock: Clock = Date.now) {
    this.tracker = new ActionTracker(clock);
    this.costTracker = new CostTracker(clock);
  }

  static fromAutonomyConfig(config: AutonomyConfig, clock?: Clock): SecurityPolicy {
    return new SecurityPolicy(config, clock);
  }

  recordAction(): boolean {
    return this.tracker.record() <= this.options.maxActionsPerHour;
  }

  isRateLimited(): boolean {
    return this.tracker.count() >= this.options.maxActionsPerHour;
  }

  /** Throws PolicyDeniedError when either the hourly action or the daily cost cap is hit. */
  consumeActionAndCost(estimatedCostCents: number): void {
    if (!this.recordAction()) {
      throw new PolicyDeniedError(ACTION_LIMIT_EXCEEDED_ERROR);
    }
    if (!this.costTracker.record(estimatedCostCents, this.options.maxCostPerDayCents)) {
      throw new PolicyDeniedError(COST_LIMIT_EXCEEDED_ERROR);
    }
  }

  spentTodayCents(): number {
    return this.costTracker.spentToday();
  }

  effectiveAutonomyLevel(): AutonomyLevel {
    return effectiveAutonomyLevel(this.options);
  }

  selectedTemperatureBand(): TemperatureBand {
    return selectedTemperatureBand(this.options);
  }

  clampTemperature(temperature: number): number {
    return clampTemperature(temperature, this.selectedTemperatureBand());
  }
}
