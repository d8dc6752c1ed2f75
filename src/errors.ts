export type VerifyFailureClass =
  | 'policy_limit'
  | 'quota_exhausted'
  | 'non_retryable_provider_error'
  | 'transient_failure';

export type TurnErrorKind =
  | 'policy_denial'
  | 'budget_exhausted'
  | 'tool_loop'
  | 'write_policy'
  | 'escalation';

/**
 * Base class for errors raised by the turn control plane. `failureClass`,
 * when set, overrides message-based classification in the failure analyzer.
 */
export class TurnControlError extends Error {
  readonly kind: TurnErrorKind;
  readonly failureClass: VerifyFailureClass | null;

  constructor(kind: TurnErrorKind, message: string, failureClass: VerifyFailureClass | null = null) {
    super(message);
    this.name = 'TurnControlError';
    this.kind = kind;
    this.failureClass = failureClass;
  }
}

export class PolicyDeniedError extends TurnControlError {
  constructor(message: string) {
    super('policy_denial', message, 'policy_limit');
    this.name = 'PolicyDeniedError';
  }
}

export class WriteScopeDeniedError extends TurnControlError {
  constructor(message: string) {
    super('policy_denial', message, 'policy_limit');
    this.name = 'WriteScopeDeniedError';
  }
}

export class BudgetExceededError extends TurnControlError {
  readonly consumed: number;
  readonly budget: number;

  constructor(consumed: number, budget: number) {
    super(
      'budget_exhausted',
      `persona per-turn call budget exceeded: consumed=${consumed} budget=${budget}`,
      'policy_limit'
    );
    this.name = 'BudgetExceededError';
    this.consumed = consumed;
    this.budget = budget;
  }
}

export class ToolLoopError extends TurnControlError {
  constructor(message: string) {
    super('tool_loop', message);
    this.name = 'ToolLoopError';
  }
}

export class WritePolicyError extends TurnControlError {
  constructor(message: string) {
    super('write_policy', message);
    this.name = 'WritePolicyError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
