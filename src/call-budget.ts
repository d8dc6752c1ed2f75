import { BudgetExceededError } from './errors.js';

/**
 * Per-turn ceiling on model calls: one answer call, plus one reflect call
 * when persona reflection is enabled. Each turn attempt gets a fresh
 * instance, so verify/repair retries never share a budget.
 */
export class TurnCallAccounting {
  readonly budgetLimit: number;
  private answer = 0;
  private reflect = 0;

  constructor(reflectionEnabled: boolean) {
    this.budgetLimit = reflectionEnabled ? 2 : 1;
  }

  get answerCalls(): number {
    return this.answer;
  }

  get reflectCalls(): number {
    return this.reflect;
  }

  get totalCalls(): number {
    return this.answer + this.reflect;
  }

  consumeAnswerCall(): void {
    this.answer += 1;
    this.ensureWithinBudget();
  }

  consumeReflectCall(): void {
    this.reflect += 1;
    this.ensureWithinBudget();
  }

  snapshot(): { budgetLimit: number; answerCalls: number; reflectCalls: number } {
    return { budgetLimit: this.budgetLimit, answerCalls: this.answer, reflectCalls: this.reflect };
  }

  private ensureWithinBudget(): void {
    const consumed = this.totalCalls;
    if (consumed > this.budgetLimit) {
      throw new BudgetExceededError(consumed, this.budgetLimit);
    }
  }
}
