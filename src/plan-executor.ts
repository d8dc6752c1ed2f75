import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { topologicalOrder } from './planner.js';
import type { ExecutionReport, Plan, PlanStep } from './planner.js';

export type PlanExecutionContext = {
  entityId: string;
  model: string;
  temperature: number;
};

export type PlanExecutor = {
  execute(plan: Plan, ctx: PlanExecutionContext): Promise<ExecutionReport>;
};

/** Performs the side effects of individual plan steps. */
export type StepRunner = {
  runTool(toolName: string, args: Record<string, unknown>, ctx: PlanExecutionContext): Promise<string>;
  runPrompt(text: string, ctx: PlanExecutionContext): Promise<string>;
};

function cloneStep(step: PlanStep): PlanStep {
  return { ...step, dependsOn: [...step.dependsOn] };
}

/**
 * Runs steps one at a time in topological order. A failed step marks every
 * transitive dependent as skipped; independent branches keep running.
 */
export class SequentialPlanExecutor implements PlanExecutor {
  constructor(private readonly runner: StepRunner) {}

  async execute(plan: Plan, ctx: PlanExecutionContext): Promise<ExecutionReport> {
    const order = topologicalOrder(plan);
    const steps = new Map(plan.steps.map((step) => [step.id, cloneStep(step)]));
    const completed: string[] = [];
    const failed: string[] = [];
    const skipped: string[] = [];

    for (const id of order) {
      const step = steps.get(id);
      if (!step) continue;
      const blocked = step.dependsOn.some((dep) => {
        const status = steps.get(dep)?.status;
        return status === 'failed' || status === 'skipped';
      });
      if (blocked) {
        step.status = 'skipped';
        skipped.push(id);
        continue;
      }

      step.status = 'running';
      try {
        step.output = await this.runStep(step, ctx);
        step.status = 'completed';
        completed.push(id);
      } catch (err) {
        step.status = 'failed';
        step.error = errorMessage(err);
        failed.push(id);
        logger.warn({ planId: plan.id, stepId: id, error: step.error }, 'plan step failed');
      }
    }

    return {
      success: failed.length === 0 && skipped.length === 0,
      completedSteps: completed,
      failedSteps: failed,
      skippedSteps: skipped,
      steps: plan.steps.flatMap((step) => {
        const finalStep = steps.get(step.id);
        return finalStep ? [finalStep] : [];
      })
    };
  }

  private async runStep(step: PlanStep, ctx: PlanExecutionContext): Promise<string> {
    const action = step.action;
    switch (action.kind) {
      case 'tool_call':
        return this.runner.runTool(action.tool_name, action.args, ctx);
      case 'prompt':
        return this.runner.runPrompt(action.text, ctx);
      case 'checkpoint':
        return action.label;
    }
  }
}
