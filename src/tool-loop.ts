import type { ChatProvider } from './chat-provider.js';
import { ToolLoopError } from './errors.js';
import { logger } from './logger.js';
import type { EntityRateLimiter } from './security-policy.js';

export type LoopStopReason =
  | { kind: 'completed' }
  | { kind: 'max_iterations' }
  | { kind: 'rate_limited' }
  | { kind: 'approval_denied' }
  | { kind: 'error'; message: string }
  | { kind: 'hook_blocked'; message: string };

export type ToolLoopResult = {
  finalText: string;
  iterations: number;
  stopReason: LoopStopReason;
};

export type ToolLoopRunParams = {
  provider: ChatProvider;
  systemPrompt: string;
  userMessage: string;
  model: string;
  temperature: number;
  entityId: string;
  maxIterations: number;
  rateLimiter: EntityRateLimiter | null;
};

export type ToolLoop = {
  run(params: ToolLoopRunParams): Promise<ToolLoopResult>;
};

/**
 * Halting stop reasons keep whatever text the loop produced; error and
 * hook-blocked reasons fail the turn.
 */
export function handleToolLoopStopReason(result: ToolLoopResult, entityId: string): string {
  const reason = result.stopReason;
  switch (reason.kind) {
    case 'completed':
      return result.finalText;
    case 'max_iterations':
      logger.warn({ entityId, iterations: result.iterations }, 'tool loop hit max iterations');
      return result.finalText;
    case 'rate_limited':
      logger.warn({ entityId, iterations: result.iterations }, 'tool loop halted by rate limiter');
      return result.finalText;
    case 'approval_denied':
      logger.warn({ entityId, iterations: result.iterations }, 'tool loop halted by approval requirement');
      return result.finalText;
    case 'error':
      throw new ToolLoopError(`tool loop failed: ${reason.message}`);
    case 'hook_blocked':
      throw new ToolLoopError(`tool loop blocked by hook: ${reason.message}`);
  }
}

/**
 * Minimal loop for deployments without tools: one answer call, gated by
 * the per-entity rate limiter when one is supplied.
 */
export class DirectAnswerLoop implements ToolLoop {
  async run(params: ToolLoopRunParams): Promise<ToolLoopResult> {
    if (params.rateLimiter) {
      const denial = params.rateLimiter.checkAndRecord(params.entityId);
      if (denial) {
        logger.warn({ entityId: params.entityId, denial: denial.kind }, 'tool loop rate limited');
        return { finalText: '', iterations: 0, stopReason: { kind: 'rate_limited' } };
      }
    }
    if (params.maxIterations < 1) {
      return { finalText: '', iterations: 0, stopReason: { kind: 'max_iterations' } };
    }
    const finalText = await params.provider.chatWithSystem(
      params.systemPrompt,
      params.userMessage,
      params.model,
      params.temperature
    );
    return { finalText, iterations: 1, stopReason: { kind: 'completed' } };
  }
}
