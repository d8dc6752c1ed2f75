import { describe, expect, it } from 'vitest';
import { ToolLoopError } from '../src/errors.js';
import { EntityRateLimiter } from '../src/security-policy.js';
import { DirectAnswerLoop, handleToolLoopStopReason } from '../src/tool-loop.js';
import type { LoopStopReason, ToolLoopRunParams } from '../src/tool-loop.js';
import { ScriptedProvider } from './helpers.js';

function result(stopReason: LoopStopReason) {
  return { finalText: 'partial', iterations: 3, stopReason };
}

describe('handleToolLoopStopReason', () => {
  it('returns the loop text for completed and halting reasons', () => {
    expect(handleToolLoopStopReason(result({ kind: 'completed' }), 'default')).toBe('partial');
    expect(handleToolLoopStopReason(result({ kind: 'max_iterations' }), 'default')).toBe('partial');
    expect(handleToolLoopStopReason(result({ kind: 'rate_limited' }), 'default')).toBe('partial');
    expect(handleToolLoopStopReason(result({ kind: 'approval_denied' }), 'default')).toBe('partial');
  });

  it('fails on error and hook-blocked reasons', () => {
    expect(() => handleToolLoopStopReason(result({ kind: 'error', message: 'bad tool' }), 'default'))
      .toThrow(new ToolLoopError('tool loop failed: bad tool'));
    expect(() => handleToolLoopStopReason(result({ kind: 'hook_blocked', message: 'nope' }), 'default'))
      .toThrow('tool loop blocked by hook: nope');
  });
});

describe('DirectAnswerLoop', () => {
  function params(provider: ScriptedProvider, overrides: Partial<ToolLoopRunParams> = {}): ToolLoopRunParams {
    return {
      provider,
      systemPrompt: 'system',
      userMessage: 'hello',
      model: 'test-model',
      temperature: 0.4,
      entityId: 'default',
      maxIterations: 10,
      rateLimiter: null,
      ...overrides
    };
  }

  it('makes one provider call', async () => {
    const provider = new ScriptedProvider(['hi there']);
    const outcome = await new DirectAnswerLoop().run(params(provider));
    expect(outcome).toEqual({ finalText: 'hi there', iterations: 1, stopReason: { kind: 'completed' } });
    expect(provider.calls).toEqual([{ systemPrompt: 'system', message: 'hello', model: 'test-model', temperature: 0.4 }]);
  });

  it('stops without calling the provider when the entity is rate limited', async () => {
    const provider = new ScriptedProvider(['hi there']);
    const limiter = new EntityRateLimiter(10, 1);
    const loop = new DirectAnswerLoop();

    await loop.run(params(provider, { rateLimiter: limiter }));
    const second = await loop.run(params(provider, { rateLimiter: limiter }));

    expect(second).toEqual({ finalText: '', iterations: 0, stopReason: { kind: 'rate_limited' } });
    expect(provider.calls).toHaveLength(1);
  });

  it('reports max_iterations when no iteration is allowed', async () => {
    const provider = new ScriptedProvider(['hi there']);
    const outcome = await new DirectAnswerLoop().run(params(provider, { maxIterations: 0 }));
    expect(outcome.stopReason).toEqual({ kind: 'max_iterations' });
    expect(provider.calls).toHaveLength(0);
  });

  it('propagates provider failures', async () => {
    const provider = new ScriptedProvider([new Error('provider returned 500')]);
    await expect(new DirectAnswerLoop().run(params(provider))).rejects.toThrow('provider returned 500');
  });
});
