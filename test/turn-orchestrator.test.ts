import fs from 'fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CONSOLIDATION_SLOT_KEY } from '../src/consolidation.js';
import { PolicyDeniedError, ToolLoopError, WriteScopeDeniedError } from '../src/errors.js';
import { SqliteMemory } from '../src/memory-store.js';
import { BackendCanonicalStatePersistence } from '../src/persona-state.js';
import { PERSONA_REFLECT_SYSTEM_PROMPT } from '../src/reflect.js';
import type { RuntimeConfig } from '../src/runtime-config.js';
import { SecurityPolicy } from '../src/security-policy.js';
import { createTurnDependencies, runMainSessionTurn, writeContextFor } from '../src/session.js';
import { disabledTenantPolicy, enabledTenantPolicy } from '../src/tenant-policy.js';
import type { ToolLoop } from '../src/tool-loop.js';
import { executeTurn } from '../src/turn-orchestrator.js';
import type { TurnParams } from '../src/turn-orchestrator.js';
import { VerifyRepairEscalatedError } from '../src/verify-repair.js';
import { AUTOSAVE_ASSISTANT_SLOT, AUTOSAVE_USER_SLOT } from '../src/write-policy.js';
import { ScriptedProvider, makeTempDir, removeDir, sampleStateHeader, testConfig, writebackPayloadFor } from './helpers.js';

function turnParams(userMessage: string, overrides: Partial<TurnParams> = {}): TurnParams {
  return {
    systemPrompt: 'You are a careful assistant.',
    model: 'test-model',
    temperature: 0.5,
    userMessage,
    writeContext: { entityId: 'default', policyContext: disabledTenantPolicy() },
    ...overrides
  };
}

const planReply = [
  'Plan:',
  '```json',
  JSON.stringify({
    id: 'plan-1',
    description: 'three prompts',
    steps: [
      { id: 's1', description: 'first', action: { kind: 'prompt', text: 'first' }, depends_on: [] },
      { id: 's2', description: 'second', action: { kind: 'prompt', text: 'second' }, depends_on: ['s1'] },
      { id: 's3', description: 'third', action: { kind: 'prompt', text: 'third' }, depends_on: ['s2'] }
    ]
  }),
  '```'
].join('\n');

describe('executeTurn', () => {
  let memory: SqliteMemory;
  let workspace: string;
  let config: RuntimeConfig;

  beforeEach(() => {
    memory = new SqliteMemory(':memory:');
    workspace = makeTempDir();
    config = testConfig({ memory: { autoSave: false } });
  });

  afterEach(() => {
    memory.close();
    removeDir(workspace);
  });

  it('answers through the tool loop with one answer call', async () => {
    const provider = new ScriptedProvider(['Paris.']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    const outcome = await executeTurn(deps, turnParams('What is the capital of France?'));

    expect(outcome.response).toBe('Paris.');
    expect(outcome.path).toBe('tool_loop');
    expect(outcome.accounting.snapshot()).toEqual({ budgetLimit: 1, answerCalls: 1, reflectCalls: 0 });
    expect(provider.calls).toEqual([{
      systemPrompt: 'You are a careful assistant.',
      message: 'What is the capital of France?',
      model: 'test-model',
      temperature: 0.5
    }]);
  });

  it('clamps the requested temperature to the autonomy band', async () => {
    const provider = new ScriptedProvider(['ok']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    await executeTurn(deps, turnParams('hello', { temperature: 1.5 }));

    // supervised band is [0.2, 0.7]
    expect(provider.calls[0].temperature).toBe(0.7);
  });

  it('autosaves both sides of the turn and consolidates in the background', async () => {
    config = testConfig();
    const provider = new ScriptedProvider(['Sunny and mild today.']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    await executeTurn(deps, turnParams('What is the weather?'));

    // The saved user message is recalled into the prompt
    expect(provider.calls[0].message).toBe(
      '[Memory context]\n- conversation.user_msg: What is the weather?\n\nWhat is the weather?'
    );
    expect((await memory.resolveSlot('default', AUTOSAVE_USER_SLOT))?.value).toBe('What is the weather?');
    expect((await memory.resolveSlot('default', AUTOSAVE_ASSISTANT_SLOT))?.value).toBe('Sunny and mild today.');

    await vi.waitFor(async () => {
      const slot = await memory.resolveSlot('default', CONSOLIDATION_SLOT_KEY);
      expect(slot?.value).toBe('checkpoint=2 | user=What is the weather? | assistant=Sunny and mild today.');
    });
  });

  it('records post-turn inference directives from the answer', async () => {
    config = testConfig();
    const provider = new ScriptedProvider([
      'Noted.\nINFERRED_CLAIM inference.preference.language => User prefers TypeScript'
    ]);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    await executeTurn(deps, turnParams('remember my language'));

    const slot = await memory.resolveSlot('default', 'inference.preference.language');
    expect(slot?.value).toBe('User prefers TypeScript');
    expect(slot?.source).toBe('inferred');
    await vi.waitFor(async () => {
      expect(await memory.resolveSlot('default', CONSOLIDATION_SLOT_KEY)).not.toBeNull();
    });
  });

  it('executes a plan for multi-step requests', async () => {
    const provider = new ScriptedProvider([planReply, 'did first', 'did second', 'did third']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    const outcome = await executeTurn(deps, turnParams('1. fetch the logs 2. parse them 3. report'));

    expect(outcome.path).toBe('planner');
    expect(outcome.response).toBe('did third');
    expect(provider.calls.map((call) => call.message).slice(1)).toEqual(['first', 'second', 'third']);
    expect(outcome.accounting.answerCalls).toBe(1);
  });

  it('falls back to the tool loop when the planner returns no JSON', async () => {
    const provider = new ScriptedProvider(['I would rather not plan.', 'direct answer']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    const outcome = await executeTurn(deps, turnParams('1. fetch the logs 2. parse them 3. report'));

    expect(outcome.path).toBe('tool_loop');
    expect(outcome.response).toBe('direct answer');
  });

  it('falls back to the tool loop when the plan is too short', async () => {
    const shortPlan = JSON.stringify({
      id: 'p',
      description: 'short',
      steps: [{ id: 'only', description: 'one', action: { kind: 'prompt', text: 'one' } }]
    });
    const provider = new ScriptedProvider([shortPlan, 'direct answer']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    const outcome = await executeTurn(deps, turnParams('first fetch, then parse, then report, finally stop'));

    expect(outcome.path).toBe('tool_loop');
    expect(outcome.response).toBe('direct answer');
  });

  it('fails the turn on tool loop errors and hook blocks', async () => {
    const provider = new ScriptedProvider(['unused']);
    const erroring: ToolLoop = {
      run: async () => ({ finalText: '', iterations: 2, stopReason: { kind: 'error', message: 'tool crashed' } })
    };
    const blocked: ToolLoop = {
      run: async () => ({ finalText: '', iterations: 1, stopReason: { kind: 'hook_blocked', message: 'denied by hook' } })
    };

    await expect(executeTurn(
      createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace, toolLoop: erroring }),
      turnParams('hi')
    )).rejects.toThrow(new ToolLoopError('tool loop failed: tool crashed'));
    await expect(executeTurn(
      createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace, toolLoop: blocked }),
      turnParams('hi')
    )).rejects.toThrow('tool loop blocked by hook: denied by hook');
  });

  it('keeps partial text when the tool loop halts on max iterations', async () => {
    const halting: ToolLoop = {
      run: async () => ({ finalText: 'partial answer', iterations: 10, stopReason: { kind: 'max_iterations' } })
    };
    const deps = createTurnDependencies({
      config,
      memory,
      answerProvider: new ScriptedProvider(['unused']),
      workspaceDir: workspace,
      toolLoop: halting
    });
    const outcome = await executeTurn(deps, turnParams('hi'));
    expect(outcome.response).toBe('partial answer');
  });

  it('denies the turn before any write when the entity is outside the tenant', async () => {
    config = testConfig();
    const provider = new ScriptedProvider(['unused']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    await expect(executeTurn(deps, turnParams('hi', {
      writeContext: { entityId: 'globex:user-1', policyContext: enabledTenantPolicy('acme') }
    }))).rejects.toThrow(WriteScopeDeniedError);
    expect(await memory.countEvents()).toBe(0);
    expect(provider.calls).toHaveLength(0);
  });

  it('fails on a security policy denial', async () => {
    const security = SecurityPolicy.fromAutonomyConfig({ ...config.autonomy, maxActionsPerHour: 0 });
    const provider = new ScriptedProvider(['unused']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace, security });

    await expect(executeTurn(deps, turnParams('hi'))).rejects.toThrow(PolicyDeniedError);
    expect(provider.calls).toHaveLength(0);
  });
});

describe('executeTurn with persona reflection', () => {
  let memory: SqliteMemory;
  let workspace: string;
  let config: RuntimeConfig;
  let persistence: BackendCanonicalStatePersistence;

  beforeEach(async () => {
    memory = new SqliteMemory(':memory:');
    workspace = makeTempDir();
    config = testConfig({ persona: { enabled: true }, memory: { autoSave: false } });
    persistence = new BackendCanonicalStatePersistence(memory, workspace, 'default', 'STATE.md', config.persona.limits);
    await persistence.persistAndSync(sampleStateHeader());
  });

  afterEach(() => {
    memory.close();
    removeDir(workspace);
  });

  it('keeps the answer when the reflect output is malformed', async () => {
    const reflect = new ScriptedProvider(['{"state_header": ']);
    const deps = createTurnDependencies({
      config,
      memory,
      answerProvider: new ScriptedProvider(['The answer.']),
      reflectProvider: reflect,
      workspaceDir: workspace
    });

    const outcome = await executeTurn(deps, turnParams('hello'));

    expect(outcome.response).toBe('The answer.');
    expect(outcome.accounting.snapshot()).toEqual({ budgetLimit: 2, answerCalls: 1, reflectCalls: 1 });
    expect(reflect.calls).toHaveLength(1);
    expect(await persistence.loadBackendCanonical()).toEqual(sampleStateHeader());
  });

  it('persists an accepted writeback and its memory notes', async () => {
    const next = sampleStateHeader({ currentObjective: 'Refine the guard', lastUpdatedAt: '2026-02-16T11:00:00Z' });
    const reflect = new ScriptedProvider([JSON.stringify(writebackPayloadFor(next, ['Operator prefers terse answers']))]);
    const deps = createTurnDependencies({
      config,
      memory,
      answerProvider: new ScriptedProvider(['The answer.']),
      reflectProvider: reflect,
      workspaceDir: workspace
    });

    const outcome = await executeTurn(deps, turnParams('hello'));

    expect(outcome.response).toBe('The answer.');
    expect(reflect.calls[0].systemPrompt).toBe(PERSONA_REFLECT_SYSTEM_PROMPT);
    expect(reflect.calls[0].temperature).toBe(0);
    expect(reflect.calls[0].message).toContain('Latest assistant answer:\nThe answer.\n\n');
    expect(await persistence.loadBackendCanonical()).toEqual(next);
    expect((await memory.resolveSlot('person:default', 'persona.writeback.0'))?.value).toBe('Operator prefers terse answers');
    expect(fs.readFileSync(persistence.mirrorPath(), 'utf-8')).toContain('"current_objective": "Refine the guard"');
  });

  it('leaves canonical state alone when the guard rejects', async () => {
    const tampered = sampleStateHeader({ safetyPosture: 'relaxed' });
    const reflect = new ScriptedProvider([JSON.stringify(writebackPayloadFor(tampered))]);
    const deps = createTurnDependencies({
      config,
      memory,
      answerProvider: new ScriptedProvider(['The answer.']),
      reflectProvider: reflect,
      workspaceDir: workspace
    });

    const outcome = await executeTurn(deps, turnParams('hello'));

    expect(outcome.response).toBe('The answer.');
    expect(await persistence.loadBackendCanonical()).toEqual(sampleStateHeader());
  });
});

describe('runMainSessionTurn', () => {
  let memory: SqliteMemory;
  let workspace: string;

  beforeEach(() => {
    memory = new SqliteMemory(':memory:');
    workspace = makeTempDir();
  });

  afterEach(() => {
    memory.close();
    removeDir(workspace);
  });

  it('retries a transient answer failure with fresh accounting', async () => {
    const config = testConfig({ memory: { autoSave: false } });
    const provider = new ScriptedProvider([new Error('connection reset'), 'recovered']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    const outcome = await runMainSessionTurn(deps, turnParams('hello'));

    expect(outcome.response).toBe('recovered');
    expect(outcome.accounting.answerCalls).toBe(1);
    expect(provider.calls).toHaveLength(2);
  });

  it('escalates a policy denial on the first attempt', async () => {
    const config = testConfig({ memory: { autoSave: false }, autonomy: { maxActionsPerHour: 0 } });
    const deps = createTurnDependencies({
      config,
      memory,
      answerProvider: new ScriptedProvider(['unused']),
      workspaceDir: workspace
    });

    let caught: unknown;
    try {
      await runMainSessionTurn(deps, turnParams('hello'));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(VerifyRepairEscalatedError);
    if (caught instanceof VerifyRepairEscalatedError) {
      expect(caught.escalation.reason).toBe('non_retryable_failure');
      expect(caught.escalation.attempts).toBe(1);
      expect(caught.escalation.repairDepth).toBe(0);
      expect(caught.escalation.lastError).toBe('blocked by security policy: action limit exceeded');
    }
  });

  it('escalates a write-scope denial without an audit row under the denied entity', async () => {
    const config = testConfig({ memory: { tenantMode: { enabled: true, tenantId: 'acme' } } });
    const provider = new ScriptedProvider(['unused']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    await expect(runMainSessionTurn(deps, turnParams('hello', {
      writeContext: writeContextFor(config, 'globex:user-1')
    }))).rejects.toThrow(VerifyRepairEscalatedError);
    expect(await memory.countEvents('globex:user-1')).toBe(0);
    expect(await memory.countEvents()).toBe(0);
    expect(provider.calls).toHaveLength(0);
  });

  it('falls back to the configured agent model and temperature', async () => {
    const config = testConfig({ memory: { autoSave: false }, agent: { model: 'config-model', temperature: 0.3 } });
    const provider = new ScriptedProvider(['ok']);
    const deps = createTurnDependencies({ config, memory, answerProvider: provider, workspaceDir: workspace });

    await runMainSessionTurn(deps, {
      systemPrompt: 'You are a careful assistant.',
      userMessage: 'hello',
      writeContext: writeContextFor(config, 'default')
    });

    expect(provider.calls[0].model).toBe('config-model');
    expect(provider.calls[0].temperature).toBe(0.3);
  });

  it('derives the tenant policy from configuration', () => {
    const config = testConfig({ memory: { tenantMode: { enabled: true, tenantId: 'acme' } } });
    expect(writeContextFor(config, 'acme:user-1')).toEqual({
      entityId: 'acme:user-1',
      policyContext: { tenantModeEnabled: true, tenantId: 'acme' }
    });
  });
});
