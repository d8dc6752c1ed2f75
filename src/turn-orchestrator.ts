import { clampTemperatureForTurn } from './autonomy.js';
import type { TemperaturePolicy } from './autonomy.js';
import { TurnCallAccounting } from './call-budget.js';
import type { ChatProvider } from './chat-provider.js';
import { enqueueConsolidationTask } from './consolidation.js';
import { errorMessage } from './errors.js';
import { runPostTurnInferencePass } from './inference.js';
import { extractJson } from './json-helpers.js';
import { logger } from './logger.js';
import type { ContextBuilder } from './memory-context.js';
import { createMemoryEvent, provenanceFor } from './memory-types.js';
import type { Memory, MemoryEventInput } from './memory-types.js';
import { recordAnswerPath, recordBestEffortFailure } from './metrics.js';
import type { PlanExecutor } from './plan-executor.js';
import {
  MIN_PLAN_STEPS,
  buildPlannerRequest,
  finalStepOutput,
  parsePlan,
  renderPlanFailure,
  shouldAttemptPlanner
} from './planner.js';
import type { ExecutionReport, Plan } from './planner.js';
import type { PersonaStatePersistence } from './persona-state.js';
import { runPersonaReflectWriteback } from './reflect.js';
import type { RuntimeConfig } from './runtime-config.js';
import type { EntityRateLimiter } from './security-policy.js';
import { enforceWriteScope } from './tenant-policy.js';
import type { MemoryWriteContext } from './tenant-policy.js';
import { handleToolLoopStopReason } from './tool-loop.js';
import type { ToolLoop } from './tool-loop.js';
import { truncateWithEllipsis } from './utils.js';
import { AUTOSAVE_ASSISTANT_SLOT, AUTOSAVE_USER_SLOT, enforceAgentAutosaveWritePolicy } from './write-policy.js';

const AUTOSAVE_USER_REF = 'agent.autosave.user_msg';
const AUTOSAVE_ASSISTANT_REF = 'agent.autosave.assistant_resp';
const ASSISTANT_SUMMARY_CHARS = 100;

/** The slice of the security policy a turn needs. */
export interface TurnSecurity extends TemperaturePolicy {
  consumeActionAndCost(estimatedCostCents: number): void;
}

export type TurnDependencies = {
  config: RuntimeConfig;
  security: TurnSecurity;
  memory: Memory;
  contextBuilder: ContextBuilder;
  answerProvider: ChatProvider;
  reflectProvider: ChatProvider;
  planExecutor: PlanExecutor;
  toolLoop: ToolLoop;
  /** Required for reflection; a turn with persona enabled and no persistence skips reflect. */
  persistence: PersonaStatePersistence | null;
  rateLimiter: EntityRateLimiter | null;
  workspaceDir: string;
  toolNames: string[];
};

export type TurnParams = {
  systemPrompt: string;
  model: string;
  temperature: number;
  userMessage: string;
  writeContext: MemoryWriteContext;
};

export type AnswerPath = 'planner' | 'tool_loop';

export type TurnOutcome = {
  response: string;
  accounting: TurnCallAccounting;
  path: AnswerPath;
};

async function appendAutosaveEvent(memory: Memory, event: MemoryEventInput): Promise<void> {
  try {
    enforceAgentAutosaveWritePolicy(event);
    await memory.appendEvent(event);
  } catch (err) {
    recordBestEffortFailure('autosave');
    logger.warn({ entityId: event.entityId, slotKey: event.slotKey, error: errorMessage(err) }, 'autosave write failed');
  }
}

function autosaveUserEvent(entityId: string, userMessage: string): MemoryEventInput {
  return createMemoryEvent(
    {
      entityId,
      slotKey: AUTOSAVE_USER_SLOT,
      eventType: 'fact_added',
      value: userMessage,
      source: 'explicit_user',
      privacyLevel: 'private'
    },
    {
      layer: 'working',
      confidence: 0.95,
      importance: 0.6,
      sourceKind: 'conversation',
      sourceRef: AUTOSAVE_USER_REF,
      provenance: provenanceFor('explicit_user', AUTOSAVE_USER_REF)
    }
  );
}

function autosaveAssistantEvent(entityId: string, response: string): MemoryEventInput {
  return createMemoryEvent(
    {
      entityId,
      slotKey: AUTOSAVE_ASSISTANT_SLOT,
      eventType: 'fact_added',
      value: truncateWithEllipsis(response, ASSISTANT_SUMMARY_CHARS),
      source: 'system',
      privacyLevel: 'private'
    },
    {
      layer: 'working',
      confidence: 0.9,
      importance: 0.4,
      sourceKind: 'conversation',
      sourceRef: AUTOSAVE_ASSISTANT_REF,
      provenance: provenanceFor('system', AUTOSAVE_ASSISTANT_REF)
    }
  );
}

async function buildEnrichedMessage(deps: TurnDependencies, writeContext: MemoryWriteContext, userMessage: string): Promise<string> {
  let context = '';
  try {
    context = await deps.contextBuilder.build(writeContext.entityId, userMessage, writeContext.policyContext);
  } catch (err) {
    recordBestEffortFailure('context');
    logger.warn({ entityId: writeContext.entityId, error: errorMessage(err) }, 'memory context unavailable; using raw message');
  }
  return context ? `${context}${userMessage}` : userMessage;
}

/**
 * Planner path for multi-step requests. Returns null whenever the turn
 * should fall through to the tool loop.
 */
async function tryExecuteWithPlanner(
  deps: TurnDependencies,
  params: TurnParams,
  enriched: string,
  temperature: number
): Promise<string | null> {
  const entityId = params.writeContext.entityId;
  let raw: string;
  try {
    raw = await deps.answerProvider.chatWithSystem(
      params.systemPrompt,
      buildPlannerRequest(enriched, deps.toolNames),
      params.model,
      temperature
    );
  } catch (err) {
    logger.warn({ entityId, error: errorMessage(err) }, 'planner generation failed; falling back to direct tool loop');
    return null;
  }

  const planJson = extractJson(raw);
  if (!planJson) {
    logger.warn({ entityId }, 'planner returned no JSON; falling back to direct tool loop');
    return null;
  }

  let plan: Plan;
  try {
    plan = parsePlan(planJson);
  } catch (err) {
    logger.warn({ entityId, error: errorMessage(err) }, 'planner JSON parse failed; falling back to direct tool loop');
    return null;
  }
  if (plan.steps.length < MIN_PLAN_STEPS) {
    logger.info({ entityId, steps: plan.steps.length }, 'planner produced short plan; using direct tool loop');
    return null;
  }

  let report: ExecutionReport;
  try {
    report = await deps.planExecutor.execute(plan, { entityId, model: params.model, temperature });
  } catch (err) {
    logger.warn({ entityId, error: errorMessage(err) }, 'plan execution failed; falling back to direct tool loop');
    return null;
  }
  if (report.success) return finalStepOutput(report) ?? 'Plan completed.';
  return renderPlanFailure(report);
}

async function answer(
  deps: TurnDependencies,
  params: TurnParams,
  enriched: string,
  temperature: number
): Promise<{ response: string; path: AnswerPath }> {
  const entityId = params.writeContext.entityId;
  if (shouldAttemptPlanner(params.userMessage)) {
    const planned = await tryExecuteWithPlanner(deps, params, enriched, temperature);
    if (planned !== null) {
      logger.info({ entityId }, 'planner path selected for main session turn');
      return { response: planned, path: 'planner' };
    }
  }

  const result = await deps.toolLoop.run({
    provider: deps.answerProvider,
    systemPrompt: params.systemPrompt,
    userMessage: enriched,
    model: params.model,
    temperature,
    entityId,
    maxIterations: deps.config.autonomy.maxToolLoopIterations,
    rateLimiter: deps.rateLimiter
  });
  logger.debug({
    entityId,
    iterations: result.iterations,
    stopReason: result.stopReason.kind
  }, 'main session tool loop completed');
  return { response: handleToolLoopStopReason(result, entityId), path: 'tool_loop' };
}

async function runReflectStage(deps: TurnDependencies, params: TurnParams, response: string): Promise<void> {
  const persona = deps.config.persona;
  if (!deps.persistence) {
    logger.warn({ personId: persona.personId }, 'persona enabled without state persistence; reflect skipped');
    return;
  }
  try {
    await runPersonaReflectWriteback({
      memory: deps.memory,
      persistence: deps.persistence,
      provider: deps.reflectProvider,
      model: persona.reflectModel || params.model,
      personId: persona.personId,
      limits: persona.limits,
      userMessage: params.userMessage,
      answer: response
    });
  } catch (err) {
    recordBestEffortFailure('reflect');
    logger.warn({ personId: persona.personId, error: errorMessage(err) }, 'persona reflect/writeback failed; answer path preserved');
  }
}

async function runPostTurnMemory(deps: TurnDependencies, params: TurnParams, response: string): Promise<void> {
  const { writeContext } = params;
  const entityId = writeContext.entityId;
  await appendAutosaveEvent(deps.memory, autosaveAssistantEvent(entityId, response));

  try {
    await runPostTurnInferencePass(deps.memory, writeContext, response);
  } catch (err) {
    recordBestEffortFailure('inference');
    logger.warn({ entityId, error: errorMessage(err) }, 'post-turn memory inference pass failed');
  }

  let checkpointEventCount: number;
  try {
    checkpointEventCount = await deps.memory.countEvents(entityId);
  } catch (err) {
    recordBestEffortFailure('consolidation');
    logger.warn({ entityId, error: errorMessage(err) }, 'post-turn consolidation checkpoint skipped');
    return;
  }
  // Detached: the turn never waits on consolidation
  void enqueueConsolidationTask(deps.memory, deps.workspaceDir, {
    entityId,
    checkpointEventCount,
    userMessage: params.userMessage,
    assistantResponse: response
  });
}

/**
 * One turn attempt. Only write-scope denial, security-policy denial, call
 * budget exhaustion and answer failures propagate; every other side effect
 * is logged and swallowed so the answer survives it.
 */
export async function executeTurn(deps: TurnDependencies, params: TurnParams): Promise<TurnOutcome> {
  const { config, security, memory } = deps;
  const { writeContext, userMessage } = params;
  const reflectionEnabled = config.persona.enabled;
  const accounting = new TurnCallAccounting(reflectionEnabled);
  enforceWriteScope(writeContext);

  if (config.memory.autoSave) {
    await appendAutosaveEvent(memory, autosaveUserEvent(writeContext.entityId, userMessage));
  }

  const enriched = await buildEnrichedMessage(deps, writeContext, userMessage);

  security.consumeActionAndCost(0);
  accounting.consumeAnswerCall();
  const { temperature } = clampTemperatureForTurn(params.temperature, security);
  const { response, path } = await answer(deps, params, enriched, temperature);
  recordAnswerPath(path);

  if (reflectionEnabled) {
    security.consumeActionAndCost(0);
    accounting.consumeReflectCall();
    await runReflectStage(deps, params, response);
  }

  if (config.memory.autoSave) {
    await runPostTurnMemory(deps, params, response);
  }

  return { response, accounting, path };
}
