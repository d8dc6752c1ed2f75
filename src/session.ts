import type { ChatProvider } from './chat-provider.js';
import { applyLogLevel, logger } from './logger.js';
import { createMemoryContextBuilder } from './memory-context.js';
import type { ContextBuilder } from './memory-context.js';
import type { Memory } from './memory-types.js';
import { recordTurnOutcome, setMetricsEnabled } from './metrics.js';
import { SequentialPlanExecutor } from './plan-executor.js';
import type { PlanExecutor, StepRunner } from './plan-executor.js';
import { BackendCanonicalStatePersistence } from './persona-state.js';
import type { PersonaStatePersistence } from './persona-state.js';
import type { RuntimeConfig } from './runtime-config.js';
import { EntityRateLimiter, SecurityPolicy } from './security-policy.js';
import { disabledTenantPolicy, enabledTenantPolicy } from './tenant-policy.js';
import type { MemoryWriteContext } from './tenant-policy.js';
import { DirectAnswerLoop } from './tool-loop.js';
import type { ToolLoop } from './tool-loop.js';
import { executeTurn } from './turn-orchestrator.js';
import type { TurnDependencies, TurnOutcome, TurnParams } from './turn-orchestrator.js';
import { runWithVerifyRepair, verifyRepairCapsFromConfig } from './verify-repair.js';

export type SessionRuntimeOptions = {
  config: RuntimeConfig;
  memory: Memory;
  answerProvider: ChatProvider;
  /** Defaults to the answer provider. */
  reflectProvider?: ChatProvider;
  workspaceDir: string;
  toolLoop?: ToolLoop;
  planExecutor?: PlanExecutor;
  stepRunner?: StepRunner;
  contextBuilder?: ContextBuilder;
  persistence?: PersonaStatePersistence | null;
  security?: SecurityPolicy;
  toolNames?: string[];
};

/** Prompt steps go to the answer provider; tool steps fail without a registry. */
function providerStepRunner(provider: ChatProvider, systemPrompt: string | null): StepRunner {
  return {
    async runTool(toolName) {
      throw new Error(`no tool registry available for tool: ${toolName}`);
    },
    runPrompt(text, ctx) {
      return provider.chatWithSystem(systemPrompt, text, ctx.model, ctx.temperature);
    }
  };
}

/** Apply the `host` section: log level and the metrics switch. */
export function applyHostConfig(config: RuntimeConfig): void {
  applyLogLevel(config.host.logLevel);
  setMetricsEnabled(config.host.metrics.enabled);
}

/** Wire the default collaborators around a memory backend and a provider. */
export function createTurnDependencies(options: SessionRuntimeOptions): TurnDependencies {
  const { config, memory, answerProvider } = options;
  applyHostConfig(config);
  const persona = config.persona;
  const persistence = options.persistence !== undefined
    ? options.persistence
    : persona.enabled
      ? new BackendCanonicalStatePersistence(memory, options.workspaceDir, persona.personId, persona.mirrorFilename, persona.limits)
      : null;
  return {
    config,
    security: options.security ?? SecurityPolicy.fromAutonomyConfig(config.autonomy),
    memory,
    contextBuilder: options.contextBuilder ?? createMemoryContextBuilder(memory),
    answerProvider,
    reflectProvider: options.reflectProvider ?? answerProvider,
    planExecutor: options.planExecutor
      ?? new SequentialPlanExecutor(options.stepRunner ?? providerStepRunner(answerProvider, null)),
    toolLoop: options.toolLoop ?? new DirectAnswerLoop(),
    persistence,
    rateLimiter: new EntityRateLimiter(
      config.autonomy.maxActionsPerHour,
      config.autonomy.maxActionsPerEntityPerHour
    ),
    workspaceDir: options.workspaceDir,
    toolNames: options.toolNames ?? []
  };
}

/** Write context for an entity under the configured tenant mode. */
export function writeContextFor(config: RuntimeConfig, entityId: string): MemoryWriteContext {
  const tenant = config.memory.tenantMode;
  return {
    entityId,
    policyContext: tenant.enabled ? enabledTenantPolicy(tenant.tenantId) : disabledTenantPolicy()
  };
}

export type MainSessionTurnParams = {
  systemPrompt: string;
  /** Defaults to `agent.model`. */
  model?: string;
  /** Defaults to `agent.temperature`; clamped to the autonomy band either way. */
  temperature?: number;
  userMessage: string;
  writeContext: MemoryWriteContext;
};

/**
 * A full main-session turn: the orchestrator wrapped by the verify/repair
 * loop. Each attempt gets fresh call accounting. Terminal failures surface
 * as VerifyRepairEscalatedError.
 */
export async function runMainSessionTurn(
  deps: TurnDependencies,
  params: MainSessionTurnParams
): Promise<TurnOutcome> {
  const caps = verifyRepairCapsFromConfig(deps.config);
  const entityId = params.writeContext.entityId;
  const turnParams: TurnParams = {
    ...params,
    model: params.model ?? deps.config.agent.model,
    temperature: params.temperature ?? deps.config.agent.temperature
  };
  try {
    const outcome = await runWithVerifyRepair({
      caps,
      memory: deps.memory,
      entityId,
      attempt: (attemptNumber) => {
        logger.debug({ entityId, attempt: attemptNumber }, 'main session turn attempt');
        return executeTurn(deps, turnParams);
      }
    });
    recordTurnOutcome('success');
    return outcome;
  } catch (err) {
    recordTurnOutcome('error');
    throw err;
  }
}
