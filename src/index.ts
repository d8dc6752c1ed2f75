export { logger } from './logger.js';
export type { Logger } from './logger.js';

export * from './errors.js';
export { sanitizeApiError, scrubSecretPatterns } from './scrub.js';

export {
  AUTONOMY_LEVELS,
  DEFAULT_TEMPERATURE_BANDS,
  buildRuntimeConfig,
  loadRuntimeConfig,
  getRuntimeConfigPath,
  resetRuntimeConfigCacheForTests,
  validateTemperatureBand
} from './runtime-config.js';
export type { AutonomyConfig, AutonomyLevel, PersonaLimits, RuntimeConfig, TemperatureBand } from './runtime-config.js';

export {
  clampTemperature,
  clampTemperatureForTurn,
  effectiveAutonomyLevel,
  minAutonomyLevel,
  selectedTemperatureBand
} from './autonomy.js';
export type { TemperatureDecision, TemperaturePolicy } from './autonomy.js';

export {
  ACTION_LIMIT_EXCEEDED_ERROR,
  COST_LIMIT_EXCEEDED_ERROR,
  ActionTracker,
  CostTracker,
  EntityRateLimiter,
  SecurityPolicy
} from './security-policy.js';
export type { Clock, RateLimitDenial, SecurityPolicyOptions } from './security-policy.js';

export * from './tenant-policy.js';
export * from './write-policy.js';
export * from './memory-types.js';
export { SqliteMemory } from './memory-store.js';
export { buildMemoryContext, createMemoryContextBuilder } from './memory-context.js';
export type { ContextBuilder } from './memory-context.js';

export { containsPoisonPattern, validateWritebackPayload } from './writeback-guard.js';
export type {
  ImmutableStateHeader,
  StateHeaderWriteback,
  WritebackGuardVerdict,
  WritebackPayload
} from './writeback-guard.js';
export {
  STATE_HEADER_SCHEMA_VERSION,
  immutableFieldsOf,
  parseStateHeaderJson,
  stateHeaderToJson,
  validateStateHeader,
  validateWritebackCandidate
} from './state-header.js';
export type { StateHeader, StateHeaderJson } from './state-header.js';
export {
  BackendCanonicalStatePersistence,
  canonicalStateSlot,
  parseStateHeaderMirror,
  renderStateHeaderMirror
} from './persona-state.js';
export type { PersonaStatePersistence } from './persona-state.js';

export { TurnCallAccounting } from './call-budget.js';
export {
  VerifyRepairEscalatedError,
  analyzeVerifyFailure,
  decideVerifyRepairEscalation,
  emitVerifyRepairEscalationEvent,
  escalationContractMessage,
  escalationEventPayload,
  runWithVerifyRepair,
  verifyRepairCapsFromConfig
} from './verify-repair.js';
export type {
  VerifyFailureAnalysis,
  VerifyRepairCaps,
  VerifyRepairEscalation,
  VerifyRepairEscalationReason,
  VerifyRepairParams
} from './verify-repair.js';

export type { ChatProvider } from './chat-provider.js';
export * from './planner.js';
export { SequentialPlanExecutor } from './plan-executor.js';
export type { PlanExecutionContext, PlanExecutor, StepRunner } from './plan-executor.js';
export { DirectAnswerLoop, handleToolLoopStopReason } from './tool-loop.js';
export type { LoopStopReason, ToolLoop, ToolLoopResult, ToolLoopRunParams } from './tool-loop.js';
export {
  PERSONA_REFLECT_SYSTEM_PROMPT,
  buildReflectMessage,
  parseReflectPayload,
  runPersonaReflectWriteback
} from './reflect.js';
export type { ReflectWritebackOutcome, ReflectWritebackParams } from './reflect.js';
export { parseInferenceEvents, runPostTurnInferencePass } from './inference.js';
export {
  CONSOLIDATION_SLOT_KEY,
  buildConsolidationValue,
  enqueueConsolidationTask,
  runConsolidationOnce
} from './consolidation.js';
export type { ConsolidationDisposition, ConsolidationInput, ConsolidationOutput } from './consolidation.js';

export { executeTurn } from './turn-orchestrator.js';
export type { AnswerPath, TurnDependencies, TurnOutcome, TurnParams, TurnSecurity } from './turn-orchestrator.js';
export { applyHostConfig, createTurnDependencies, runMainSessionTurn, writeContextFor } from './session.js';
export type { MainSessionTurnParams, SessionRuntimeOptions } from './session.js';
export { getMetricsContentType, getMetricsText, setMetricsEnabled } from './metrics.js';
