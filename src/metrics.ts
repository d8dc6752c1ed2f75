import { Registry, collectDefaultMetrics, Counter } from 'prom-client';
import type { VerifyFailureClass } from './errors.js';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

let metricsEnabled = true;

/** When disabled, counters stop moving and the exposition is empty. */
export function setMetricsEnabled(enabled: boolean): void {
  metricsEnabled = enabled;
}

const turnsTotal = new Counter({
  name: 'keelson_turns_total',
  help: 'Total turn attempts by outcome',
  labelNames: ['outcome'],
  registers: [registry]
});

const answerPathTotal = new Counter({
  name: 'keelson_answer_path_total',
  help: 'Total answers by execution path',
  labelNames: ['path'],
  registers: [registry]
});

const verifyRepairRetriesTotal = new Counter({
  name: 'keelson_verify_repair_retries_total',
  help: 'Total verify/repair retries by failure class',
  labelNames: ['failure_class'],
  registers: [registry]
});

const verifyRepairEscalationsTotal = new Counter({
  name: 'keelson_verify_repair_escalations_total',
  help: 'Total verify/repair escalations',
  labelNames: ['reason', 'failure_class'],
  registers: [registry]
});

const writebackVerdictsTotal = new Counter({
  name: 'keelson_writeback_verdicts_total',
  help: 'Total writeback guard verdicts',
  labelNames: ['status'],
  registers: [registry]
});

const temperatureClampsTotal = new Counter({
  name: 'keelson_temperature_clamps_total',
  help: 'Total requested temperatures changed by the autonomy band',
  labelNames: ['autonomy_level'],
  registers: [registry]
});

const bestEffortFailuresTotal = new Counter({
  name: 'keelson_best_effort_failures_total',
  help: 'Total logged-and-swallowed side-effect failures',
  labelNames: ['stage'],
  registers: [registry]
});

export type BestEffortStage =
  | 'autosave'
  | 'context'
  | 'reflect'
  | 'inference'
  | 'consolidation'
  | 'escalation_audit';

export function recordTurnOutcome(outcome: 'success' | 'error'): void {
  if (!metricsEnabled) return;
  turnsTotal.inc({ outcome });
}

export function recordAnswerPath(path: 'planner' | 'tool_loop'): void {
  if (!metricsEnabled) return;
  answerPathTotal.inc({ path });
}

export function recordVerifyRepairRetry(failureClass: VerifyFailureClass): void {
  if (!metricsEnabled) return;
  verifyRepairRetriesTotal.inc({ failure_class: failureClass });
}

export function recordVerifyRepairEscalation(reason: string, failureClass: VerifyFailureClass): void {
  if (!metricsEnabled) return;
  verifyRepairEscalationsTotal.inc({ reason, failure_class: failureClass });
}

export function recordWritebackVerdict(status: 'accepted' | 'rejected'): void {
  if (!metricsEnabled) return;
  writebackVerdictsTotal.inc({ status });
}

export function recordTemperatureClamp(autonomyLevel: string): void {
  if (!metricsEnabled) return;
  temperatureClampsTotal.inc({ autonomy_level: autonomyLevel });
}

export function recordBestEffortFailure(stage: BestEffortStage): void {
  if (!metricsEnabled) return;
  bestEffortFailuresTotal.inc({ stage });
}

export function getMetricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsText(): Promise<string> {
  if (!metricsEnabled) return '';
  return registry.metrics();
}
