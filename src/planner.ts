import { z } from 'zod';

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

const stepActionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('tool_call'), tool_name: z.string().min(1), args: z.record(z.unknown()).default({}) }),
  z.object({ kind: z.literal('prompt'), text: z.string() }),
  z.object({ kind: z.literal('checkpoint'), label: z.string() })
]);

export type StepAction = z.infer<typeof stepActionSchema>;

const rawPlanSchema = z.object({
  id: z.string(),
  description: z.string(),
  steps: z.array(z.object({
    id: z.string(),
    description: z.string(),
    action: stepActionSchema,
    depends_on: z.array(z.string()).default([])
  }))
});

export type PlanStep = {
  id: string;
  description: string;
  action: StepAction;
  dependsOn: string[];
  status: StepStatus;
  output: string | null;
  error: string | null;
};

export type Plan = {
  id: string;
  description: string;
  steps: PlanStep[];
};

export type ExecutionReport = {
  success: boolean;
  completedSteps: string[];
  failedSteps: string[];
  skippedSteps: string[];
  /** Steps in plan order with their final status, output and error. */
  steps: PlanStep[];
};

export const MIN_PLAN_STEPS = 3;

export const PLAN_SCHEMA_PROMPT = [
  'When creating a plan, respond with a JSON object in this exact format:',
  '{',
  '  "id": "<unique-id>",',
  '  "description": "<plan description>",',
  '  "steps": [',
  '    {',
  '      "id": "<step-id>",',
  '      "description": "<what this step does>",',
  '      "action": <action>,',
  '      "depends_on": ["<step-ids this depends on>"]',
  '    }',
  '  ]',
  '}',
  '',
  'Action types:',
  '- Tool call: { "kind": "tool_call", "tool_name": "<name>", "args": { ... } }',
  '- Prompt: { "kind": "prompt", "text": "<instruction>" }',
  '- Checkpoint: { "kind": "checkpoint", "label": "<label>" }',
  '',
  'Steps with no dependencies use "depends_on": [].',
  'Wrap the JSON in a ```json code fence.'
].join('\n');

const NUMBERED_MARKERS = ['1.', '2.', '3.', '1)', '2)', '3)'];
const CONNECTOR_TOKENS = [' then ', ' next ', ' after ', ' finally '];

/**
 * Cheap multi-step heuristic: three numbered markers, three bullet lines,
 * or two sequencing connectors.
 */
export function shouldAttemptPlanner(userMessage: string): boolean {
  const lowercase = userMessage.toLowerCase();
  const numberedHits = NUMBERED_MARKERS.filter((marker) => lowercase.includes(marker)).length;
  if (numberedHits >= 3) return true;

  const bulletLines = userMessage.split('\n').filter((line) => {
    const trimmed = line.trimStart();
    return trimmed.startsWith('- ') || trimmed.startsWith('* ');
  }).length;
  if (bulletLines >= 3) return true;

  const connectorHits = CONNECTOR_TOKENS.filter((token) => lowercase.includes(token)).length;
  return connectorHits >= 2;
}

export function buildPlannerRequest(userMessage: string, toolNames: string[]): string {
  const toolList = toolNames.length === 0 ? '(no tools available)' : toolNames.join(', ');
  return 'You are the planning controller for an autonomous agent. '
    + `Build a DAG plan with at least ${MIN_PLAN_STEPS} steps for this task.\n\n`
    + `Available tools: ${toolList}\n\n${PLAN_SCHEMA_PROMPT}\n\nTask:\n${userMessage}`;
}

/**
 * Kahn's algorithm with lexicographic tie-breaking, so equal plans always
 * execute in the same order. Throws on unknown dependencies and cycles.
 */
export function topologicalOrder(plan: Plan): string[] {
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, string[]>();
  for (const step of plan.steps) {
    inDegree.set(step.id, 0);
    adjacency.set(step.id, []);
  }
  for (const step of plan.steps) {
    for (const dep of step.dependsOn) {
      const neighbors = adjacency.get(dep);
      if (!neighbors) {
        throw new Error(`step ${step.id} depends on unknown step: ${dep}`);
      }
      neighbors.push(step.id);
      inDegree.set(step.id, (inDegree.get(step.id) ?? 0) + 1);
    }
  }

  const ready = [...inDegree.entries()].filter(([, degree]) => degree === 0).map(([id]) => id).sort();
  const sorted: string[] = [];
  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) break;
    sorted.push(next);
    for (const neighbor of adjacency.get(next) ?? []) {
      const degree = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, degree);
      if (degree === 0) {
        ready.push(neighbor);
        ready.sort();
      }
    }
  }
  if (sorted.length !== plan.steps.length) {
    throw new Error('cycle detected in plan dependencies');
  }
  return sorted;
}

/** Parse and structurally validate planner output. */
export function parsePlan(json: string): Plan {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error(`invalid plan JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = rawPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`invalid plan JSON: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  if (parsed.data.steps.length === 0) {
    throw new Error('plan must have at least one step');
  }

  const seen = new Set<string>();
  for (const step of parsed.data.steps) {
    if (!step.id.trim()) throw new Error('plan step id cannot be empty');
    if (seen.has(step.id)) throw new Error(`duplicate plan step id: ${step.id}`);
    seen.add(step.id);
  }

  const plan: Plan = {
    id: parsed.data.id,
    description: parsed.data.description,
    steps: parsed.data.steps.map((step) => ({
      id: step.id,
      description: step.description,
      action: step.action,
      dependsOn: step.depends_on,
      status: 'pending',
      output: null,
      error: null
    }))
  };
  topologicalOrder(plan);
  return plan;
}

export function finalStepOutput(report: ExecutionReport): string | null {
  for (let i = report.steps.length - 1; i >= 0; i--) {
    const step = report.steps[i];
    if (step.status === 'completed' && step.output !== null) return step.output;
  }
  return null;
}

export function renderPlanFailure(report: ExecutionReport): string {
  const lines = [
    `Plan execution incomplete (completed=${report.completedSteps.length}, `
      + `failed=${report.failedSteps.length}, skipped=${report.skippedSteps.length}).`
  ];
  for (const step of report.steps) {
    if (step.status === 'failed') {
      lines.push(`Failed step ${step.id}: ${step.error ?? 'unknown failure'}`);
    }
  }
  return lines.join('\n');
}
