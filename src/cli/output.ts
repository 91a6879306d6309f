import type { CheckSummary } from "../checks/run-checks.js";
import type { EvaluatedGroup } from "../core/concurrency.js";
import type { Stage } from "../core/graph.js";
import type { Diagnostic, PlannedShard, Workflow } from "../core/types.js";

export type WorkflowRef = {
	name: string;
	path: string;
};

export type MatrixJobSummary = {
	jobId: string;
	sourceJobId?: string;
	shards: PlannedShard[];
	runtimeExpression?: string;
	error?: string;
};

export function workflowRef(workflow: Workflow, relativePath: string): WorkflowRef {
	return { name: workflow.name, path: relativePath };
}

export function buildCheckJson(
	summary: CheckSummary,
	diagnostics: Diagnostic[],
	reportPath?: string,
): Record<string, unknown> {
	return {
		ok: summary.errors === 0,
		summary,
		diagnostics,
		reportPath,
	};
}

export function buildGraphJson(workflow: WorkflowRef, stages: Stage[], order: string[]): Record<string, unknown> {
	return { workflow, order, stages };
}

export function buildMatrixJson(workflow: WorkflowRef, jobs: MatrixJobSummary[]): Record<string, unknown> {
	return {
		workflow,
		jobs,
		totalShards: jobs.reduce((total, job) => total + job.shards.length, 0),
	};
}

export function buildConcurrencyJson(
	workflow: WorkflowRef,
	cancelInProgress: boolean | string | undefined,
	groups: EvaluatedGroup[],
): Record<string, unknown> {
	return { workflow, cancelInProgress, groups };
}

export function toJsonText(value: unknown): string {
	return `${JSON.stringify(value, null, 2)}\n`;
}
