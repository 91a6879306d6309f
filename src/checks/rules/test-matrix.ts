import {
	TEST_MATRIX_INPUT,
	checkShards,
	hasTestMatrix,
	parseTestMatrix,
	resolveTestMatrix,
} from "../../core/test-matrix.js";
import type { CheckRule, RuleFinding } from "../rule.js";

export const testMatrixSyntaxRule: CheckRule = {
	id: "test-matrix-syntax",
	description: "Inline test matrices parse and every entry has config, shard and num_shards",
	defaultSeverity: "error",
	check({ workflow }) {
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs.filter(hasTestMatrix)) {
			const matrix = parseTestMatrix(job.with[TEST_MATRIX_INPUT]);
			if (matrix.kind === "invalid") {
				findings.push({ message: matrix.reason, jobId: job.id });
				continue;
			}
			if (matrix.kind !== "literal") {
				continue;
			}
			for (const problem of matrix.problems) {
				findings.push({ message: `${TEST_MATRIX_INPUT} ${problem}`, jobId: job.id });
			}
			if (matrix.entries.length === 0 && matrix.problems.length === 0) {
				findings.push({ message: `${TEST_MATRIX_INPUT} has no entries`, jobId: job.id });
			}
		}
		return findings;
	},
};

export const testMatrixShardsRule: CheckRule = {
	id: "test-matrix-shards",
	description: "Shard indices run 1..num_shards without gaps or repeats per config",
	defaultSeverity: "error",
	check({ workflow }) {
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs.filter(hasTestMatrix)) {
			const matrix = parseTestMatrix(job.with[TEST_MATRIX_INPUT]);
			if (matrix.kind !== "literal") {
				continue;
			}
			for (const problem of checkShards(matrix.entries)) {
				findings.push({ message: problem, jobId: job.id });
			}
		}
		return findings;
	},
};

export const testMatrixReferenceRule: CheckRule = {
	id: "test-matrix-reference",
	description: "A test matrix taken from another job resolves to that job's inline matrix",
	defaultSeverity: "error",
	check({ workflow }) {
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs.filter(hasTestMatrix)) {
			const matrix = parseTestMatrix(job.with[TEST_MATRIX_INPUT]);
			// needs-reference reports a missing needs entry.
			if (matrix.kind !== "reference" || !job.needs.includes(matrix.jobId)) {
				continue;
			}
			const resolved = resolveTestMatrix(workflow, job.id);
			if (!resolved.ok && resolved.runtimeExpression === undefined) {
				findings.push({ message: resolved.reason, jobId: job.id });
			}
		}
		return findings;
	},
};
