import YAML from "yaml";
import { z } from "zod";
import { asOptionalString, isRecord } from "../utils/records.js";
import {
	type NeedsReference,
	collectNeedsReferences,
	extractExpressions,
	isWholeExpression,
	parseExpression,
} from "./expression.js";
import type { Job, PlannedShard, TestMatrix, TestMatrixEntry, Workflow } from "./types.js";

export const TEST_MATRIX_INPUT = "test-matrix";

const TestMatrixEntrySchema = z
	.object({
		config: z.string().min(1),
		shard: z.number().int().min(1),
		num_shards: z.number().int().min(1),
		runner: z.string().min(1).optional(),
	})
	.passthrough();

export type ResolvedTestMatrix =
	| { ok: true; sourceJobId: string; entries: TestMatrixEntry[]; problems: string[] }
	| { ok: false; reason: string; runtimeExpression?: string };

export function parseTestMatrix(value: unknown): TestMatrix {
	if (typeof value === "string") {
		return parseTestMatrixText(value);
	}
	return parseTestMatrixDocument(value);
}

export function checkShards(entries: TestMatrixEntry[]): string[] {
	const problems: string[] = [];
	const byConfig = new Map<string, TestMatrixEntry[]>();
	for (const entry of entries) {
		const group = byConfig.get(entry.config) ?? [];
		group.push(entry);
		byConfig.set(entry.config, group);
	}

	for (const [config, group] of byConfig.entries()) {
		const declared = Array.from(new Set(group.map((entry) => entry.numShards)));
		if (declared.length > 1) {
			problems.push(`config "${config}" declares conflicting num_shards: ${declared.join(", ")}`);
			continue;
		}
		const numShards = declared[0];
		const seen = new Set<number>();
		for (const entry of group) {
			if (entry.shard > numShards) {
				problems.push(`config "${config}" shard ${entry.shard} exceeds num_shards ${numShards}`);
				continue;
			}
			if (seen.has(entry.shard)) {
				problems.push(`config "${config}" repeats shard ${entry.shard}`);
				continue;
			}
			seen.add(entry.shard);
		}
		const missing: number[] = [];
		for (let shard = 1; shard <= numShards; shard += 1) {
			if (!seen.has(shard)) {
				missing.push(shard);
			}
		}
		if (missing.length > 0) {
			problems.push(`config "${config}" is missing shard(s) ${missing.join(", ")} of ${numShards}`);
		}
	}

	return problems;
}

export function resolveTestMatrix(workflow: Workflow, jobId: string): ResolvedTestMatrix {
	const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
	const visited = new Set<string>();

	let currentId = jobId;
	for (;;) {
		const job = jobMap.get(currentId);
		if (!job) {
			return { ok: false, reason: `job "${currentId}" does not exist` };
		}
		if (visited.has(currentId)) {
			return { ok: false, reason: `test matrix references loop back to "${currentId}"` };
		}
		visited.add(currentId);

		if (!(TEST_MATRIX_INPUT in job.with)) {
			return { ok: false, reason: `job "${currentId}" has no ${TEST_MATRIX_INPUT} input` };
		}
		const matrix = parseTestMatrix(job.with[TEST_MATRIX_INPUT]);
		switch (matrix.kind) {
			case "literal":
				return { ok: true, sourceJobId: currentId, entries: matrix.entries, problems: matrix.problems };
			case "invalid":
				return { ok: false, reason: `job "${currentId}": ${matrix.reason}` };
			case "expression":
				return {
					ok: false,
					reason: `job "${currentId}" receives its test matrix from ${matrix.expression} at run time`,
					runtimeExpression: matrix.expression,
				};
			case "reference":
				if (!job.needs.includes(matrix.jobId)) {
					return {
						ok: false,
						reason: `job "${currentId}" reads ${matrix.expression} without needing "${matrix.jobId}"`,
					};
				}
				if (matrix.output !== TEST_MATRIX_INPUT) {
					return {
						ok: false,
						reason: `job "${currentId}" reads output "${matrix.output}" of "${matrix.jobId}", which is not a ${TEST_MATRIX_INPUT}`,
					};
				}
				currentId = matrix.jobId;
				break;
		}
	}
}

export function expandShards(workflow: Workflow, jobId: string): PlannedShard[] {
	const resolved = resolveTestMatrix(workflow, jobId);
	if (!resolved.ok) {
		return [];
	}
	const source = workflow.jobs.find((job) => job.id === resolved.sourceJobId);
	const fallbackRunner = source ? defaultRunner(source) : undefined;
	return resolved.entries.map((entry) => ({
		jobId,
		sourceJobId: resolved.sourceJobId,
		config: entry.config,
		shard: entry.shard,
		numShards: entry.numShards,
		runner: entry.runner ?? fallbackRunner,
	}));
}

export function hasTestMatrix(job: Job): boolean {
	return TEST_MATRIX_INPUT in job.with;
}

function defaultRunner(job: Job): string | undefined {
	return asOptionalString(job.with.runner) ?? asOptionalString(job.with["runner-type"]);
}

function parseTestMatrixText(text: string): TestMatrix {
	const trimmed = text.trim();
	if (trimmed.length === 0) {
		return { kind: "invalid", reason: "test matrix is empty" };
	}

	let wholeExpression = false;
	try {
		wholeExpression = isWholeExpression(trimmed);
	} catch (error) {
		return { kind: "invalid", reason: error instanceof Error ? error.message : String(error) };
	}
	if (wholeExpression) {
		return parseTestMatrixReference(trimmed);
	}

	let parsed: unknown;
	try {
		parsed = YAML.parse(trimmed);
	} catch (error) {
		const message = error instanceof Error ? error.message.split("\n")[0] : String(error);
		return { kind: "invalid", reason: `test matrix is not valid YAML: ${message}` };
	}
	return parseTestMatrixDocument(parsed);
}

function parseTestMatrixReference(text: string): TestMatrix {
	const [span] = extractExpressions(text);
	let references: NeedsReference[];
	try {
		references = collectNeedsReferences(parseExpression(span.body));
	} catch (error) {
		return { kind: "invalid", reason: error instanceof Error ? error.message : String(error) };
	}
	const [reference] = references;
	if (references.length !== 1 || !reference.output) {
		// Forwarded inputs and other values known only when the run starts.
		return { kind: "expression", expression: span.body };
	}
	return {
		kind: "reference",
		jobId: reference.jobId,
		output: reference.output,
		expression: reference.text,
	};
}

function parseTestMatrixDocument(document: unknown): TestMatrix {
	if (!isRecord(document) || !Array.isArray(document.include)) {
		return { kind: "invalid", reason: "test matrix must be a mapping with an include list" };
	}

	const entries: TestMatrixEntry[] = [];
	const problems: string[] = [];
	document.include.forEach((raw, index) => {
		const result = TestMatrixEntrySchema.safeParse(raw);
		if (!result.success) {
			const issue = result.error.issues[0];
			const field = issue.path.length > 0 ? issue.path.join(".") : "entry";
			problems.push(`entry ${index + 1}: ${field}: ${issue.message}`);
			return;
		}
		const { config, shard, num_shards: numShards, runner, ...extra } = result.data;
		entries.push({ config, shard, numShards, runner, extra });
	});

	return { kind: "literal", entries, problems };
}
