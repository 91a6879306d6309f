import fs from "node:fs";
import path from "node:path";
import YAML, { type Document, LineCounter, isMap, isNode, isScalar } from "yaml";
import { asOptionalString, asRecord, asStringList, asStringRecord, isRecord } from "../utils/records.js";
import { normalizeTriggers } from "./triggers.js";
import type {
	CallInput,
	CallInterface,
	ConcurrencyPolicy,
	DuplicateKey,
	Job,
	MatrixStrategy,
	SourcePosition,
	Step,
	Workflow,
} from "./types.js";

export class WorkflowParseError extends Error {
	constructor(
		readonly workflowPath: string,
		readonly position: SourcePosition,
		readonly detail: string,
	) {
		super(`${workflowPath}:${position.line}:${position.column} ${detail}`);
		this.name = "WorkflowParseError";
	}
}

type ParsedDocument = {
	doc: Document.Parsed;
	lineCounter: LineCounter;
};

export function parseWorkflow(workflowPath: string): Workflow {
	const raw = fs.readFileSync(workflowPath, "utf-8");
	return parseWorkflowSource(raw, workflowPath);
}

export function parseWorkflowSource(raw: string, workflowPath: string): Workflow {
	const { doc, lineCounter } = parseYaml(raw, workflowPath);
	const parsed: unknown = doc.toJSON();
	if (!isRecord(parsed)) {
		throw new WorkflowParseError(workflowPath, { line: 1, column: 1 }, "Workflow must be a mapping");
	}

	const jobPositions = collectJobKeyPositions(doc, lineCounter);
	const jobs = Object.entries(asRecord(parsed.jobs)).map(([jobId, job]) =>
		parseJob(jobId, asRecord(job), jobPositions.first.get(jobId)),
	);

	return {
		id: workflowPath,
		name: asOptionalString(parsed.name) ?? path.basename(workflowPath),
		path: workflowPath,
		events: parseWorkflowEvents(parsed.on),
		triggers: normalizeTriggers(parsed.on),
		concurrency: parseConcurrency(parsed.concurrency, nodePosition(doc, "concurrency", lineCounter)),
		callInterface: parseCallInterface(parsed.on),
		jobs,
		duplicateJobIds: jobPositions.duplicates,
	};
}

export function parseCallInterface(trigger: unknown): CallInterface | undefined {
	if (!isRecord(trigger) || !("workflow_call" in trigger)) {
		return undefined;
	}
	const call = asRecord(trigger.workflow_call);
	const inputs: Record<string, CallInput> = {};
	for (const [name, definition] of Object.entries(asRecord(call.inputs))) {
		const input = asRecord(definition);
		inputs[name] = {
			name,
			type: asOptionalString(input.type) ?? "string",
			required: input.required === true,
			hasDefault: input.default !== undefined,
		};
	}
	return {
		inputs,
		outputs: Object.keys(asRecord(call.outputs)),
	};
}

function parseYaml(raw: string, workflowPath: string): ParsedDocument {
	const lineCounter = new LineCounter();
	const doc = YAML.parseDocument(raw, { lineCounter, uniqueKeys: false });
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new WorkflowParseError(workflowPath, { line, column: col }, error.message);
	}
	return { doc, lineCounter };
}

function collectJobKeyPositions(
	doc: Document.Parsed,
	lineCounter: LineCounter,
): { first: Map<string, SourcePosition>; duplicates: DuplicateKey[] } {
	const first = new Map<string, SourcePosition>();
	const duplicates: DuplicateKey[] = [];
	const jobsNode = doc.get("jobs", true);
	if (!isMap(jobsNode)) {
		return { first, duplicates };
	}

	for (const pair of jobsNode.items) {
		if (!isScalar(pair.key)) {
			continue;
		}
		const id = String(pair.key.value);
		const offset = pair.key.range?.[0] ?? 0;
		const { line, col } = lineCounter.linePos(offset);
		const position = { line, column: col };
		if (first.has(id)) {
			duplicates.push({ id, position });
			continue;
		}
		first.set(id, position);
	}
	return { first, duplicates };
}

function nodePosition(
	doc: Document.Parsed,
	key: string,
	lineCounter: LineCounter,
): SourcePosition | undefined {
	const node = doc.get(key, true);
	if (!isNode(node) || !node.range) {
		return undefined;
	}
	const { line, col } = lineCounter.linePos(node.range[0]);
	return { line, column: col };
}

function parseJob(jobId: string, job: Record<string, unknown>, position?: SourcePosition): Job {
	const rawSteps = Array.isArray(job.steps) ? job.steps : [];
	const steps = rawSteps.map((step, index) => parseStep(jobId, asRecord(step), index));
	const strategy = asRecord(job.strategy);

	return {
		id: jobId,
		name: asOptionalString(job.name) ?? jobId,
		needs: asStringList(job.needs),
		uses: asOptionalString(job.uses),
		with: asRecord(job.with),
		outputs: asStringRecord(job.outputs) ?? {},
		runsOn: normalizeRunsOn(job["runs-on"]),
		steps,
		if: asOptionalString(job.if),
		strategy: parseStrategy(strategy.matrix),
		env: asStringRecord(job.env),
		position,
	};
}

function parseStrategy(matrix: unknown): MatrixStrategy | undefined {
	if (isRecord(matrix) || typeof matrix === "string") {
		return { matrix };
	}
	return undefined;
}

function parseStep(jobId: string, step: Record<string, unknown>, index: number): Step {
	const uses = asOptionalString(step.uses);
	const run = asOptionalString(step.run);
	const fallbackName = uses ?? run ?? `Step ${index + 1}`;
	return {
		id: `${jobId}-step-${index + 1}`,
		name: asOptionalString(step.name) ?? fallbackName,
		uses,
		run,
		if: asOptionalString(step.if),
		env: asStringRecord(step.env),
		with: isRecord(step.with) ? step.with : undefined,
	};
}

function normalizeRunsOn(runsOn: unknown): string | undefined {
	if (isRecord(runsOn)) {
		const parts = [...asStringList(runsOn.group), ...asStringList(runsOn.labels)];
		return parts.length > 0 ? parts.join(", ") : undefined;
	}
	const labels = asStringList(runsOn);
	return labels.length > 0 ? labels.join(", ") : undefined;
}

function parseConcurrency(value: unknown, position?: SourcePosition): ConcurrencyPolicy | undefined {
	if (typeof value === "string") {
		return { group: value, cancelInProgress: false, position };
	}
	if (!isRecord(value)) {
		return undefined;
	}
	const group = asOptionalString(value.group);
	if (group === undefined) {
		return undefined;
	}
	const cancel = value["cancel-in-progress"];
	return {
		group,
		cancelInProgress: typeof cancel === "string" ? cancel : cancel === true,
		position,
	};
}

function parseWorkflowEvents(trigger: unknown): string[] {
	if (!trigger) {
		return [];
	}
	if (typeof trigger === "string") {
		return [trigger];
	}
	if (Array.isArray(trigger)) {
		return trigger.map((value) => String(value));
	}
	return Object.keys(asRecord(trigger));
}
