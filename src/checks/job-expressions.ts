import {
	type ExpressionNode,
	type NeedsReference,
	collectNeedsReferences,
	conditionExpressions,
	extractExpressions,
	parseExpression,
} from "../core/expression.js";
import type { Job } from "../core/types.js";
import { isRecord } from "../utils/records.js";

export type JobExpression =
	| { field: string; source: string; ast: ExpressionNode }
	| { field: string; source: string; error: string };

export function collectJobExpressions(job: Job): JobExpression[] {
	const found: JobExpression[] = [];

	if (job.if) {
		collectCondition("if", job.if, found);
	}
	if (job.runsOn) {
		collectTemplate("runs-on", job.runsOn, found);
	}
	collectValue("strategy.matrix", job.strategy?.matrix, found);
	collectValue("with", job.with, found);
	collectValue("env", job.env, found);
	collectValue("outputs", job.outputs, found);
	job.steps.forEach((step, index) => {
		const prefix = `steps[${index}]`;
		if (step.if) {
			collectCondition(`${prefix}.if`, step.if, found);
		}
		collectValue(`${prefix}.run`, step.run, found);
		collectValue(`${prefix}.with`, step.with, found);
		collectValue(`${prefix}.env`, step.env, found);
	});

	return found;
}

export function collectJobNeedsReferences(job: Job): NeedsReference[] {
	const references: NeedsReference[] = [];
	for (const expression of collectJobExpressions(job)) {
		if ("ast" in expression) {
			references.push(...collectNeedsReferences(expression.ast));
		}
	}
	return references;
}

export function collectTemplateExpressions(field: string, text: string): JobExpression[] {
	const found: JobExpression[] = [];
	collectTemplate(field, text, found);
	return found;
}

function collectValue(field: string, value: unknown, found: JobExpression[]): void {
	if (typeof value === "string") {
		collectTemplate(field, value, found);
		return;
	}
	if (Array.isArray(value)) {
		value.forEach((item, index) => collectValue(`${field}[${index}]`, item, found));
		return;
	}
	if (isRecord(value)) {
		for (const [key, item] of Object.entries(value)) {
			collectValue(`${field}.${key}`, item, found);
		}
	}
}

function collectTemplate(field: string, text: string, found: JobExpression[]): void {
	let bodies: string[];
	try {
		bodies = extractExpressions(text).map((span) => span.body);
	} catch (error) {
		found.push({ field, source: text, error: errorMessage(error) });
		return;
	}
	bodies.forEach((body) => pushParsed(field, body, found));
}

function collectCondition(field: string, condition: string, found: JobExpression[]): void {
	let bodies: string[];
	try {
		bodies = conditionExpressions(condition);
	} catch (error) {
		found.push({ field, source: condition, error: errorMessage(error) });
		return;
	}
	bodies.forEach((body) => pushParsed(field, body, found));
}

function pushParsed(field: string, body: string, found: JobExpression[]): void {
	try {
		found.push({ field, source: body, ast: parseExpression(body) });
	} catch (error) {
		found.push({ field, source: body, error: errorMessage(error) });
	}
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
