import { isWholeExpression } from "../../core/expression.js";
import { parseReusableRef } from "../../core/reusable.js";
import type { CallInput } from "../../core/types.js";
import type { CheckRule, RuleFinding } from "../rule.js";

export const reusableWorkflowRefRule: CheckRule = {
	id: "reusable-workflow-ref",
	description: "Reusable workflow references resolve to a template",
	defaultSeverity: "error",
	check({ workflow, resolver }) {
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs) {
			if (!job.uses) {
				continue;
			}
			const ref = parseReusableRef(job.uses);
			if (ref.kind === "invalid") {
				findings.push({ message: ref.reason, jobId: job.id });
				continue;
			}
			if (ref.kind === "remote") {
				continue;
			}
			const callee = resolver.resolve(ref.path);
			if (callee.status !== "found") {
				findings.push({ message: `job "${job.id}" uses ${job.uses}: ${callee.reason}`, jobId: job.id });
			}
		}
		return findings;
	},
};

export const reusableWorkflowInputsRule: CheckRule = {
	id: "reusable-workflow-inputs",
	description: "Inputs passed with `with` match the callee's workflow_call inputs",
	defaultSeverity: "error",
	check({ workflow, resolver }) {
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs) {
			if (!job.uses) {
				continue;
			}
			const ref = parseReusableRef(job.uses);
			if (ref.kind !== "local") {
				continue;
			}
			const callee = resolver.resolve(ref.path);
			if (callee.status !== "found") {
				continue;
			}
			if (!callee.callInterface) {
				findings.push({
					message: `${ref.path} does not declare an on.workflow_call trigger`,
					jobId: job.id,
				});
				continue;
			}

			const { inputs } = callee.callInterface;
			for (const [name, value] of Object.entries(job.with)) {
				const input = inputs[name];
				if (!input) {
					findings.push({ message: `${ref.path} has no input "${name}"`, jobId: job.id });
					continue;
				}
				const mismatch = checkInputType(input, value);
				if (mismatch) {
					findings.push({ message: mismatch, jobId: job.id });
				}
			}
			for (const input of Object.values(inputs)) {
				if (input.required && !input.hasDefault && !(input.name in job.with)) {
					findings.push({
						message: `required input "${input.name}" of ${ref.path} is not provided`,
						jobId: job.id,
					});
				}
			}
		}
		return findings;
	},
};

function checkInputType(input: CallInput, value: unknown): string | undefined {
	if (typeof value === "string" && isExpression(value)) {
		return undefined;
	}
	switch (input.type) {
		case "boolean":
			return typeof value === "boolean"
				? undefined
				: `input "${input.name}" expects a boolean, got ${describe(value)}`;
		case "number":
			return typeof value === "number"
				? undefined
				: `input "${input.name}" expects a number, got ${describe(value)}`;
		case "string":
			return typeof value === "object" && value !== null
				? `input "${input.name}" expects a string, got ${describe(value)}`
				: undefined;
		default:
			return undefined;
	}
}

function isExpression(value: string): boolean {
	try {
		return isWholeExpression(value);
	} catch {
		// expression-syntax reports it.
		return true;
	}
}

function describe(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (Array.isArray(value)) {
		return "a list";
	}
	if (typeof value === "object") {
		return "a mapping";
	}
	return `${typeof value} ${JSON.stringify(value)}`;
}
