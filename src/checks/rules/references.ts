import { parseReusableRef } from "../../core/reusable.js";
import type { Job } from "../../core/types.js";
import { collectJobExpressions, collectJobNeedsReferences, collectTemplateExpressions } from "../job-expressions.js";
import type { CheckContext, CheckRule, RuleFinding } from "../rule.js";

const JOB_PROPERTIES = new Set(["outputs", "result"]);

export const needsReferenceRule: CheckRule = {
	id: "needs-reference",
	description: "needs.<job> expressions only name jobs listed in the job's own needs",
	defaultSeverity: "error",
	check({ workflow }) {
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs) {
			const reported = new Set<string>();
			for (const reference of collectJobNeedsReferences(job)) {
				if (job.needs.includes(reference.jobId) || reported.has(reference.jobId)) {
					continue;
				}
				reported.add(reference.jobId);
				findings.push({
					message: `job "${job.id}" reads ${reference.text} but does not list "${reference.jobId}" in needs`,
					jobId: job.id,
				});
			}
		}
		return findings;
	},
};

export const needsOutputRule: CheckRule = {
	id: "needs-output",
	description: "needs.<job>.outputs.<name> names an output the job declares",
	defaultSeverity: "error",
	check(context) {
		const { workflow } = context;
		const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
		const findings: RuleFinding[] = [];

		for (const job of workflow.jobs) {
			const reported = new Set<string>();
			for (const reference of collectJobNeedsReferences(job)) {
				const target = jobMap.get(reference.jobId);
				if (!target || !job.needs.includes(reference.jobId) || reported.has(reference.text)) {
					continue;
				}
				if (reference.property !== undefined && !JOB_PROPERTIES.has(reference.property)) {
					reported.add(reference.text);
					findings.push({
						message: `${reference.text}: "${reference.property}" is not a job property (expected outputs or result)`,
						jobId: job.id,
					});
					continue;
				}
				if (reference.output === undefined) {
					continue;
				}
				const declared = declaredOutputs(target, context);
				if (declared && !declared.includes(reference.output)) {
					reported.add(reference.text);
					findings.push({
						message: `${reference.text}: job "${target.id}" declares no output "${reference.output}"${formatDeclared(declared)}`,
						jobId: job.id,
					});
				}
			}
		}
		return findings;
	},
};

export const expressionSyntaxRule: CheckRule = {
	id: "expression-syntax",
	description: "Every ${{ }} expression parses",
	defaultSeverity: "error",
	check({ workflow }) {
		const findings: RuleFinding[] = [];
		if (workflow.concurrency) {
			const fields = [
				...collectTemplateExpressions("concurrency.group", workflow.concurrency.group),
				...(typeof workflow.concurrency.cancelInProgress === "string"
					? collectTemplateExpressions("concurrency.cancel-in-progress", workflow.concurrency.cancelInProgress)
					: []),
			];
			for (const expression of fields) {
				if ("error" in expression) {
					findings.push({
						message: `invalid expression in ${expression.field}: ${expression.error}`,
						position: workflow.concurrency.position,
					});
				}
			}
		}
		for (const job of workflow.jobs) {
			for (const expression of collectJobExpressions(job)) {
				if ("error" in expression) {
					findings.push({
						message: `invalid expression in ${expression.field}: ${expression.error}`,
						jobId: job.id,
					});
				}
			}
		}
		return findings;
	},
};

function declaredOutputs(job: Job, context: CheckContext): string[] | undefined {
	if (job.uses) {
		const ref = parseReusableRef(job.uses);
		if (ref.kind !== "local") {
			return undefined;
		}
		const callee = context.resolver.resolve(ref.path);
		if (callee.status !== "found" || !callee.callInterface) {
			return undefined;
		}
		return callee.callInterface.outputs;
	}
	return Object.keys(job.outputs);
}

function formatDeclared(declared: string[]): string {
	return declared.length > 0 ? ` (declared: ${declared.join(", ")})` : "";
}
