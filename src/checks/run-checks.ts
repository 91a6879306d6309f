import type { ConcurrencyOptions } from "../core/concurrency.js";
import type { DiscoveryFailure } from "../core/discovery.js";
import { WorkflowParseError } from "../core/parser.js";
import { ReusableResolver } from "../core/reusable.js";
import type { Diagnostic, Workflow } from "../core/types.js";
import { toRepoRelative } from "../utils/path-safety.js";
import { PARSE_ERROR_RULE_ID, listRules } from "./registry.js";
import type { RuleSeverity } from "./rule.js";

export type CheckOptions = {
	repoRoot: string;
	rules: Record<string, RuleSeverity>;
	concurrency: ConcurrencyOptions;
	onRule?: (ruleId: string, workflow: Workflow) => void;
};

export type CheckSummary = {
	errors: number;
	warnings: number;
	workflows: number;
};

export function runChecks(workflows: Workflow[], options: CheckOptions): Diagnostic[] {
	const resolver = new ReusableResolver(options.repoRoot);
	const diagnostics: Diagnostic[] = [];

	for (const workflow of workflows) {
		const workflowPath = toRepoRelative(options.repoRoot, workflow.path);
		const jobPositions = new Map(workflow.jobs.map((job) => [job.id, job.position]));
		const context = {
			workflow,
			repoRoot: options.repoRoot,
			resolver,
			concurrency: options.concurrency,
		};

		for (const rule of listRules()) {
			const severity = options.rules[rule.id] ?? rule.defaultSeverity;
			if (severity === "off") {
				continue;
			}
			options.onRule?.(rule.id, workflow);
			for (const finding of rule.check(context)) {
				const position = finding.position ?? (finding.jobId ? jobPositions.get(finding.jobId) : undefined);
				diagnostics.push({
					ruleId: rule.id,
					severity,
					message: finding.message,
					workflowPath,
					jobId: finding.jobId,
					line: position?.line,
					column: position?.column,
				});
			}
		}
	}

	return sortDiagnostics(diagnostics);
}

export function parseFailureDiagnostics(failures: DiscoveryFailure[], repoRoot: string): Diagnostic[] {
	return failures.map(({ path, error }): Diagnostic => {
		const workflowPath = toRepoRelative(repoRoot, path);
		if (error instanceof WorkflowParseError) {
			return {
				ruleId: PARSE_ERROR_RULE_ID,
				severity: "error",
				message: error.detail,
				workflowPath,
				line: error.position.line,
				column: error.position.column,
			};
		}
		return {
			ruleId: PARSE_ERROR_RULE_ID,
			severity: "error",
			message: error.message,
			workflowPath,
		};
	});
}

export function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
	return [...diagnostics].sort(
		(a, b) =>
			a.workflowPath.localeCompare(b.workflowPath) ||
			(a.line ?? 0) - (b.line ?? 0) ||
			a.ruleId.localeCompare(b.ruleId),
	);
}

export function summarize(diagnostics: Diagnostic[], workflows: number): CheckSummary {
	return {
		errors: diagnostics.filter((diagnostic) => diagnostic.severity === "error").length,
		warnings: diagnostics.filter((diagnostic) => diagnostic.severity === "warning").length,
		workflows,
	};
}
