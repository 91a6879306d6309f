import type { ConcurrencyOptions } from "../core/concurrency.js";
import type { ReusableResolver } from "../core/reusable.js";
import type { Severity, SourcePosition, Workflow } from "../core/types.js";

export type RuleSeverity = Severity | "off";

export type CheckContext = {
	workflow: Workflow;
	repoRoot: string;
	resolver: ReusableResolver;
	concurrency: ConcurrencyOptions;
};

export type RuleFinding = {
	message: string;
	jobId?: string;
	position?: SourcePosition;
};

export interface CheckRule {
	readonly id: string;
	readonly description: string;
	readonly defaultSeverity: Severity;
	check(context: CheckContext): RuleFinding[];
}
