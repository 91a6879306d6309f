import { type ExpressionContext, ExpressionError, interpolate } from "./expression.js";
import { type RefType, findTrigger, sampleRefs } from "./triggers.js";
import type { Workflow } from "./types.js";

export const DEFAULT_CONCURRENCY_EVENTS = ["push", "schedule", "workflow_dispatch"];

const PULL_REQUEST_EVENTS = ["pull_request", "pull_request_target"];

export type ConcurrencyOptions = {
	defaultBranch: string;
	events: string[];
	sha: string;
};

export type EventContext = {
	event: string;
	refType: RefType;
	refName: string;
	context: ExpressionContext;
};

export type EvaluatedGroup = {
	event: string;
	refType: RefType;
	refName: string;
	group: string;
	error?: string;
};

export function resolveConcurrencyEvents(workflow: Workflow, configured: string[]): string[] {
	const declared = new Set(workflow.events);
	const events = configured.filter((event) => declared.has(event));
	for (const event of PULL_REQUEST_EVENTS) {
		if (declared.has(event) && !events.includes(event)) {
			events.push(event);
		}
	}
	return events.length > 0 ? events : [...configured];
}

export function buildEventContexts(workflow: Workflow, options: ConcurrencyOptions): EventContext[] {
	const contexts: EventContext[] = [];
	for (const event of resolveConcurrencyEvents(workflow, options.events)) {
		if (event === "push") {
			const trigger = findTrigger(workflow.triggers, "push");
			const refs = trigger
				? sampleRefs(trigger, options.defaultBranch)
				: [{ refType: "branch" as const, refName: options.defaultBranch }];
			for (const ref of refs) {
				contexts.push(createContext(workflow, event, ref.refType, ref.refName, options));
			}
			continue;
		}
		if (PULL_REQUEST_EVENTS.includes(event)) {
			contexts.push(createContext(workflow, event, "branch", "1/merge", options));
			continue;
		}
		contexts.push(createContext(workflow, event, "branch", options.defaultBranch, options));
	}
	return contexts;
}

export function evaluateConcurrencyGroups(workflow: Workflow, options: ConcurrencyOptions): EvaluatedGroup[] {
	const policy = workflow.concurrency;
	if (!policy) {
		return [];
	}

	return buildEventContexts(workflow, options).map(({ event, refType, refName, context }) => {
		try {
			return { event, refType, refName, group: interpolate(policy.group, context) };
		} catch (error) {
			if (!(error instanceof ExpressionError)) {
				throw error;
			}
			return { event, refType, refName, group: "", error: error.message };
		}
	});
}

function createContext(
	workflow: Workflow,
	event: string,
	refType: RefType,
	refName: string,
	options: ConcurrencyOptions,
): EventContext {
	const isPullRequest = PULL_REQUEST_EVENTS.includes(event);
	const ref = isPullRequest
		? `refs/pull/${refName}`
		: refType === "tag"
			? `refs/tags/${refName}`
			: `refs/heads/${refName}`;

	return {
		event,
		refType,
		refName,
		context: {
			github: {
				workflow: workflow.name,
				event_name: event,
				ref,
				ref_name: refName,
				ref_type: refType,
				sha: options.sha,
				head_ref: isPullRequest ? "feature" : "",
				base_ref: isPullRequest ? options.defaultBranch : "",
				run_id: "1",
				run_attempt: "1",
				event: isPullRequest ? { pull_request: { number: 1 } } : {},
			},
			inputs: {},
			vars: {},
		},
	};
}
