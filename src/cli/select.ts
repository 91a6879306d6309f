import path from "node:path";
import { cancel, isCancel, select } from "@clack/prompts";
import type { Workflow } from "../core/types.js";
import type { CommandContext } from "./context.js";

export type WorkflowChoice = { ok: true; workflow: Workflow } | { ok: false; exitCode: number };

/** Accepts a full path, a path suffix, a file name with or without extension, or the workflow name. */
export function matchesWorkflowSelector(filePath: string, selector: string): boolean {
	const normalizedPath = filePath.replace(/\\/g, "/");
	const normalized = selector.replace(/\\/g, "/");
	const base = path.posix.basename(normalizedPath);
	return (
		normalizedPath === normalized ||
		normalizedPath.endsWith(`/${normalized}`) ||
		base.replace(/\.ya?ml$/, "") === normalized
	);
}

export function resolveWorkflow(workflows: Workflow[], selector?: string): Workflow | undefined {
	if (!selector) {
		return workflows.length === 1 ? workflows[0] : undefined;
	}
	return (
		workflows.find((wf) => matchesWorkflowSelector(wf.path, selector)) ??
		workflows.find((wf) => wf.name === selector)
	);
}

export function filterWorkflows(workflows: Workflow[], selector?: string): Workflow[] | undefined {
	if (!selector) {
		return workflows;
	}
	const match = resolveWorkflow(workflows, selector);
	return match ? [match] : undefined;
}

export async function selectWorkflow(workflows: Workflow[]): Promise<Workflow | null> {
	const selection = await select({
		message: "Select a workflow",
		options: workflows.map((wf) => ({
			value: wf.id,
			label: wf.name,
			hint: path.basename(wf.path),
		})),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return workflows.find((wf) => wf.id === selection) ?? null;
}

export async function pickWorkflow(ctx: CommandContext): Promise<WorkflowChoice> {
	const { args, config, io, discovery } = ctx;
	const selector = args.workflow;
	const failure = selector
		? discovery.failures.find((item) => matchesWorkflowSelector(item.path, selector))
		: undefined;
	if (failure) {
		io.stderr(`Workflow parse error: ${failure.error.message}\n`);
		return { ok: false, exitCode: 1 };
	}
	if (discovery.workflows.length === 0) {
		io.stderr(`No workflows found in ${config.workflowsDir}.\n`);
		return { ok: false, exitCode: 1 };
	}

	const workflow = resolveWorkflow(discovery.workflows, selector);
	if (workflow) {
		return { ok: true, workflow };
	}
	if (selector) {
		io.stderr(`Workflow not found: ${selector}\n`);
		return { ok: false, exitCode: 2 };
	}
	if (!io.isTty || args.json) {
		io.stderr("Several workflows found. Use --workflow.\n");
		return { ok: false, exitCode: 2 };
	}

	const selected = await selectWorkflow(discovery.workflows);
	return selected ? { ok: true, workflow: selected } : { ok: false, exitCode: 130 };
}
