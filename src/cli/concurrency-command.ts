import { evaluateConcurrencyGroups } from "../core/concurrency.js";
import { toRepoRelative } from "../utils/path-safety.js";
import { type CommandContext, concurrencyOptions } from "./context.js";
import { buildConcurrencyJson, toJsonText, workflowRef } from "./output.js";
import { pickWorkflow } from "./select.js";

export async function runConcurrencyCommand(ctx: CommandContext): Promise<number> {
	const choice = await pickWorkflow(ctx);
	if (!choice.ok) {
		return choice.exitCode;
	}
	const { workflow } = choice;
	const { io, args, config, repoRoot } = ctx;

	if (!workflow.concurrency) {
		io.stderr(`${workflow.name} declares no concurrency group.\n`);
		return 1;
	}
	if (args.event && !workflow.events.includes(args.event)) {
		io.stderr(
			`Event "${args.event}" is not enabled for this workflow. Use --event with one of: ${workflow.events.join(", ")}.\n`,
		);
		return 2;
	}

	const events = args.event ? [args.event] : undefined;
	const groups = evaluateConcurrencyGroups(workflow, concurrencyOptions(config, events));
	const cancelInProgress = workflow.concurrency.cancelInProgress;

	if (args.json) {
		const relativePath = toRepoRelative(repoRoot, workflow.path);
		io.stdout(toJsonText(buildConcurrencyJson(workflowRef(workflow, relativePath), cancelInProgress, groups)));
	} else {
		io.stdout(`cancel-in-progress: ${String(cancelInProgress)}\n`);
		for (const group of groups) {
			const label = `${group.event} ${group.refType} ${group.refName}`;
			io.stdout(group.error ? `${label}: error: ${group.error}\n` : `${label}: ${group.group}\n`);
		}
	}

	return groups.some((group) => group.error) ? 1 : 0;
}
