import { computeStages, findCycles, sortJobsByNeeds } from "../core/graph.js";
import { buildDiagramLines, buildStageHeader } from "../tui/diagram.js";
import { toRepoRelative } from "../utils/path-safety.js";
import type { CommandContext } from "./context.js";
import { buildGraphJson, toJsonText, workflowRef } from "./output.js";
import { pickWorkflow } from "./select.js";

export async function runGraphCommand(ctx: CommandContext): Promise<number> {
	const choice = await pickWorkflow(ctx);
	if (!choice.ok) {
		return choice.exitCode;
	}
	const { workflow } = choice;
	const { io, repoRoot } = ctx;

	const cycles = findCycles(workflow);
	if (cycles.length > 0) {
		for (const cycle of cycles) {
			io.stderr(`needs cycle: ${[...cycle, cycle[0]].join(" → ")}\n`);
		}
		return 1;
	}

	const stages = computeStages(workflow);
	const order = sortJobsByNeeds(
		workflow,
		workflow.jobs.map((job) => job.id),
	);
	const relativePath = toRepoRelative(repoRoot, workflow.path);

	if (ctx.args.json) {
		io.stdout(toJsonText(buildGraphJson(workflowRef(workflow, relativePath), stages, order)));
		return 0;
	}

	io.stdout(`${workflow.name} (${relativePath})\n`);
	io.stdout(`${buildStageHeader(stages)}\n\n`);
	for (const line of buildDiagramLines(stages)) {
		io.stdout(`${line}\n`);
	}
	return 0;
}
