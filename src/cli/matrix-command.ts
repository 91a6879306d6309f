import { expandShards, hasTestMatrix, resolveTestMatrix } from "../core/test-matrix.js";
import type { Workflow } from "../core/types.js";
import { formatShardLine } from "../tui/format.js";
import { toRepoRelative } from "../utils/path-safety.js";
import type { CommandContext } from "./context.js";
import { type MatrixJobSummary, buildMatrixJson, toJsonText, workflowRef } from "./output.js";
import { pickWorkflow } from "./select.js";

export async function runMatrixCommand(ctx: CommandContext): Promise<number> {
	const choice = await pickWorkflow(ctx);
	if (!choice.ok) {
		return choice.exitCode;
	}
	const { workflow } = choice;
	const { io, args, repoRoot } = ctx;

	const unknown = (args.jobs ?? []).filter((jobId) => !workflow.jobs.some((job) => job.id === jobId));
	if (unknown.length > 0) {
		io.stderr(`Unknown job(s): ${unknown.join(", ")}\n`);
		return 2;
	}

	const jobs = collectMatrixJobs(workflow, args.jobs);
	if (args.json) {
		const relativePath = toRepoRelative(repoRoot, workflow.path);
		io.stdout(toJsonText(buildMatrixJson(workflowRef(workflow, relativePath), jobs)));
	} else if (jobs.length === 0) {
		io.stdout("No jobs with a test-matrix input.\n");
	} else {
		for (const job of jobs) {
			if (job.error) {
				io.stdout(`${job.jobId}: unresolved (${job.error})\n`);
				continue;
			}
			if (job.runtimeExpression !== undefined) {
				io.stdout(`${job.jobId}: supplied at run time (${job.runtimeExpression})\n`);
				continue;
			}
			for (const shard of job.shards) {
				io.stdout(`${formatShardLine(shard)}\n`);
			}
		}
	}

	return jobs.some((job) => job.error) ? 1 : 0;
}

export function collectMatrixJobs(workflow: Workflow, jobIds?: string[]): MatrixJobSummary[] {
	const selected = jobIds && jobIds.length > 0 ? new Set(jobIds) : undefined;
	return workflow.jobs
		.filter((job) => hasTestMatrix(job) && (!selected || selected.has(job.id)))
		.map((job) => {
			const resolved = resolveTestMatrix(workflow, job.id);
			if (!resolved.ok) {
				return resolved.runtimeExpression === undefined
					? { jobId: job.id, shards: [], error: resolved.reason }
					: { jobId: job.id, shards: [], runtimeExpression: resolved.runtimeExpression };
			}
			return { jobId: job.id, sourceJobId: resolved.sourceJobId, shards: expandShards(workflow, job.id) };
		});
}
