import { findCycles } from "../../core/graph.js";
import type { CheckRule, RuleFinding } from "../rule.js";

export const duplicateJobIdRule: CheckRule = {
	id: "duplicate-job-id",
	description: "Job ids must be unique within a workflow",
	defaultSeverity: "error",
	check({ workflow }) {
		return workflow.duplicateJobIds.map((duplicate) => ({
			message: `job id "${duplicate.id}" is defined more than once`,
			jobId: duplicate.id,
			position: duplicate.position,
		}));
	},
};

export const duplicateCheckNameRule: CheckRule = {
	id: "duplicate-check-name",
	description: "Jobs sharing a display name and a reusable workflow produce identical check names",
	defaultSeverity: "warning",
	check({ workflow }) {
		const firstByKey = new Map<string, string>();
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs) {
			const key = `${job.name}\u0000${job.uses ?? ""}`;
			const first = firstByKey.get(key);
			if (first === undefined) {
				firstByKey.set(key, job.id);
				continue;
			}
			findings.push({
				message: job.uses
					? `job "${job.id}" reuses the name "${job.name}" of "${first}" with the same workflow ${job.uses}`
					: `job "${job.id}" reuses the name "${job.name}" of "${first}"`,
				jobId: job.id,
			});
		}
		return findings;
	},
};

export const unknownNeedsRule: CheckRule = {
	id: "unknown-needs",
	description: "Every needs entry names a job in the same workflow",
	defaultSeverity: "error",
	check({ workflow }) {
		const known = new Set(workflow.jobs.map((job) => job.id));
		const findings: RuleFinding[] = [];
		for (const job of workflow.jobs) {
			for (const need of job.needs) {
				if (!known.has(need)) {
					findings.push({ message: `job "${job.id}" needs unknown job "${need}"`, jobId: job.id });
				}
			}
		}
		return findings;
	},
};

export const needsCycleRule: CheckRule = {
	id: "needs-cycle",
	description: "The needs graph has no cycles",
	defaultSeverity: "error",
	check({ workflow }) {
		return findCycles(workflow).map((cycle) => ({
			message: `needs cycle: ${[...cycle, cycle[0]].join(" → ")}`,
			jobId: cycle[0],
		}));
	},
};
