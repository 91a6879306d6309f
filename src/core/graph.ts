import type { Workflow } from "./types.js";

export type Stage = {
	index: number;
	jobIds: string[];
};

export function expandJobIdsWithNeeds(workflow: Workflow, selected: string[]): string[] {
	const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
	const expanded = new Set<string>();

	const visit = (jobId: string): void => {
		if (expanded.has(jobId)) {
			return;
		}
		const job = jobMap.get(jobId);
		if (!job) {
			return;
		}
		expanded.add(jobId);
		job.needs.forEach(visit);
	};

	selected.forEach(visit);
	return sortJobsByNeeds(workflow, Array.from(expanded));
}

export function sortJobsByNeeds(workflow: Workflow, jobIds: string[]): string[] {
	const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
	const inDegree = new Map<string, number>();
	const edges = new Map<string, Set<string>>();

	jobIds.forEach((jobId) => {
		inDegree.set(jobId, 0);
		edges.set(jobId, new Set());
	});

	jobIds.forEach((jobId) => {
		const job = jobMap.get(jobId);
		if (!job) {
			return;
		}
		new Set(job.needs).forEach((need) => {
			if (!inDegree.has(need)) {
				return;
			}
			inDegree.set(jobId, (inDegree.get(jobId) ?? 0) + 1);
			edges.get(need)?.add(jobId);
		});
	});

	const queue: string[] = [];
	for (const [jobId, degree] of inDegree.entries()) {
		if (degree === 0) {
			queue.push(jobId);
		}
	}

	const ordered: string[] = [];
	while (queue.length > 0) {
		const jobId = queue.shift();
		if (!jobId) {
			continue;
		}
		ordered.push(jobId);
		for (const next of edges.get(jobId) ?? []) {
			const degree = (inDegree.get(next) ?? 0) - 1;
			inDegree.set(next, degree);
			if (degree === 0) {
				queue.push(next);
			}
		}
	}

	const missing = jobIds.filter((jobId) => !ordered.includes(jobId));
	return ordered.concat(missing);
}

export function findCycles(workflow: Workflow): string[][] {
	const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
	const done = new Set<string>();
	const stack: string[] = [];
	const onStack = new Set<string>();
	const cycles: string[][] = [];
	const seenKeys = new Set<string>();

	const visit = (jobId: string): void => {
		if (onStack.has(jobId)) {
			const cycle = stack.slice(stack.indexOf(jobId));
			const key = [...cycle].sort().join("\u0000");
			if (!seenKeys.has(key)) {
				seenKeys.add(key);
				cycles.push(cycle);
			}
			return;
		}
		if (done.has(jobId)) {
			return;
		}
		const job = jobMap.get(jobId);
		if (!job) {
			return;
		}
		stack.push(jobId);
		onStack.add(jobId);
		job.needs.forEach(visit);
		stack.pop();
		onStack.delete(jobId);
		done.add(jobId);
	};

	workflow.jobs.forEach((job) => visit(job.id));
	return cycles;
}

export function computeStages(workflow: Workflow, jobIds?: string[]): Stage[] {
	const selected = new Set(jobIds ?? workflow.jobs.map((job) => job.id));
	const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
	const depths = new Map<string, number>();
	const visiting = new Set<string>();

	const resolveDepth = (jobId: string): number => {
		const known = depths.get(jobId);
		if (known !== undefined) {
			return known;
		}
		if (visiting.has(jobId)) {
			return 0;
		}
		visiting.add(jobId);
		const needs = (jobMap.get(jobId)?.needs ?? []).filter((need) => selected.has(need) && jobMap.has(need));
		const depth = needs.length === 0 ? 0 : Math.max(...needs.map(resolveDepth)) + 1;
		depths.set(jobId, depth);
		visiting.delete(jobId);
		return depth;
	};

	const ordered = workflow.jobs.map((job) => job.id).filter((jobId) => selected.has(jobId));
	ordered.forEach(resolveDepth);
	const maxDepth = Math.max(...depths.values(), -1);
	const stages: Stage[] = Array.from({ length: maxDepth + 1 }, (_, index) => ({ index, jobIds: [] }));
	for (const jobId of ordered) {
		stages[depths.get(jobId) ?? 0].jobIds.push(jobId);
	}
	return stages;
}
