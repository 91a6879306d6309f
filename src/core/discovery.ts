import fs from "node:fs";
import path from "node:path";
import { parseWorkflow } from "./parser.js";
import type { Workflow } from "./types.js";

export const DEFAULT_WORKFLOWS_DIR = ".github/workflows";

export type DiscoveryFailure = {
	path: string;
	error: Error;
};

export type DiscoveryResult = {
	workflows: Workflow[];
	failures: DiscoveryFailure[];
};

export function findWorkflowFiles(repoRoot: string, workflowsDir = DEFAULT_WORKFLOWS_DIR): string[] {
	const dir = path.join(repoRoot, workflowsDir);
	if (!fs.existsSync(dir)) {
		return [];
	}

	return fs
		.readdirSync(dir)
		.filter((file: string) => file.endsWith(".yml") || file.endsWith(".yaml"))
		.sort()
		.map((file: string) => path.join(dir, file));
}

export function discoverWorkflows(repoRoot: string, workflowsDir = DEFAULT_WORKFLOWS_DIR): Workflow[] {
	return findWorkflowFiles(repoRoot, workflowsDir).map((workflowPath) => parseWorkflow(workflowPath));
}

export function discoverWorkflowsSafe(repoRoot: string, workflowsDir = DEFAULT_WORKFLOWS_DIR): DiscoveryResult {
	const result: DiscoveryResult = { workflows: [], failures: [] };
	for (const workflowPath of findWorkflowFiles(repoRoot, workflowsDir)) {
		try {
			result.workflows.push(parseWorkflow(workflowPath));
		} catch (error) {
			result.failures.push({
				path: workflowPath,
				error: error instanceof Error ? error : new Error(String(error)),
			});
		}
	}
	return result;
}
