import fs from "node:fs";
import { ensureWithinBase } from "../utils/path-safety.js";
import { parseWorkflow } from "./parser.js";
import type { CallInterface } from "./types.js";

const WORKFLOW_DIR_PREFIX = ".github/workflows/";
const REMOTE_REF_PATTERN = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)\/(.+)@([^@\s]+)$/;

export type ReusableRef =
	| { kind: "local"; path: string }
	| { kind: "remote"; owner: string; repo: string; path: string; ref: string }
	| { kind: "invalid"; reason: string };

export type CalleeResolution =
	| { status: "found"; path: string; callInterface?: CallInterface }
	| { status: "missing"; reason: string }
	| { status: "error"; reason: string };

export function parseReusableRef(uses: string): ReusableRef {
	const value = uses.trim();
	if (value.startsWith("./")) {
		if (value.includes("@")) {
			return { kind: "invalid", reason: `local reference "${value}" must not pin a ref` };
		}
		const relative = value.slice(2);
		const problem = checkWorkflowPath(relative);
		return problem ? { kind: "invalid", reason: problem } : { kind: "local", path: relative };
	}

	const match = REMOTE_REF_PATTERN.exec(value);
	if (!match) {
		return {
			kind: "invalid",
			reason: `"${value}" is neither ./<path> nor <owner>/<repo>/<path>@<ref>`,
		};
	}
	const [, owner, repo, path, ref] = match;
	const problem = checkWorkflowPath(path);
	if (problem) {
		return { kind: "invalid", reason: problem };
	}
	return { kind: "remote", owner, repo, path, ref };
}

export class ReusableResolver {
	private readonly cache = new Map<string, CalleeResolution>();

	constructor(private readonly repoRoot: string) {}

	resolve(relativePath: string): CalleeResolution {
		const cached = this.cache.get(relativePath);
		if (cached) {
			return cached;
		}
		const resolution = this.load(relativePath);
		this.cache.set(relativePath, resolution);
		return resolution;
	}

	private load(relativePath: string): CalleeResolution {
		let absolute: string;
		try {
			absolute = ensureWithinBase(this.repoRoot, relativePath, "reusable workflow path");
		} catch (error) {
			return { status: "error", reason: error instanceof Error ? error.message : String(error) };
		}
		if (!fs.existsSync(absolute)) {
			return { status: "missing", reason: `${relativePath} does not exist` };
		}
		try {
			const workflow = parseWorkflow(absolute);
			return { status: "found", path: absolute, callInterface: workflow.callInterface };
		} catch (error) {
			return { status: "error", reason: error instanceof Error ? error.message : String(error) };
		}
	}
}

function checkWorkflowPath(path: string): string | undefined {
	if (!path.startsWith(WORKFLOW_DIR_PREFIX)) {
		return `reusable workflows must live in ${WORKFLOW_DIR_PREFIX} (got "${path}")`;
	}
	const rest = path.slice(WORKFLOW_DIR_PREFIX.length);
	if (rest.includes("/")) {
		return `reusable workflows cannot be nested below ${WORKFLOW_DIR_PREFIX} (got "${path}")`;
	}
	if (!/\.ya?ml$/.test(rest)) {
		return `reusable workflow "${path}" must be a .yml or .yaml file`;
	}
	return undefined;
}
