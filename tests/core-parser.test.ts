import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { discoverWorkflows, discoverWorkflowsSafe, findWorkflowFiles } from "../src/core/discovery.js";
import { WorkflowParseError, parseWorkflow, parseWorkflowSource } from "../src/core/parser.js";
import { createRepo, trunkRepo, trunkWorkflowPath } from "./helpers/repo.js";

describe("core parser", () => {
	it("parses workflow metadata, events, jobs and steps", () => {
		const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "wfcheck-parser-"));
		const workflowPath = path.join(tmpDir, "ci.yml");
		fs.writeFileSync(
			workflowPath,
			[
				"name: CI",
				"on:",
				"  push:",
				"  pull_request:",
				"jobs:",
				"  build:",
				"    name: Build job",
				"    needs: test",
				"    runs-on: [ubuntu-latest, self-hosted]",
				"    env:",
				"      NODE_ENV: test",
				"    strategy:",
				"      matrix:",
				"        node: [18, 20]",
				"    steps:",
				"      - run: npm ci",
				"      - uses: actions/setup-node@v4",
				"        with:",
				"          node-version: 20",
			].join("\n"),
		);

		const workflow = parseWorkflow(workflowPath);

		expect(workflow.name).toBe("CI");
		expect(workflow.events).toEqual(["push", "pull_request"]);
		expect(workflow.jobs).toHaveLength(1);
		expect(workflow.jobs[0]).toMatchObject({
			id: "build",
			name: "Build job",
			needs: ["test"],
			runsOn: "ubuntu-latest, self-hosted",
			env: { NODE_ENV: "test" },
			strategy: { matrix: { node: [18, 20] } },
			position: { line: 6, column: 3 },
		});
		expect(workflow.jobs[0]?.steps).toEqual([
			{
				id: "build-step-1",
				name: "npm ci",
				run: "npm ci",
				uses: undefined,
				if: undefined,
				env: undefined,
				with: undefined,
			},
			{
				id: "build-step-2",
				name: "actions/setup-node@v4",
				run: undefined,
				uses: "actions/setup-node@v4",
				if: undefined,
				env: undefined,
				with: { "node-version": 20 },
			},
		]);
	});

	it("parses on as string and array", () => {
		expect(parseWorkflowSource(["on: push", "jobs: {}"].join("\n"), "single.yml").events).toEqual(["push"]);
		expect(parseWorkflowSource(["on: [push, workflow_dispatch]", "jobs: {}"].join("\n"), "multi.yml").events).toEqual([
			"push",
			"workflow_dispatch",
		]);
	});

	it("includes file and location when yaml is invalid", () => {
		const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "wfcheck-parser-invalid-"));
		const workflowPath = path.join(tmpDir, "broken.yml");
		fs.writeFileSync(workflowPath, ["name: CI", "on: push", "jobs: [build"].join("\n"));

		expect(() => parseWorkflow(workflowPath)).toThrowError(
			new RegExp(`${workflowPath.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}:\\d+:\\d+`),
		);
		expect(() => parseWorkflow(workflowPath)).toThrowError(WorkflowParseError);
	});

	it("rejects a document that is not a mapping", () => {
		expect(() => parseWorkflowSource("- push\n", "list.yml")).toThrowError("list.yml:1:1 Workflow must be a mapping");
	});

	it("keeps duplicated job keys with their positions", () => {
		const workflow = parseWorkflowSource(
			[
				"on: push",
				"jobs:",
				"  build:",
				"    runs-on: ubuntu-latest",
				"  build:",
				"    runs-on: macos-latest",
			].join("\n"),
			"dup.yml",
		);

		expect(workflow.jobs.map((job) => job.id)).toEqual(["build"]);
		expect(workflow.jobs[0]?.position).toEqual({ line: 3, column: 3 });
		expect(workflow.duplicateJobIds).toEqual([{ id: "build", position: { line: 5, column: 3 } }]);
	});

	it("normalizes runs-on groups and concurrency forms", () => {
		const workflow = parseWorkflowSource(
			[
				"on: push",
				"concurrency:",
				"  group: ci-${{ github.ref }}",
				"  cancel-in-progress: ${{ github.ref != 'refs/heads/main' }}",
				"jobs:",
				"  build:",
				"    runs-on:",
				"      group: large-runners",
				"      labels: [gpu]",
			].join("\n"),
			"ci.yml",
		);

		expect(workflow.jobs[0]?.runsOn).toBe("large-runners, gpu");
		expect(workflow.concurrency).toEqual({
			group: "ci-${{ github.ref }}",
			cancelInProgress: "${{ github.ref != 'refs/heads/main' }}",
			position: { line: 3, column: 3 },
		});

		const plain = parseWorkflowSource(["on: push", "concurrency: deploy", "jobs: {}"].join("\n"), "plain.yml");
		expect(plain.concurrency).toMatchObject({ group: "deploy", cancelInProgress: false });
	});

	it("reads the workflow_call interface of a reusable workflow", () => {
		const workflow = parseWorkflow(path.join(trunkRepo, ".github", "workflows", "_linux-build.yml"));

		expect(workflow.events).toEqual(["workflow_call"]);
		expect(workflow.callInterface?.outputs).toEqual(["docker-image", "test-matrix"]);
		expect(workflow.callInterface?.inputs["build-environment"]).toEqual({
			name: "build-environment",
			type: "string",
			required: true,
			hasDefault: false,
		});
		expect(workflow.callInterface?.inputs["build-generates-artifacts"]).toEqual({
			name: "build-generates-artifacts",
			type: "boolean",
			required: false,
			hasDefault: true,
		});
	});

	it("parses the trunk pipeline jobs", () => {
		const workflow = parseWorkflow(trunkWorkflowPath);

		expect(workflow.name).toBe("trunk");
		expect(workflow.events).toEqual(["push", "workflow_dispatch", "schedule"]);
		expect(workflow.callInterface).toBeUndefined();
		expect(workflow.jobs.map((job) => job.id)).toEqual([
			"linux-gcc9-build",
			"linux-gcc9-test",
			"linux-no-ops-build",
			"macos-arm64-build",
			"macos-arm64-mps-test",
			"macos-arm64-test",
		]);
		expect(workflow.jobs[1]).toMatchObject({
			name: "linux-gcc9",
			needs: ["linux-gcc9-build"],
			uses: "./.github/workflows/_linux-test.yml",
		});
		expect(workflow.concurrency?.cancelInProgress).toBe(true);
	});
});

describe("workflow discovery", () => {
	it("lists yml and yaml files sorted by name", () => {
		const repoRoot = createRepo("discovery", {
			"b.yaml": ["on: push", "jobs: {}"],
			"a.yml": ["on: push", "jobs: {}"],
		});
		fs.writeFileSync(path.join(repoRoot, ".github", "workflows", "notes.md"), "# notes\n");

		expect(findWorkflowFiles(repoRoot).map((file) => path.basename(file))).toEqual(["a.yml", "b.yaml"]);
	});

	it("returns no files when the directory is missing", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "wfcheck-discovery-empty-"));
		expect(findWorkflowFiles(repoRoot)).toEqual([]);
	});

	it("keeps parsing other files when one is broken", () => {
		const repoRoot = createRepo("discovery-broken", {
			"broken.yml": ["name: CI", "on: push", "jobs: [build"],
			"ok.yml": ["on: push", "jobs: {}"],
		});

		const result = discoverWorkflowsSafe(repoRoot);

		expect(result.workflows.map((workflow) => path.basename(workflow.path))).toEqual(["ok.yml"]);
		expect(result.failures).toHaveLength(1);
		expect(path.basename(result.failures[0]?.path ?? "")).toBe("broken.yml");
		expect(result.failures[0]?.error).toBeInstanceOf(WorkflowParseError);
		expect(() => discoverWorkflows(repoRoot)).toThrowError(WorkflowParseError);
	});

	it("parses every workflow of the trunk pipeline", () => {
		expect(discoverWorkflows(trunkRepo).map((workflow) => workflow.name)).toEqual([
			"linux-build",
			"linux-test",
			"mac-build",
			"mac-test-mps",
			"mac-test",
			"trunk",
		]);
	});
});
