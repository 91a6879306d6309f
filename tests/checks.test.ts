import { describe, expect, it } from "vitest";
import { PARSE_ERROR_RULE_ID, getRule, listRuleIds } from "../src/checks/registry.js";
import type { RuleSeverity } from "../src/checks/rule.js";
import { parseFailureDiagnostics, runChecks, summarize } from "../src/checks/run-checks.js";
import { DEFAULT_CONCURRENCY_EVENTS } from "../src/core/concurrency.js";
import { discoverWorkflowsSafe } from "../src/core/discovery.js";
import type { Diagnostic } from "../src/core/types.js";
import { createRepo, trunkRepo } from "./helpers/repo.js";

function check(repoRoot: string, rules: Record<string, RuleSeverity> = {}): Diagnostic[] {
	const { workflows, failures } = discoverWorkflowsSafe(repoRoot);
	return [
		...parseFailureDiagnostics(failures, repoRoot),
		...runChecks(workflows, {
			repoRoot,
			rules,
			concurrency: { defaultBranch: "main", events: DEFAULT_CONCURRENCY_EVENTS, sha: "0000000" },
		}),
	];
}

function messages(diagnostics: Diagnostic[]): string[][] {
	return diagnostics.map((diagnostic) => [diagnostic.ruleId, diagnostic.message]);
}

describe("rule registry", () => {
	it("lists every rule once", () => {
		const ids = listRuleIds();
		expect(new Set(ids).size).toBe(ids.length);
		expect(ids).toContain("test-matrix-shards");
		expect(ids).not.toContain(PARSE_ERROR_RULE_ID);
	});

	it("looks rules up by id", () => {
		expect(getRule("needs-cycle").defaultSeverity).toBe("error");
		expect(getRule("concurrency-collision").defaultSeverity).toBe("warning");
		expect(() => getRule("nope")).toThrowError(/Unknown rule "nope"/);
	});
});

describe("workflow checks", () => {
	it("finds nothing wrong with the trunk pipeline", () => {
		const diagnostics = check(trunkRepo);
		expect(diagnostics).toEqual([]);
		expect(summarize(diagnostics, 6)).toEqual({ errors: 0, warnings: 0, workflows: 6 });
	});

	it("reports duplicate job ids and unknown needs with positions", () => {
		const repoRoot = createRepo("jobs", {
			"ci.yml": [
				"on: push",
				"jobs:",
				"  build:",
				"    runs-on: ubuntu-latest",
				"  build:",
				"    runs-on: ubuntu-latest",
				"  test:",
				"    needs: [build, lint]",
				"    runs-on: ubuntu-latest",
			],
		});

		expect(check(repoRoot)).toEqual([
			{
				ruleId: "duplicate-job-id",
				severity: "error",
				message: 'job id "build" is defined more than once',
				workflowPath: ".github/workflows/ci.yml",
				jobId: "build",
				line: 5,
				column: 3,
			},
			{
				ruleId: "unknown-needs",
				severity: "error",
				message: 'job "test" needs unknown job "lint"',
				workflowPath: ".github/workflows/ci.yml",
				jobId: "test",
				line: 7,
				column: 3,
			},
		]);
	});

	it("reports needs cycles", () => {
		const repoRoot = createRepo("cycle", {
			"ci.yml": ["on: push", "jobs:", "  a:", "    needs: c", "  b:", "    needs: a", "  c:", "    needs: b"],
		});

		expect(messages(check(repoRoot))).toEqual([["needs-cycle", "needs cycle: a → c → b → a"]]);
	});

	it("checks needs references and declared outputs", () => {
		const repoRoot = createRepo("needs", {
			"ci.yml": [
				"on: push",
				"jobs:",
				"  build:",
				"    runs-on: ubuntu-latest",
				"    outputs:",
				"      image: ${{ steps.image.outputs.name }}",
				"  test:",
				"    needs: build",
				"    if: needs.build.conclusion == 'success'",
				"    runs-on: ubuntu-latest",
				"    env:",
				"      IMAGE: ${{ needs.build.outputs.image }}",
				"      TAG: ${{ needs.build.outputs.tag }}",
				"      LINT: ${{ needs.lint.result }}",
			],
		});

		expect(messages(check(repoRoot))).toEqual([
			["needs-output", 'needs.build.conclusion: "conclusion" is not a job property (expected outputs or result)'],
			["needs-output", 'needs.build.outputs.tag: job "build" declares no output "tag" (declared: image)'],
			["needs-reference", 'job "test" reads needs.lint.result but does not list "lint" in needs'],
		]);
	});

	it("reports expressions that do not parse", () => {
		const repoRoot = createRepo("expressions", {
			"ci.yml": [
				"on: push",
				"jobs:",
				"  build:",
				"    runs-on: ubuntu-latest",
				"    steps:",
				"      - run: echo ${{ github.sha",
				"      - if: ${{ github.ref == }}",
				"        run: echo ok",
			],
		});

		expect(messages(check(repoRoot))).toEqual([
			["expression-syntax", "invalid expression in steps[0].run: Unterminated ${{ expression"],
			["expression-syntax", "invalid expression in steps[1].if: Unexpected end of expression"],
		]);
	});

	it("checks test matrices and their references", () => {
		const repoRoot = createRepo("matrix", {
			"_build.yml": [
				"on:",
				"  workflow_call:",
				"    inputs:",
				"      test-matrix:",
				"        type: string",
				"        required: true",
				"    outputs:",
				"      test-matrix:",
				"        value: ${{ inputs.test-matrix }}",
				"      shards:",
				"        value: ${{ inputs.test-matrix }}",
				"jobs:",
				"  run:",
				"    runs-on: ubuntu-latest",
			],
			"ci.yml": [
				"on: push",
				"jobs:",
				"  build:",
				"    uses: ./.github/workflows/_build.yml",
				"    with:",
				"      test-matrix: |",
				"        { include: [",
				'          { config: "default", shard: 1, num_shards: 2 },',
				'          { config: "default", shard: 1, num_shards: 2 },',
				"          { shard: 1, num_shards: 1 },",
				"        ]}",
				"  test:",
				"    needs: build",
				"    uses: ./.github/workflows/_build.yml",
				"    with:",
				"      test-matrix: ${{ needs.build.outputs.shards }}",
			],
		});

		const diagnostics = check(repoRoot);

		expect(messages(diagnostics)).toEqual([
			["test-matrix-shards", 'config "default" repeats shard 1'],
			["test-matrix-shards", 'config "default" is missing shard(s) 2 of 2'],
			["test-matrix-syntax", "test-matrix entry 3: config: Required"],
			["test-matrix-reference", 'job "test" reads output "shards" of "build", which is not a test-matrix'],
		]);
		expect(diagnostics.map((diagnostic) => diagnostic.line)).toEqual([3, 3, 3, 12]);
	});

	it("accepts test matrices forwarded from workflow inputs", () => {
		const repoRoot = createRepo("forwarded-matrix", {
			"_build.yml": [
				"on:",
				"  workflow_call:",
				"    inputs:",
				"      test-matrix:",
				"        type: string",
				"    outputs:",
				"      test-matrix:",
				"        value: ${{ inputs.test-matrix }}",
				"jobs:",
				"  run:",
				"    runs-on: ubuntu-latest",
			],
			"_build-label.yml": [
				"on:",
				"  workflow_call:",
				"    inputs:",
				"      test-matrix:",
				"        type: string",
				"        required: true",
				"jobs:",
				"  build:",
				"    uses: ./.github/workflows/_build.yml",
				"    with:",
				"      test-matrix: ${{ inputs.test-matrix }}",
				"  test:",
				"    needs: build",
				"    uses: ./.github/workflows/_build.yml",
				"    with:",
				"      test-matrix: ${{ needs.build.outputs.test-matrix }}",
			],
		});

		expect(check(repoRoot)).toEqual([]);
	});

	it("checks reusable workflow references and inputs", () => {
		const repoRoot = createRepo("reusable", {
			"_build.yml": [
				"on:",
				"  workflow_call:",
				"    inputs:",
				"      debug:",
				"        type: boolean",
				"      platform:",
				"        type: string",
				"        required: true",
				"jobs:",
				"  run:",
				"    runs-on: ubuntu-latest",
			],
			"_plain.yml": ["on: push", "jobs:", "  run:", "    runs-on: ubuntu-latest"],
			"ci.yml": [
				"on: push",
				"jobs:",
				"  build:",
				"    uses: ./.github/workflows/_build.yml",
				"    with:",
				"      target: linux",
				'      debug: "yes"',
				"  deploy:",
				"    uses: ./.github/workflows/_missing.yml",
				"  remote:",
				"    uses: octo-org/shared/.github/workflows/build.yml@v1",
				"  nested:",
				"    uses: ./ci/build.yml",
				"  plain:",
				"    uses: ./.github/workflows/_plain.yml",
			],
		});

		expect(messages(check(repoRoot))).toEqual([
			["reusable-workflow-inputs", '.github/workflows/_build.yml has no input "target"'],
			["reusable-workflow-inputs", 'input "debug" expects a boolean, got string "yes"'],
			["reusable-workflow-inputs", 'required input "platform" of .github/workflows/_build.yml is not provided'],
			[
				"reusable-workflow-ref",
				'job "deploy" uses ./.github/workflows/_missing.yml: .github/workflows/_missing.yml does not exist',
			],
			["reusable-workflow-ref", 'reusable workflows must live in .github/workflows/ (got "ci/build.yml")'],
			["reusable-workflow-inputs", ".github/workflows/_plain.yml does not declare an on.workflow_call trigger"],
		]);
	});

	it("reports colliding concurrency groups and bad schedules", () => {
		const repoRoot = createRepo("concurrency", {
			"ci.yml": [
				"on:",
				"  push:",
				"  workflow_dispatch:",
				"  schedule:",
				"    - cron: 0 25 * * *",
				"concurrency:",
				"  group: ${{ github.workflow }}-${{ github.ref_name }}",
				"  cancel-in-progress: true",
				"jobs:",
				"  build:",
				"    runs-on: ubuntu-latest",
			],
		});

		const diagnostics = check(repoRoot);

		expect(diagnostics).toEqual([
			{
				ruleId: "schedule-cron",
				severity: "error",
				message: 'invalid cron "0 25 * * *": hour value "25" is not allowed (0-23)',
				workflowPath: ".github/workflows/ci.yml",
				jobId: undefined,
				line: undefined,
				column: undefined,
			},
			{
				ruleId: "concurrency-collision",
				severity: "warning",
				message:
					'push on branch main and schedule on branch main and workflow_dispatch on branch main share concurrency group "ci.yml-main" and will cancel each other',
				workflowPath: ".github/workflows/ci.yml",
				jobId: undefined,
				line: 7,
				column: 3,
			},
		]);
		expect(summarize(diagnostics, 1)).toEqual({ errors: 1, warnings: 1, workflows: 1 });
	});

	it("applies configured severities", () => {
		const repoRoot = createRepo("severity", {
			"ci.yml": [
				"on:",
				"  push:",
				"  schedule:",
				"    - cron: 0 25 * * *",
				"concurrency:",
				"  group: ${{ github.workflow }}",
				"  cancel-in-progress: true",
				"jobs: {}",
			],
		});

		expect(
			check(repoRoot, { "schedule-cron": "warning", "concurrency-collision": "off" }).map((diagnostic) => [
				diagnostic.ruleId,
				diagnostic.severity,
			]),
		).toEqual([["schedule-cron", "warning"]]);
	});

	it("reports empty groups and missing triggers", () => {
		const repoRoot = createRepo("empty", {
			"a.yml": ["on: push", "concurrency: ${{ github.head_ref }}", "jobs: {}"],
			"b.yml": ["name: no triggers", "jobs: {}"],
		});

		expect(messages(check(repoRoot))).toEqual([
			["concurrency-group", "concurrency group is empty for push on branch main"],
			["missing-trigger", "workflow declares no triggers (on:)"],
		]);
	});

	it("turns parse failures into diagnostics", () => {
		const repoRoot = createRepo("broken", {
			"broken.yml": ["name: CI", "on: push", "jobs: [build"],
		});

		const [diagnostic, ...rest] = check(repoRoot);

		expect(rest).toEqual([]);
		expect(diagnostic).toMatchObject({
			ruleId: PARSE_ERROR_RULE_ID,
			severity: "error",
			workflowPath: ".github/workflows/broken.yml",
		});
		expect(diagnostic?.line).toBeGreaterThan(0);
	});
});
