import { describe, expect, it } from "vitest";
import { parseWorkflow, parseWorkflowSource } from "../src/core/parser.js";
import { checkShards, expandShards, parseTestMatrix, resolveTestMatrix } from "../src/core/test-matrix.js";
import type { TestMatrixEntry } from "../src/core/types.js";
import { trunkWorkflowPath } from "./helpers/repo.js";

function entry(config: string, shard: number, numShards: number): TestMatrixEntry {
	return { config, shard, numShards, runner: undefined, extra: {} };
}

describe("test matrix parsing", () => {
	it("parses an inline include document", () => {
		const matrix = parseTestMatrix(
			[
				"{ include: [",
				'  { config: "default", shard: 1, num_shards: 2, runner: "linux.large" },',
				'  { config: "default", shard: 2, num_shards: 2, mem_leak_check: "mem_leak_check" },',
				"]}",
			].join("\n"),
		);

		expect(matrix).toEqual({
			kind: "literal",
			entries: [
				{ config: "default", shard: 1, numShards: 2, runner: "linux.large", extra: {} },
				{ config: "default", shard: 2, numShards: 2, runner: undefined, extra: { mem_leak_check: "mem_leak_check" } },
			],
			problems: [],
		});
	});

	it("recognizes a reference to another job's output", () => {
		expect(parseTestMatrix("${{ needs.build.outputs.test-matrix }}")).toEqual({
			kind: "reference",
			jobId: "build",
			output: "test-matrix",
			expression: "needs.build.outputs.test-matrix",
		});
	});

	it("reports entries that do not fit the schema", () => {
		const matrix = parseTestMatrix(
			[
				"{ include: [",
				'  { config: "default", shard: 0, num_shards: 1 },',
				"  { shard: 1, num_shards: 1 },",
				"]}",
			].join("\n"),
		);

		expect(matrix).toEqual({
			kind: "literal",
			entries: [],
			problems: [
				"entry 1: shard: Number must be greater than or equal to 1",
				"entry 2: config: Required",
			],
		});
	});

	it("keeps other whole expressions for run time", () => {
		expect(parseTestMatrix("${{ inputs.test-matrix }}")).toEqual({
			kind: "expression",
			expression: "inputs.test-matrix",
		});
		expect(parseTestMatrix("${{ needs.build.result }}")).toEqual({
			kind: "expression",
			expression: "needs.build.result",
		});
		expect(parseTestMatrix("${{ inputs.test-matrix == }}")).toEqual({
			kind: "invalid",
			reason: "Unexpected end of expression",
		});
	});

	it("marks unusable values as invalid", () => {
		expect(parseTestMatrix("[1, 2]")).toEqual({
			kind: "invalid",
			reason: "test matrix must be a mapping with an include list",
		});
		expect(parseTestMatrix("   ")).toEqual({ kind: "invalid", reason: "test matrix is empty" });

		const broken = parseTestMatrix('{ include: [ { config: "default"');
		expect(broken.kind).toBe("invalid");
		expect(broken.kind === "invalid" ? broken.reason : "").toMatch(/^test matrix is not valid YAML: /);
	});
});

describe("shard checks", () => {
	it("accepts contiguous shards per config", () => {
		expect(checkShards([entry("default", 1, 2), entry("default", 2, 2), entry("jit", 1, 1)])).toEqual([]);
	});

	it("reports gaps, repeats, overflow and conflicts", () => {
		expect(checkShards([entry("default", 1, 3), entry("default", 3, 3)])).toEqual([
			'config "default" is missing shard(s) 2 of 3',
		]);
		expect(checkShards([entry("default", 1, 2), entry("default", 1, 2)])).toEqual([
			'config "default" repeats shard 1',
			'config "default" is missing shard(s) 2 of 2',
		]);
		expect(checkShards([entry("default", 1, 2), entry("default", 2, 2), entry("default", 3, 2)])).toEqual([
			'config "default" shard 3 exceeds num_shards 2',
		]);
		expect(checkShards([entry("default", 1, 2), entry("default", 2, 3)])).toEqual([
			'config "default" declares conflicting num_shards: 2, 3',
		]);
	});
});

describe("test matrix resolution", () => {
	it("expands shards through a needs output", () => {
		const workflow = parseWorkflow(trunkWorkflowPath);

		expect(expandShards(workflow, "linux-gcc9-test")).toEqual([
			{
				jobId: "linux-gcc9-test",
				sourceJobId: "linux-gcc9-build",
				config: "default",
				shard: 1,
				numShards: 2,
				runner: "linux.large",
			},
			{
				jobId: "linux-gcc9-test",
				sourceJobId: "linux-gcc9-build",
				config: "default",
				shard: 2,
				numShards: 2,
				runner: "linux.large",
			},
			{
				jobId: "linux-gcc9-test",
				sourceJobId: "linux-gcc9-build",
				config: "jit",
				shard: 1,
				numShards: 1,
				runner: "linux.gpu",
			},
		]);
	});

	it("falls back to the source job's runner", () => {
		const workflow = parseWorkflow(trunkWorkflowPath);

		expect(expandShards(workflow, "linux-no-ops-build")).toEqual([
			{
				jobId: "linux-no-ops-build",
				sourceJobId: "linux-no-ops-build",
				config: "default",
				shard: 1,
				numShards: 1,
				runner: "linux.xlarge",
			},
		]);
		expect(expandShards(workflow, "macos-arm64-test").map((shard) => `${shard.shard}/${shard.numShards}`)).toEqual([
			"1/3",
			"2/3",
			"3/3",
		]);
	});

	it("explains why a reference does not resolve", () => {
		const workflow = parseWorkflowSource(
			[
				"on: push",
				"jobs:",
				"  build:",
				"    with:",
				'      test-matrix: "{ include: [] }"',
				"  orphan:",
				"    with:",
				"      test-matrix: ${{ needs.build.outputs.test-matrix }}",
				"  a:",
				"    needs: b",
				"    with:",
				"      test-matrix: ${{ needs.b.outputs.test-matrix }}",
				"  b:",
				"    needs: a",
				"    with:",
				"      test-matrix: ${{ needs.a.outputs.test-matrix }}",
				"  lint:",
				"    runs-on: ubuntu-latest",
				"  uses-lint:",
				"    needs: lint",
				"    with:",
				"      test-matrix: ${{ needs.lint.outputs.test-matrix }}",
			].join("\n"),
			"ci.yml",
		);

		expect(resolveTestMatrix(workflow, "orphan")).toEqual({
			ok: false,
			reason: 'job "orphan" reads needs.build.outputs.test-matrix without needing "build"',
		});
		expect(resolveTestMatrix(workflow, "a")).toEqual({
			ok: false,
			reason: 'test matrix references loop back to "a"',
		});
		expect(resolveTestMatrix(workflow, "uses-lint")).toEqual({
			ok: false,
			reason: 'job "lint" has no test-matrix input',
		});
		expect(resolveTestMatrix(workflow, "build")).toEqual({ ok: true, sourceJobId: "build", entries: [], problems: [] });
		expect(expandShards(workflow, "orphan")).toEqual([]);
	});

	it("follows references to a matrix supplied at run time", () => {
		const workflow = parseWorkflowSource(
			[
				"on: workflow_call",
				"jobs:",
				"  build:",
				"    with:",
				"      test-matrix: ${{ inputs.test-matrix }}",
				"  test:",
				"    needs: build",
				"    with:",
				"      test-matrix: ${{ needs.build.outputs.test-matrix }}",
			].join("\n"),
			"_build-label.yml",
		);

		expect(resolveTestMatrix(workflow, "test")).toEqual({
			ok: false,
			reason: 'job "build" receives its test matrix from inputs.test-matrix at run time',
			runtimeExpression: "inputs.test-matrix",
		});
		expect(expandShards(workflow, "test")).toEqual([]);
	});
});
