import { describe, expect, it } from "vitest";
import {
	DEFAULT_CONCURRENCY_EVENTS,
	type ConcurrencyOptions,
	evaluateConcurrencyGroups,
	resolveConcurrencyEvents,
} from "../src/core/concurrency.js";
import { parseWorkflow, parseWorkflowSource } from "../src/core/parser.js";
import { trunkWorkflowPath } from "./helpers/repo.js";

const options: ConcurrencyOptions = {
	defaultBranch: "main",
	events: DEFAULT_CONCURRENCY_EVENTS,
	sha: "0000000",
};

describe("concurrency groups", () => {
	it("gives every trunk trigger its own group", () => {
		expect(evaluateConcurrencyGroups(parseWorkflow(trunkWorkflowPath), options)).toEqual([
			{ event: "push", refType: "branch", refName: "main", group: "trunk-main-0000000-false-false" },
			{ event: "push", refType: "tag", refName: "ciflow/trunk/0", group: "trunk-ciflow/trunk/0-false-false-false" },
			{ event: "schedule", refType: "branch", refName: "main", group: "trunk-main-0000000-false-true" },
			{ event: "workflow_dispatch", refType: "branch", refName: "main", group: "trunk-main-0000000-true-false" },
		]);
	});

	it("adds declared pull request events", () => {
		const workflow = parseWorkflowSource(
			[
				"name: ci",
				"on: [pull_request, push]",
				"concurrency: ${{ github.workflow }}-${{ github.event.pull_request.number || github.ref_name }}",
				"jobs: {}",
			].join("\n"),
			"ci.yml",
		);

		expect(resolveConcurrencyEvents(workflow, DEFAULT_CONCURRENCY_EVENTS)).toEqual(["push", "pull_request"]);
		expect(evaluateConcurrencyGroups(workflow, options).map((result) => result.group)).toEqual(["ci-main", "ci-1"]);
	});

	it("falls back to the configured events when none are declared", () => {
		const workflow = parseWorkflowSource(["on: workflow_call", "jobs: {}"].join("\n"), "callee.yml");
		expect(resolveConcurrencyEvents(workflow, ["push"])).toEqual(["push"]);
		expect(evaluateConcurrencyGroups(workflow, options)).toEqual([]);
	});

	it("reports groups that cannot be evaluated", () => {
		const workflow = parseWorkflowSource(["on: push", "concurrency: ci-${{ format( }}", "jobs: {}"].join("\n"), "ci.yml");

		expect(evaluateConcurrencyGroups(workflow, options)).toEqual([
			{ event: "push", refType: "branch", refName: "main", group: "", error: "Unexpected end of expression" },
		]);
	});
});
