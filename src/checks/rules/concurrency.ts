import { type EvaluatedGroup, evaluateConcurrencyGroups } from "../../core/concurrency.js";
import type { CheckRule, RuleFinding } from "../rule.js";

export const concurrencyGroupRule: CheckRule = {
	id: "concurrency-group",
	description: "The concurrency group evaluates to a non-empty key for every trigger kind",
	defaultSeverity: "error",
	check({ workflow, concurrency }) {
		const position = workflow.concurrency?.position;
		const findings: RuleFinding[] = [];
		for (const result of evaluateConcurrencyGroups(workflow, concurrency)) {
			if (result.error) {
				findings.push({
					message: `concurrency group cannot be evaluated for ${describeRun(result)}: ${result.error}`,
					position,
				});
				continue;
			}
			if (result.group.trim().length === 0) {
				findings.push({
					message: `concurrency group is empty for ${describeRun(result)}`,
					position,
				});
			}
		}
		return findings;
	},
};

export const concurrencyCollisionRule: CheckRule = {
	id: "concurrency-collision",
	description: "Different trigger kinds do not cancel each other through a shared concurrency group",
	defaultSeverity: "warning",
	check({ workflow, concurrency }) {
		const policy = workflow.concurrency;
		if (policy?.cancelInProgress !== true) {
			return [];
		}
		const byGroup = new Map<string, EvaluatedGroup[]>();
		for (const result of evaluateConcurrencyGroups(workflow, concurrency)) {
			if (result.error || result.group.trim().length === 0) {
				continue;
			}
			const runs = byGroup.get(result.group) ?? [];
			runs.push(result);
			byGroup.set(result.group, runs);
		}

		const findings: RuleFinding[] = [];
		for (const [group, runs] of byGroup.entries()) {
			const events = Array.from(new Set(runs.map((run) => run.event)));
			if (events.length < 2) {
				continue;
			}
			findings.push({
				message: `${runs.map(describeRun).join(" and ")} share concurrency group "${group}" and will cancel each other`,
				position: policy.position,
			});
		}
		return findings;
	},
};

function describeRun(result: EvaluatedGroup): string {
	return `${result.event} on ${result.refType} ${result.refName}`;
}
