import type { CheckRule } from "./rule.js";
import { concurrencyCollisionRule, concurrencyGroupRule } from "./rules/concurrency.js";
import { duplicateCheckNameRule, duplicateJobIdRule, needsCycleRule, unknownNeedsRule } from "./rules/jobs.js";
import { expressionSyntaxRule, needsOutputRule, needsReferenceRule } from "./rules/references.js";
import { reusableWorkflowInputsRule, reusableWorkflowRefRule } from "./rules/reusable.js";
import { testMatrixReferenceRule, testMatrixShardsRule, testMatrixSyntaxRule } from "./rules/test-matrix.js";
import { missingTriggerRule, scheduleCronRule } from "./rules/triggers.js";

export const PARSE_ERROR_RULE_ID = "parse-error";

const RULE_REGISTRY: CheckRule[] = [
	missingTriggerRule,
	scheduleCronRule,
	duplicateJobIdRule,
	duplicateCheckNameRule,
	unknownNeedsRule,
	needsCycleRule,
	expressionSyntaxRule,
	needsReferenceRule,
	needsOutputRule,
	reusableWorkflowRefRule,
	reusableWorkflowInputsRule,
	testMatrixSyntaxRule,
	testMatrixShardsRule,
	testMatrixReferenceRule,
	concurrencyGroupRule,
	concurrencyCollisionRule,
];

export function listRules(): CheckRule[] {
	return [...RULE_REGISTRY];
}

export function listRuleIds(): string[] {
	return RULE_REGISTRY.map((rule) => rule.id);
}

export function getRule(ruleId: string): CheckRule {
	const rule = RULE_REGISTRY.find((candidate) => candidate.id === ruleId);
	if (!rule) {
		throw new Error(`Unknown rule "${ruleId}". Available rules: ${listRuleIds().join(", ")}`);
	}
	return rule;
}
