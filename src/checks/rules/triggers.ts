import { findTrigger, validateCron } from "../../core/triggers.js";
import type { CheckRule, RuleFinding } from "../rule.js";

export const scheduleCronRule: CheckRule = {
	id: "schedule-cron",
	description: "Schedule triggers carry valid five-field cron expressions",
	defaultSeverity: "error",
	check({ workflow }) {
		const schedule = findTrigger(workflow.triggers, "schedule");
		if (!schedule) {
			return [];
		}
		if (schedule.crons.length === 0) {
			return [{ message: "schedule trigger has no cron entries" }];
		}
		const findings: RuleFinding[] = [];
		for (const cron of schedule.crons) {
			const problem = validateCron(cron);
			if (problem) {
				findings.push({ message: `invalid cron "${cron}": ${problem}` });
			}
		}
		return findings;
	},
};

export const missingTriggerRule: CheckRule = {
	id: "missing-trigger",
	description: "A workflow declares at least one trigger",
	defaultSeverity: "error",
	check({ workflow }) {
		return workflow.events.length === 0 ? [{ message: "workflow declares no triggers (on:)" }] : [];
	},
};
