import { z } from "zod";
import { listRuleIds } from "../checks/registry.js";
import { DEFAULT_CONCURRENCY_EVENTS } from "../core/concurrency.js";
import { DEFAULT_WORKFLOWS_DIR } from "../core/discovery.js";

export const RuleSeveritySchema = z.enum(["off", "warning", "error"]);

export const ConfigSchema = z.object({
	workflowsDir: z.string().min(1).default(DEFAULT_WORKFLOWS_DIR),
	defaultBranch: z.string().min(1).default("main"),
	rules: z
		.record(RuleSeveritySchema)
		.default({})
		.superRefine((rules, ctx) => {
			const known = new Set(listRuleIds());
			for (const ruleId of Object.keys(rules)) {
				if (!known.has(ruleId)) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: [ruleId],
						message: `Unknown rule "${ruleId}"`,
					});
				}
			}
		}),
	concurrency: z
		.object({
			events: z.array(z.string().min(1)).min(1).default(DEFAULT_CONCURRENCY_EVENTS),
			sha: z.string().min(1).default("0000000"),
		})
		.default({
			events: DEFAULT_CONCURRENCY_EVENTS,
			sha: "0000000",
		}),
	report: z.boolean().default(true),
});

export type WfcheckConfig = z.infer<typeof ConfigSchema>;
