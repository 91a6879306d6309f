import path from "node:path";
import { render } from "ink";
import React from "react";
import { type CheckSummary, parseFailureDiagnostics, runChecks, sortDiagnostics, summarize } from "../checks/run-checks.js";
import type { Diagnostic } from "../core/types.js";
import { ReportStore, createReport } from "../store/report-store.js";
import { formatDiagnosticLine, formatSummary } from "../tui/format.js";
import { ReportView } from "../tui/report-view.js";
import { toRepoRelative } from "../utils/path-safety.js";
import { type CommandContext, concurrencyOptions } from "./context.js";
import { STATE_DIR } from "./init.js";
import { errorMessage } from "./io.js";
import { buildCheckJson, toJsonText } from "./output.js";
import { filterWorkflows, matchesWorkflowSelector } from "./select.js";

export async function runCheckCommand(ctx: CommandContext): Promise<number> {
	const { repoRoot, args, config, io, log, discovery } = ctx;
	const selector = args.workflow;
	const workflows = filterWorkflows(discovery.workflows, selector);
	const failures = selector
		? discovery.failures.filter((failure) => matchesWorkflowSelector(failure.path, selector))
		: discovery.failures;

	if (selector && !workflows && failures.length === 0) {
		io.stderr(`Workflow not found: ${selector}\n`);
		return 2;
	}
	const selected = workflows ?? [];
	if (selected.length === 0 && failures.length === 0) {
		io.stderr(`No workflows found in ${config.workflowsDir}.\n`);
		return 1;
	}

	log(`checking ${selected.length + failures.length} workflow(s)`);
	const diagnostics = sortDiagnostics([
		...parseFailureDiagnostics(failures, repoRoot),
		...runChecks(selected, {
			repoRoot,
			rules: config.rules,
			concurrency: concurrencyOptions(config),
			onRule: (ruleId, workflow) => log(`${toRepoRelative(repoRoot, workflow.path)}: ${ruleId}`),
		}),
	]);
	const summary = summarize(diagnostics, selected.length + failures.length);

	let reportPath: string | undefined;
	if (config.report && !args.noReport) {
		const checked = [...selected.map((wf) => wf.path), ...failures.map((failure) => failure.path)]
			.map((workflowPath) => toRepoRelative(repoRoot, workflowPath))
			.sort();
		try {
			const store = new ReportStore(path.join(repoRoot, STATE_DIR, "reports"));
			reportPath = toRepoRelative(repoRoot, store.writeReport(createReport(checked, diagnostics, summary)));
			log(`report written to ${reportPath}`);
		} catch (error) {
			io.stderr(`Could not write report: ${errorMessage(error, "unknown error")}\n`);
		}
	}

	if (args.json) {
		io.stdout(toJsonText(buildCheckJson(summary, diagnostics, reportPath)));
	} else if (io.isTty) {
		await renderReport(diagnostics, summary, reportPath);
	} else {
		for (const diagnostic of diagnostics) {
			io.stdout(`${formatDiagnosticLine(diagnostic)}\n`);
		}
		io.stdout(`${formatSummary(summary)}\n`);
		if (reportPath) {
			io.stdout(`Report: ${reportPath}\n`);
		}
	}

	return exitCodeFor(summary, Boolean(args.strict));
}

export function exitCodeFor(summary: CheckSummary, strict: boolean): number {
	if (summary.errors > 0) {
		return 1;
	}
	return strict && summary.warnings > 0 ? 1 : 0;
}

async function renderReport(diagnostics: Diagnostic[], summary: CheckSummary, reportPath?: string): Promise<void> {
	const { waitUntilExit } = render(React.createElement(ReportView, { diagnostics, summary, reportPath }));
	await waitUntilExit();
}
