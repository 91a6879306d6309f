import type { CheckSummary } from "../checks/run-checks.js";
import type { Diagnostic, PlannedShard, Severity } from "../core/types.js";

export function severityGlyph(severity: Severity): string {
	return severity === "error" ? "✕" : "▲";
}

export function colorForSeverity(severity: Severity): "red" | "yellow" {
	return severity === "error" ? "red" : "yellow";
}

export function formatLocation(diagnostic: Diagnostic): string {
	if (diagnostic.line === undefined) {
		return diagnostic.workflowPath;
	}
	return `${diagnostic.workflowPath}:${diagnostic.line}:${diagnostic.column ?? 1}`;
}

export function formatDiagnosticLine(diagnostic: Diagnostic): string {
	return `${formatLocation(diagnostic)} ${diagnostic.severity} ${diagnostic.ruleId} ${diagnostic.message}`;
}

export function formatSummary(summary: CheckSummary): string {
	const scope = `${summary.workflows} ${plural(summary.workflows, "workflow")}`;
	if (summary.errors === 0 && summary.warnings === 0) {
		return `No problems found in ${scope}.`;
	}
	const errors = `${summary.errors} ${plural(summary.errors, "error")}`;
	const warnings = `${summary.warnings} ${plural(summary.warnings, "warning")}`;
	return `${errors}, ${warnings} in ${scope}.`;
}

export function formatShardLine(shard: PlannedShard): string {
	const source = shard.sourceJobId === shard.jobId ? "" : ` (from ${shard.sourceJobId})`;
	const runner = shard.runner ? ` on ${shard.runner}` : "";
	return `${shard.jobId}: ${shard.config} ${shard.shard}/${shard.numShards}${runner}${source}`;
}

function plural(count: number, noun: string): string {
	return count === 1 ? noun : `${noun}s`;
}
