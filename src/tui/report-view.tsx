import { Box, Text, useApp } from "ink";
import { useEffect } from "react";
import type { CheckSummary } from "../checks/run-checks.js";
import type { Diagnostic } from "../core/types.js";
import { colorForSeverity, formatLocation, formatSummary, severityGlyph } from "./format.js";

export type ReportViewProps = {
	diagnostics: Diagnostic[];
	summary: CheckSummary;
	reportPath?: string;
};

type WorkflowGroup = {
	workflowPath: string;
	diagnostics: Diagnostic[];
};

export function ReportView({ diagnostics, summary, reportPath }: ReportViewProps): JSX.Element {
	const { exit } = useApp();

	useEffect(() => {
		exit();
	}, [exit]);

	const groups = groupByWorkflow(diagnostics);
	const clean = summary.errors === 0 && summary.warnings === 0;

	return (
		<Box flexDirection="column" paddingX={1}>
			{groups.map((group) => (
				<Box key={group.workflowPath} flexDirection="column" marginBottom={1}>
					<Text bold underline>
						{group.workflowPath}
					</Text>
					{group.diagnostics.map((diagnostic, index) => (
						<Text key={`${diagnostic.ruleId}-${index}`}>
							<Text color={colorForSeverity(diagnostic.severity)}>{severityGlyph(diagnostic.severity)} </Text>
							<Text dimColor>{formatLocation(diagnostic)} </Text>
							<Text>{diagnostic.message} </Text>
							<Text dimColor>{diagnostic.ruleId}</Text>
						</Text>
					))}
				</Box>
			))}
			<Text color={clean ? "green" : summary.errors > 0 ? "red" : "yellow"}>
				{clean ? "● " : ""}
				{formatSummary(summary)}
			</Text>
			{reportPath ? <Text dimColor>Report: {reportPath}</Text> : null}
		</Box>
	);
}

function groupByWorkflow(diagnostics: Diagnostic[]): WorkflowGroup[] {
	const groups = new Map<string, Diagnostic[]>();
	for (const diagnostic of diagnostics) {
		const list = groups.get(diagnostic.workflowPath) ?? [];
		list.push(diagnostic);
		groups.set(diagnostic.workflowPath, list);
	}
	return Array.from(groups.entries()).map(([workflowPath, items]) => ({ workflowPath, diagnostics: items }));
}
