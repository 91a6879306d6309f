import type { Stage } from "../core/graph.js";

const MIN_COLUMN_WIDTH = 16;
const CONNECTOR = "  ──→  ";
const GAP = " ".repeat(CONNECTOR.length);

export function buildDiagramLines(stages: Stage[]): string[] {
	if (stages.length === 0) {
		return ["No jobs."];
	}

	const columns = stages.map((stage) => stage.jobIds);
	const columnWidths = columns.map((column) =>
		Math.max(MIN_COLUMN_WIDTH, ...column.map((item) => item.length)),
	);
	const maxRows = Math.max(...columns.map((column) => column.length), 1);

	const lines: string[] = [];
	for (let row = 0; row < maxRows; row += 1) {
		let line = "";
		for (let col = 0; col < columns.length; col += 1) {
			const text = columns[col][row] ?? "";
			line += padRight(text, columnWidths[col]);
			if (col < columns.length - 1) {
				line += row === 0 ? CONNECTOR : GAP;
			}
		}
		lines.push(line.trimEnd());
	}
	return lines;
}

export function buildStageHeader(stages: Stage[]): string {
	return stages.map((stage) => `stage ${stage.index} (${stage.jobIds.length})`).join(", ");
}

function padRight(value: string, length: number): string {
	if (value.length >= length) {
		return value;
	}
	return value + " ".repeat(length - value.length);
}
