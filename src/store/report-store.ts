import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { CheckSummary } from "../checks/run-checks.js";
import type { Diagnostic } from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const REPORT_SCHEMA_VERSION = 1;

export type CheckReport = {
	schemaVersion: number;
	id: string;
	createdAt: string;
	workflows: string[];
	summary: CheckSummary;
	diagnostics: Diagnostic[];
};

export class ReportStore {
	constructor(private readonly baseDir: string) {}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	createReportDir(reportId: string): string {
		this.ensureBaseDir();
		const reportDir = ensureWithinBase(this.baseDir, sanitizePathSegment(reportId, "report"), "report id");
		fs.mkdirSync(reportDir, { recursive: true });
		return reportDir;
	}

	writeReport(report: CheckReport): string {
		const reportDir = this.createReportDir(report.id);
		const recordPath = path.join(reportDir, "report.json");
		fs.writeFileSync(recordPath, JSON.stringify(report, null, 2));
		return recordPath;
	}

	readReport(reportId: string): CheckReport {
		const reportDir = ensureWithinBase(this.baseDir, sanitizePathSegment(reportId, "report"), "report id");
		const raw = fs.readFileSync(path.join(reportDir, "report.json"), "utf-8");
		return JSON.parse(raw) as CheckReport;
	}
}

export function createReport(
	workflows: string[],
	diagnostics: Diagnostic[],
	summary: CheckSummary,
	now: Date = new Date(),
): CheckReport {
	return {
		schemaVersion: REPORT_SCHEMA_VERSION,
		id: createReportId(now),
		createdAt: now.toISOString(),
		workflows,
		summary,
		diagnostics,
	};
}

export function createReportId(now: Date = new Date()): string {
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}
