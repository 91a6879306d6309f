import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG_PATH, renderDefaultConfig } from "../config/load-config.js";
import type { CliIo } from "./io.js";

export const STATE_DIR = ".wfcheck";

export type GitignoreResult = "added" | "present" | "skipped";

export type ConfigFileResult = "written" | "present";

export function ensureGitignore(repoRoot: string): GitignoreResult {
	if (!fs.existsSync(path.join(repoRoot, ".git"))) {
		return "skipped";
	}

	const ignorePath = path.join(repoRoot, ".gitignore");
	const hasIgnoreFile = fs.existsSync(ignorePath);
	const current = hasIgnoreFile ? fs.readFileSync(ignorePath, "utf-8") : "";
	const hasEntry = current.split(/\r?\n/).some((line) => normalizeIgnoreLine(line) === STATE_DIR);
	if (hasEntry) {
		return "present";
	}

	fs.writeFileSync(ignorePath, appendEntry(current));
	return "added";
}

export function ensureConfigFile(repoRoot: string): ConfigFileResult {
	const configPath = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	if (fs.existsSync(configPath)) {
		return "present";
	}
	fs.writeFileSync(configPath, renderDefaultConfig());
	return "written";
}

export function runInit(repoRoot: string, io: CliIo): number {
	const ignored = ensureGitignore(repoRoot);
	if (ignored === "added") {
		io.stdout(`Added '${STATE_DIR}' to .gitignore.\n`);
	} else if (ignored === "present") {
		io.stdout(`'${STATE_DIR}' is already in .gitignore.\n`);
	} else {
		io.stdout("Skipped .gitignore: not a git repository.\n");
	}

	const config = ensureConfigFile(repoRoot);
	io.stdout(
		config === "written" ? `Wrote ${DEFAULT_CONFIG_PATH}.\n` : `${DEFAULT_CONFIG_PATH} already exists.\n`,
	);
	return 0;
}

function normalizeIgnoreLine(line: string): string {
	return line.trim().replace(/^\/+/, "").replace(/\/+$/, "");
}

function appendEntry(current: string): string {
	if (current.trim().length === 0) {
		return `${STATE_DIR}\n`;
	}
	const prefix = current.endsWith("\n") ? current : `${current}\n`;
	return `${prefix}${STATE_DIR}\n`;
}
