import process from "node:process";
import { ZodError } from "zod";
import { loadConfig } from "../config/load-config.js";
import type { WfcheckConfig } from "../config/schema.js";
import { discoverWorkflowsSafe } from "../core/discovery.js";
import { type CliOptions, parseArgs, readPackageVersion, renderHelp } from "./args.js";
import { runCheckCommand } from "./check-command.js";
import { runConcurrencyCommand } from "./concurrency-command.js";
import type { CommandContext } from "./context.js";
import { runGraphCommand } from "./graph-command.js";
import { runInit } from "./init.js";
import { type CliIo, createVerboseLog, errorMessage, processIo } from "./io.js";
import { runMatrixCommand } from "./matrix-command.js";

export async function runCli(argv: string[], io: CliIo = processIo(), cwd: string = process.cwd()): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		io.stdout(renderHelp());
		return 0;
	}
	if (args.version) {
		io.stdout(`wfcheck ${readPackageVersion()}\n`);
		return 0;
	}
	if (args.errors?.length) {
		for (const error of args.errors) {
			io.stderr(`${error}\n`);
		}
		io.stderr("Run `wfcheck --help` for usage.\n");
		return 2;
	}
	if (args.unknown?.length) {
		io.stderr(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		io.stderr("Run `wfcheck --help` for usage.\n");
		return 2;
	}

	const repoRoot = cwd;
	if (args.command === "init") {
		return runInit(repoRoot, io);
	}

	const log = createVerboseLog(io, Boolean(args.verbose));
	let config: WfcheckConfig;
	try {
		const loaded = loadConfig(repoRoot);
		config = loaded.config;
		log(loaded.path ? `config: ${loaded.path}` : "config: defaults");
	} catch (error) {
		io.stderr(`Config error: ${describeConfigError(error)}\n`);
		return 2;
	}

	const discovery = discoverWorkflowsSafe(repoRoot, config.workflowsDir);
	log(`discovered ${discovery.workflows.length + discovery.failures.length} workflow file(s) in ${config.workflowsDir}`);

	const ctx: CommandContext = { repoRoot, args, config, io, log, discovery };
	return dispatch(args.command, ctx);
}

function dispatch(command: Exclude<CliOptions["command"], "init">, ctx: CommandContext): Promise<number> {
	switch (command) {
		case "check":
			return runCheckCommand(ctx);
		case "graph":
			return runGraphCommand(ctx);
		case "matrix":
			return runMatrixCommand(ctx);
		case "concurrency":
			return runConcurrencyCommand(ctx);
	}
}

export function describeConfigError(error: unknown): string {
	if (error instanceof ZodError) {
		return error.issues
			.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
			.join("; ");
	}
	return errorMessage(error, "unknown error");
}
