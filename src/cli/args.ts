import fs from "node:fs";

export const COMMANDS = ["check", "graph", "matrix", "concurrency", "init"] as const;

export type CliCommand = (typeof COMMANDS)[number];

export type CliOptions = {
	command: CliCommand;
	workflow?: string;
	jobs?: string[];
	event?: string;
	json?: boolean;
	strict?: boolean;
	noReport?: boolean;
	verbose?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "check", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args[0];
		if (isCommand(command)) {
			options.command = command;
		} else {
			options.errors?.push(`Unknown command: ${command}`);
		}
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--workflow":
				options.workflow = takeValue("--workflow", args, options);
				break;
			case "--job":
				{
					const value = takeValue("--job", args, options);
					if (value) {
						options.jobs = [...(options.jobs ?? []), ...value.split(",").filter(Boolean)];
					}
				}
				break;
			case "--event":
				options.event = takeValue("--event", args, options);
				break;
			case "--json":
				options.json = true;
				break;
			case "--strict":
				options.strict = true;
				break;
			case "--no-report":
				options.noReport = true;
				break;
			case "--verbose":
				options.verbose = true;
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	return options;
}

export function renderHelp(): string {
	return [
		"wfcheck <command> [options]",
		"",
		"Commands:",
		"  check                 Check workflows (default)",
		"  graph                 Print the job graph of a workflow",
		"  matrix                Print expanded test shards of a workflow",
		"  concurrency           Print evaluated concurrency groups per trigger",
		"  init                  Add .wfcheck to .gitignore and write .wfcheck.yml",
		"",
		"Options:",
		"  --workflow <file>     Workflow file name or id",
		"  --job <ids>           Comma-separated job ids (matrix)",
		"  --event <name>        Trigger event (concurrency)",
		"  --json                Print JSON",
		"  --strict              Treat warnings as errors",
		"  --no-report           Do not write a report",
		"  --verbose             Print progress to stderr",
		"  -h, --help            Show help",
		"  -v, --version         Show version",
		"",
	].join("\n");
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "0.0.0";
}

function isCommand(value: string): value is CliCommand {
	return COMMANDS.some((command) => command === value);
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
