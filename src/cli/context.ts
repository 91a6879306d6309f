import type { WfcheckConfig } from "../config/schema.js";
import type { ConcurrencyOptions } from "../core/concurrency.js";
import type { DiscoveryResult } from "../core/discovery.js";
import type { CliOptions } from "./args.js";
import type { CliIo, VerboseLog } from "./io.js";

export type CommandContext = {
	repoRoot: string;
	args: CliOptions;
	config: WfcheckConfig;
	io: CliIo;
	log: VerboseLog;
	discovery: DiscoveryResult;
};

export function concurrencyOptions(config: WfcheckConfig, events?: string[]): ConcurrencyOptions {
	return {
		defaultBranch: config.defaultBranch,
		events: events ?? config.concurrency.events,
		sha: config.concurrency.sha,
	};
}
