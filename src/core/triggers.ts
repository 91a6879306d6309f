import { asRecord, asStringList, isRecord } from "../utils/records.js";
import type { Trigger } from "./types.js";

export type RefType = "branch" | "tag";

export type SampleRef = {
	refType: RefType;
	refName: string;
};

type CronField = {
	label: string;
	min: number;
	max: number;
	names?: string[];
};

const CRON_FIELDS: CronField[] = [
	{ label: "minute", min: 0, max: 59 },
	{ label: "hour", min: 0, max: 23 },
	{ label: "day of month", min: 1, max: 31 },
	{
		label: "month",
		min: 1,
		max: 12,
		names: ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"],
	},
	{ label: "day of week", min: 0, max: 6, names: ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"] },
];

export function normalizeTriggers(on: unknown): Trigger[] {
	if (!on) {
		return [];
	}
	if (typeof on === "string" || Array.isArray(on)) {
		return asStringList(on).map((event) => emptyTrigger(event));
	}

	return Object.entries(asRecord(on)).map(([event, config]) => {
		const trigger = emptyTrigger(event);
		if (event === "schedule" && Array.isArray(config)) {
			trigger.crons = config
				.map((entry) => (isRecord(entry) && typeof entry.cron === "string" ? entry.cron : ""))
				.filter(Boolean);
			return trigger;
		}
		const filters = asRecord(config);
		trigger.branches = asStringList(filters.branches);
		trigger.branchesIgnore = asStringList(filters["branches-ignore"]);
		trigger.tags = asStringList(filters.tags);
		trigger.tagsIgnore = asStringList(filters["tags-ignore"]);
		trigger.paths = asStringList(filters.paths);
		return trigger;
	});
}

export function findTrigger(triggers: Trigger[], event: string): Trigger | undefined {
	return triggers.find((trigger) => trigger.event === event);
}

export function matchesFilter(pattern: string, value: string): boolean {
	return globToRegExp(pattern).test(value);
}

export function refMatchesTrigger(trigger: Trigger, refType: RefType, refName: string): boolean {
	const include = refType === "branch" ? trigger.branches : trigger.tags;
	const ignore = refType === "branch" ? trigger.branchesIgnore : trigger.tagsIgnore;
	const otherInclude = refType === "branch" ? trigger.tags : trigger.branches;
	const otherIgnore = refType === "branch" ? trigger.tagsIgnore : trigger.branchesIgnore;

	if (ignore.length > 0) {
		return !ignore.some((pattern) => matchesFilter(pattern, refName));
	}
	if (include.length === 0) {
		// Filtering only the other ref kind excludes this one.
		return otherInclude.length === 0 && otherIgnore.length === 0;
	}

	let matched = false;
	for (const pattern of include) {
		if (pattern.startsWith("!")) {
			if (matchesFilter(pattern.slice(1), refName)) {
				matched = false;
			}
			continue;
		}
		if (matchesFilter(pattern, refName)) {
			matched = true;
		}
	}
	return matched;
}

export function sampleRefs(trigger: Trigger, defaultBranch: string): SampleRef[] {
	const refs: SampleRef[] = [];
	const literalBranches = trigger.branches.filter((pattern) => !pattern.startsWith("!") && !hasGlob(pattern));

	if (trigger.branches.length > 0 || trigger.tags.length === 0) {
		const branches = literalBranches.length > 0 ? literalBranches : [defaultBranch];
		for (const refName of branches) {
			refs.push({ refType: "branch", refName });
		}
	}
	for (const pattern of trigger.tags) {
		if (pattern.startsWith("!")) {
			continue;
		}
		refs.push({ refType: "tag", refName: concretizePattern(pattern) });
	}
	return refs;
}

export function validateCron(expression: string): string | undefined {
	const fields = expression.trim().split(/\s+/).filter(Boolean);
	if (fields.length !== CRON_FIELDS.length) {
		return `expected ${CRON_FIELDS.length} fields, found ${fields.length}`;
	}
	for (let index = 0; index < fields.length; index += 1) {
		const problem = validateCronField(fields[index], CRON_FIELDS[index]);
		if (problem) {
			return problem;
		}
	}
	return undefined;
}

function validateCronField(value: string, field: CronField): string | undefined {
	for (const item of value.split(",")) {
		const [range, step, ...rest] = item.split("/");
		if (rest.length > 0 || range === "") {
			return `invalid ${field.label} "${value}"`;
		}
		if (step !== undefined && !/^\d+$/.test(step)) {
			return `invalid step "${step}" in ${field.label}`;
		}
		if (step !== undefined && Number(step) === 0) {
			return `step must be positive in ${field.label}`;
		}
		if (range === "*") {
			continue;
		}
		const bounds = range.split("-");
		if (bounds.length > 2) {
			return `invalid ${field.label} range "${range}"`;
		}
		const numbers = bounds.map((bound) => cronValue(bound, field));
		for (const [index, parsed] of numbers.entries()) {
			if (parsed === undefined) {
				return `${field.label} value "${bounds[index]}" is not allowed (${field.min}-${field.max})`;
			}
		}
		const [start, end] = numbers;
		if (start !== undefined && end !== undefined && start > end) {
			return `${field.label} range "${range}" is reversed`;
		}
	}
	return undefined;
}

function cronValue(token: string, field: CronField): number | undefined {
	const byName = field.names?.indexOf(token.toUpperCase()) ?? -1;
	if (byName >= 0) {
		return byName + field.min;
	}
	if (!/^\d+$/.test(token)) {
		return undefined;
	}
	const value = Number(token);
	return value >= field.min && value <= field.max ? value : undefined;
}

function emptyTrigger(event: string): Trigger {
	return {
		event,
		branches: [],
		branchesIgnore: [],
		tags: [],
		tagsIgnore: [],
		paths: [],
		crons: [],
	};
}

function hasGlob(pattern: string): boolean {
	return /[*?+[\]]/.test(pattern);
}

function concretizePattern(pattern: string): string {
	return pattern.replace(/\*\*|\*|\[[^\]]*\]/g, "0").replace(/[?+]/g, "");
}

function globToRegExp(pattern: string): RegExp {
	let source = "";
	// `?` and `+` only quantify a literal character or a class.
	let quantifiable = false;
	for (let index = 0; index < pattern.length; index += 1) {
		const char = pattern[index];
		if (char === "*") {
			if (pattern[index + 1] === "*") {
				source += ".*";
				index += 1;
			} else {
				source += "[^/]*";
			}
			quantifiable = false;
			continue;
		}
		if ((char === "?" || char === "+") && quantifiable) {
			source += char;
			quantifiable = false;
			continue;
		}
		if (char === "[") {
			const close = pattern.indexOf("]", index + 1);
			if (close > index) {
				source += pattern.slice(index, close + 1);
				index = close;
				quantifiable = true;
				continue;
			}
		}
		source += char.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
		quantifiable = true;
	}
	return new RegExp(`^${source}$`);
}
