export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): UnknownRecord {
	return isRecord(value) ? value : {};
}

export function asOptionalString(value: unknown): string | undefined {
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	return undefined;
}

export function asStringList(value: unknown): string[] {
	if (value === undefined || value === null) {
		return [];
	}
	if (Array.isArray(value)) {
		return value.map((item) => asOptionalString(item)).filter((item): item is string => item !== undefined);
	}
	const single = asOptionalString(value);
	return single === undefined ? [] : [single];
}

export function asStringRecord(value: unknown): Record<string, string> | undefined {
	if (!isRecord(value)) {
		return undefined;
	}
	const result: Record<string, string> = {};
	for (const [key, item] of Object.entries(value)) {
		result[key] = asOptionalString(item) ?? "";
	}
	return result;
}
