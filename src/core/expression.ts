export type ExpressionValue =
	| string
	| number
	| boolean
	| null
	| ExpressionValue[]
	| { [key: string]: ExpressionValue };

export type ExpressionContext = Record<string, ExpressionValue>;

export type BinaryOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type ExpressionNode =
	| { type: "literal"; value: string | number | boolean | null }
	| { type: "identifier"; name: string }
	| { type: "property"; object: ExpressionNode; name: string }
	| { type: "index"; object: ExpressionNode; index: ExpressionNode }
	| { type: "wildcard"; object: ExpressionNode }
	| { type: "call"; name: string; args: ExpressionNode[] }
	| { type: "not"; operand: ExpressionNode }
	| { type: "compare"; operator: BinaryOperator; left: ExpressionNode; right: ExpressionNode }
	| { type: "logical"; operator: "&&" | "||"; left: ExpressionNode; right: ExpressionNode };

export type ExpressionSpan = {
	body: string;
	start: number;
	end: number;
};

export type NeedsReference = {
	jobId: string;
	property?: string;
	output?: string;
	text: string;
};

export class ExpressionError extends Error {
	constructor(
		message: string,
		readonly offset: number,
	) {
		super(message);
		this.name = "ExpressionError";
	}
}

type TokenKind = "string" | "number" | "identifier" | "punct" | "eof";

type Token = {
	kind: TokenKind;
	text: string;
	value?: string | number;
	offset: number;
};

const PUNCTUATORS = ["==", "!=", "<=", ">=", "&&", "||", "<", ">", "!", "(", ")", "[", "]", ".", ",", "*"];

const STATUS_FUNCTIONS: Record<string, boolean> = {
	success: true,
	always: true,
	failure: false,
	cancelled: false,
};

export function tokenize(source: string): Token[] {
	const tokens: Token[] = [];
	let index = 0;

	while (index < source.length) {
		const char = source[index];
		if (/\s/.test(char)) {
			index += 1;
			continue;
		}

		if (char === "'") {
			const start = index;
			let value = "";
			index += 1;
			for (;;) {
				if (index >= source.length) {
					throw new ExpressionError("Unterminated string literal", start);
				}
				if (source[index] === "'") {
					if (source[index + 1] === "'") {
						value += "'";
						index += 2;
						continue;
					}
					index += 1;
					break;
				}
				value += source[index];
				index += 1;
			}
			tokens.push({ kind: "string", text: source.slice(start, index), value, offset: start });
			continue;
		}

		const numberMatch = /^(?:-?0x[0-9a-fA-F]+|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/.exec(source.slice(index));
		if (numberMatch && (char !== "-" || /\d/.test(source[index + 1] ?? ""))) {
			const text = numberMatch[0];
			tokens.push({ kind: "number", text, value: Number(text), offset: index });
			index += text.length;
			continue;
		}

		const identMatch = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(source.slice(index));
		if (identMatch) {
			tokens.push({ kind: "identifier", text: identMatch[0], offset: index });
			index += identMatch[0].length;
			continue;
		}

		const punct = PUNCTUATORS.find((candidate) => source.startsWith(candidate, index));
		if (punct) {
			tokens.push({ kind: "punct", text: punct, offset: index });
			index += punct.length;
			continue;
		}

		throw new ExpressionError(`Unexpected character "${char}"`, index);
	}

	tokens.push({ kind: "eof", text: "", offset: source.length });
	return tokens;
}

export function parseExpression(source: string): ExpressionNode {
	const parser = new ExpressionParser(tokenize(source));
	return parser.parse();
}

class ExpressionParser {
	private position = 0;

	constructor(private readonly tokens: Token[]) {}

	parse(): ExpressionNode {
		if (this.peek().kind === "eof") {
			throw new ExpressionError("Empty expression", 0);
		}
		const node = this.parseOr();
		const trailing = this.peek();
		if (trailing.kind !== "eof") {
			throw new ExpressionError(`Unexpected token "${trailing.text}"`, trailing.offset);
		}
		return node;
	}

	private parseOr(): ExpressionNode {
		let left = this.parseAnd();
		while (this.matchPunct("||")) {
			left = { type: "logical", operator: "||", left, right: this.parseAnd() };
		}
		return left;
	}

	private parseAnd(): ExpressionNode {
		let left = this.parseEquality();
		while (this.matchPunct("&&")) {
			left = { type: "logical", operator: "&&", left, right: this.parseEquality() };
		}
		return left;
	}

	private parseEquality(): ExpressionNode {
		let left = this.parseRelational();
		for (;;) {
			const operator = this.matchOperator(["==", "!="]);
			if (!operator) {
				return left;
			}
			left = { type: "compare", operator, left, right: this.parseRelational() };
		}
	}

	private parseRelational(): ExpressionNode {
		let left = this.parseUnary();
		for (;;) {
			const operator = this.matchOperator(["<", "<=", ">", ">="]);
			if (!operator) {
				return left;
			}
			left = { type: "compare", operator, left, right: this.parseUnary() };
		}
	}

	private parseUnary(): ExpressionNode {
		if (this.matchPunct("!")) {
			return { type: "not", operand: this.parseUnary() };
		}
		return this.parsePostfix(this.parsePrimary());
	}

	private parsePostfix(base: ExpressionNode): ExpressionNode {
		let node = base;
		for (;;) {
			if (this.matchPunct(".")) {
				if (this.matchPunct("*")) {
					node = { type: "wildcard", object: node };
					continue;
				}
				const name = this.next();
				if (name.kind !== "identifier" && name.kind !== "number") {
					throw new ExpressionError(`Expected property name after "."`, name.offset);
				}
				node = { type: "property", object: node, name: name.text };
				continue;
			}
			if (this.matchPunct("[")) {
				if (this.matchPunct("*")) {
					node = { type: "wildcard", object: node };
				} else {
					node = { type: "index", object: node, index: this.parseOr() };
				}
				this.expectPunct("]");
				continue;
			}
			return node;
		}
	}

	private parsePrimary(): ExpressionNode {
		const token = this.next();
		switch (token.kind) {
			case "string":
				return { type: "literal", value: String(token.value ?? "") };
			case "number":
				return { type: "literal", value: Number(token.value) };
			case "identifier": {
				const lowered = token.text.toLowerCase();
				if (lowered === "true" || lowered === "false") {
					return { type: "literal", value: lowered === "true" };
				}
				if (lowered === "null") {
					return { type: "literal", value: null };
				}
				if (this.matchPunct("(")) {
					return { type: "call", name: token.text, args: this.parseArguments() };
				}
				return { type: "identifier", name: token.text };
			}
			case "punct":
				if (token.text === "(") {
					const inner = this.parseOr();
					this.expectPunct(")");
					return inner;
				}
				throw new ExpressionError(`Unexpected token "${token.text}"`, token.offset);
			default:
				throw new ExpressionError("Unexpected end of expression", token.offset);
		}
	}

	private parseArguments(): ExpressionNode[] {
		const args: ExpressionNode[] = [];
		if (this.matchPunct(")")) {
			return args;
		}
		for (;;) {
			args.push(this.parseOr());
			if (this.matchPunct(")")) {
				return args;
			}
			this.expectPunct(",");
		}
	}

	private peek(): Token {
		return this.tokens[this.position] ?? this.tokens[this.tokens.length - 1];
	}

	private next(): Token {
		const token = this.peek();
		if (token.kind !== "eof") {
			this.position += 1;
		}
		return token;
	}

	private matchPunct(text: string): boolean {
		const token = this.peek();
		if (token.kind === "punct" && token.text === text) {
			this.position += 1;
			return true;
		}
		return false;
	}

	private matchOperator<T extends BinaryOperator>(operators: T[]): T | undefined {
		const token = this.peek();
		if (token.kind !== "punct") {
			return undefined;
		}
		const operator = operators.find((candidate) => candidate === token.text);
		if (operator) {
			this.position += 1;
		}
		return operator;
	}

	private expectPunct(text: string): void {
		const token = this.peek();
		if (!this.matchPunct(text)) {
			throw new ExpressionError(`Expected "${text}" but found "${token.text || "end of expression"}"`, token.offset);
		}
	}
}

export function evaluate(node: ExpressionNode, context: ExpressionContext): ExpressionValue {
	switch (node.type) {
		case "literal":
			return node.value;
		case "identifier":
			return lookupProperty(context, node.name);
		case "property":
			return accessProperty(evaluate(node.object, context), node.name);
		case "index": {
			const target = evaluate(node.object, context);
			const key = evaluate(node.index, context);
			if (Array.isArray(target) && typeof key === "number") {
				return target[Math.trunc(key)] ?? null;
			}
			return accessProperty(target, toDisplayString(key));
		}
		case "wildcard": {
			const target = evaluate(node.object, context);
			if (Array.isArray(target)) {
				return target;
			}
			return isObjectValue(target) ? Object.values(target) : [];
		}
		case "call":
			return callFunction(
				node.name,
				node.args.map((arg) => evaluate(arg, context)),
			);
		case "not":
			return !isTruthy(evaluate(node.operand, context));
		case "compare":
			return compare(node.operator, evaluate(node.left, context), evaluate(node.right, context));
		case "logical": {
			const left = evaluate(node.left, context);
			if (node.operator === "&&") {
				return isTruthy(left) ? evaluate(node.right, context) : left;
			}
			return isTruthy(left) ? left : evaluate(node.right, context);
		}
	}
}

export function evaluateExpression(source: string, context: ExpressionContext): ExpressionValue {
	return evaluate(parseExpression(source), context);
}

export function isTruthy(value: ExpressionValue): boolean {
	if (value === null || value === false || value === "") {
		return false;
	}
	if (typeof value === "number") {
		return value !== 0 && !Number.isNaN(value);
	}
	return true;
}

export function toDisplayString(value: ExpressionValue): string {
	if (value === null) {
		return "";
	}
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	return JSON.stringify(value);
}

export function extractExpressions(text: string): ExpressionSpan[] {
	const spans: ExpressionSpan[] = [];
	let cursor = 0;
	for (;;) {
		const start = text.indexOf("${{", cursor);
		if (start < 0) {
			return spans;
		}
		let index = start + 3;
		let inString = false;
		let end = -1;
		while (index < text.length) {
			const char = text[index];
			if (char === "'") {
				inString = !inString;
			} else if (!inString && text.startsWith("}}", index)) {
				end = index + 2;
				break;
			}
			index += 1;
		}
		if (end < 0) {
			throw new ExpressionError("Unterminated ${{ expression", start);
		}
		spans.push({ body: text.slice(start + 3, end - 2).trim(), start, end });
		cursor = end;
	}
}

export function conditionExpressions(condition: string): string[] {
	const trimmed = condition.trim();
	if (!trimmed.includes("${{")) {
		return trimmed.length > 0 ? [trimmed] : [];
	}
	return extractExpressions(trimmed).map((span) => span.body);
}

export function interpolate(template: string, context: ExpressionContext): string {
	const spans = extractExpressions(template);
	let output = "";
	let cursor = 0;
	for (const span of spans) {
		output += template.slice(cursor, span.start);
		output += toDisplayString(evaluateExpression(span.body, context));
		cursor = span.end;
	}
	return output + template.slice(cursor);
}

export function isWholeExpression(text: string): boolean {
	const trimmed = text.trim();
	const spans = extractExpressions(trimmed);
	return spans.length === 1 && spans[0].start === 0 && spans[0].end === trimmed.length;
}

export function collectNeedsReferences(node: ExpressionNode): NeedsReference[] {
	const references: NeedsReference[] = [];

	const visit = (current: ExpressionNode): void => {
		const chain = propertyChain(current);
		if (chain) {
			if (chain[0].toLowerCase() === "needs" && chain.length >= 2) {
				references.push({
					jobId: chain[1],
					property: chain[2],
					output: chain[2] === "outputs" ? chain[3] : undefined,
					text: chain.join("."),
				});
			}
			return;
		}
		switch (current.type) {
			case "property":
			case "wildcard":
				visit(current.object);
				return;
			case "index":
				visit(current.object);
				visit(current.index);
				return;
			case "call":
				current.args.forEach(visit);
				return;
			case "not":
				visit(current.operand);
				return;
			case "compare":
			case "logical":
				visit(current.left);
				visit(current.right);
				return;
			default:
				return;
		}
	};

	visit(node);
	return references;
}

function propertyChain(node: ExpressionNode): string[] | undefined {
	switch (node.type) {
		case "identifier":
			return [node.name];
		case "property": {
			const base = propertyChain(node.object);
			return base ? [...base, node.name] : undefined;
		}
		case "index": {
			if (node.index.type !== "literal" || typeof node.index.value !== "string") {
				return undefined;
			}
			const base = propertyChain(node.object);
			return base ? [...base, node.index.value] : undefined;
		}
		default:
			return undefined;
	}
}

function isObjectValue(value: ExpressionValue): value is { [key: string]: ExpressionValue } {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function lookupProperty(target: { [key: string]: ExpressionValue }, name: string): ExpressionValue {
	if (name in target) {
		return target[name];
	}
	const lowered = name.toLowerCase();
	const match = Object.keys(target).find((key) => key.toLowerCase() === lowered);
	return match === undefined ? null : target[match];
}

function accessProperty(target: ExpressionValue, name: string): ExpressionValue {
	if (Array.isArray(target)) {
		return target.map((item) => accessProperty(item, name));
	}
	if (!isObjectValue(target)) {
		return null;
	}
	return lookupProperty(target, name);
}

function toNumber(value: ExpressionValue): number {
	if (value === null) {
		return 0;
	}
	if (typeof value === "boolean") {
		return value ? 1 : 0;
	}
	if (typeof value === "number") {
		return value;
	}
	if (typeof value === "string") {
		const trimmed = value.trim();
		return trimmed === "" ? 0 : Number(trimmed);
	}
	return Number.NaN;
}

function compare(operator: BinaryOperator, left: ExpressionValue, right: ExpressionValue): boolean {
	if (typeof left === "object" && left !== null) {
		return operator === "==" ? left === right : operator === "!=" ? left !== right : false;
	}
	if (typeof right === "object" && right !== null) {
		return operator === "!=";
	}

	if (typeof left === "string" && typeof right === "string") {
		const a = left.toUpperCase();
		const b = right.toUpperCase();
		return compareOrdered(operator, a < b ? -1 : a > b ? 1 : 0);
	}
	const a = toNumber(left);
	const b = toNumber(right);
	if (Number.isNaN(a) || Number.isNaN(b)) {
		return operator === "!=";
	}
	return compareOrdered(operator, a < b ? -1 : a > b ? 1 : 0);
}

function compareOrdered(operator: BinaryOperator, order: number): boolean {
	switch (operator) {
		case "==":
			return order === 0;
		case "!=":
			return order !== 0;
		case "<":
			return order < 0;
		case "<=":
			return order <= 0;
		case ">":
			return order > 0;
		case ">=":
			return order >= 0;
	}
}

function callFunction(name: string, args: ExpressionValue[]): ExpressionValue {
	const lowered = name.toLowerCase();
	if (lowered in STATUS_FUNCTIONS) {
		expectArity(name, args, 0, 0);
		return STATUS_FUNCTIONS[lowered];
	}

	switch (lowered) {
		case "contains": {
			expectArity(name, args, 2, 2);
			const [search, item] = args;
			if (Array.isArray(search)) {
				return search.some((element) => compare("==", element, item));
			}
			return toDisplayString(search).toUpperCase().includes(toDisplayString(item).toUpperCase());
		}
		case "startswith":
			expectArity(name, args, 2, 2);
			return toDisplayString(args[0]).toUpperCase().startsWith(toDisplayString(args[1]).toUpperCase());
		case "endswith":
			expectArity(name, args, 2, 2);
			return toDisplayString(args[0]).toUpperCase().endsWith(toDisplayString(args[1]).toUpperCase());
		case "format": {
			expectArity(name, args, 1, Number.POSITIVE_INFINITY);
			const [template, ...values] = args;
			return formatString(toDisplayString(template), values);
		}
		case "join": {
			expectArity(name, args, 1, 2);
			const separator = args.length > 1 ? toDisplayString(args[1]) : ",";
			const [items] = args;
			return Array.isArray(items) ? items.map(toDisplayString).join(separator) : toDisplayString(items);
		}
		case "tojson":
			expectArity(name, args, 1, 1);
			return JSON.stringify(args[0], null, 2);
		case "fromjson":
			expectArity(name, args, 1, 1);
			return parseJsonValue(toDisplayString(args[0]));
		case "hashfiles":
			// File contents are not available statically.
			return "";
		default:
			throw new ExpressionError(`Unknown function "${name}"`, 0);
	}
}

function expectArity(name: string, args: ExpressionValue[], min: number, max: number): void {
	if (args.length < min || args.length > max) {
		throw new ExpressionError(`Function "${name}" called with ${args.length} argument(s)`, 0);
	}
}

function formatString(template: string, values: ExpressionValue[]): string {
	return template.replace(/\{\{|\}\}|\{(\d+)\}/g, (match, index: string | undefined) => {
		if (match === "{{") {
			return "{";
		}
		if (match === "}}") {
			return "}";
		}
		const position = Number(index);
		if (position >= values.length) {
			throw new ExpressionError(`format() is missing argument {${position}}`, 0);
		}
		return toDisplayString(values[position]);
	});
}

function parseJsonValue(text: string): ExpressionValue {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		const detail = error instanceof Error ? error.message : "invalid JSON";
		throw new ExpressionError(`fromJSON(): ${detail}`, 0);
	}
	return toExpressionValue(parsed);
}

export function toExpressionValue(value: unknown): ExpressionValue {
	if (value === null || value === undefined) {
		return null;
	}
	if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
		return value;
	}
	if (Array.isArray(value)) {
		return value.map((item) => toExpressionValue(item));
	}
	if (typeof value === "object") {
		const result: { [key: string]: ExpressionValue } = {};
		for (const [key, item] of Object.entries(value)) {
			result[key] = toExpressionValue(item);
		}
		return result;
	}
	return null;
}
