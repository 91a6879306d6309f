export type SourcePosition = {
	line: number;
	column: number;
};

export type Workflow = {
	id: string;
	name: string;
	path: string;
	events: string[];
	triggers: Trigger[];
	concurrency?: ConcurrencyPolicy;
	callInterface?: CallInterface;
	jobs: Job[];
	duplicateJobIds: DuplicateKey[];
};

export type DuplicateKey = {
	id: string;
	position: SourcePosition;
};

export type Job = {
	id: string;
	name: string;
	needs: string[];
	uses?: string;
	with: Record<string, unknown>;
	outputs: Record<string, string>;
	runsOn?: string;
	steps: Step[];
	if?: string;
	strategy?: MatrixStrategy;
	env?: Record<string, string>;
	position?: SourcePosition;
};

export type Step = {
	id: string;
	name: string;
	uses?: string;
	run?: string;
	if?: string;
	env?: Record<string, string>;
	with?: Record<string, unknown>;
};

export type MatrixStrategy = {
	/** Mapping of matrix axes, or a whole-expression such as `${{ fromJSON(inputs.test-matrix) }}`. */
	matrix: Record<string, unknown> | string;
};

export type Trigger = {
	event: string;
	branches: string[];
	branchesIgnore: string[];
	tags: string[];
	tagsIgnore: string[];
	paths: string[];
	crons: string[];
};

export type ConcurrencyPolicy = {
	group: string;
	cancelInProgress: boolean | string;
	position?: SourcePosition;
};

export type CallInput = {
	name: string;
	type: "string" | "number" | "boolean" | string;
	required: boolean;
	hasDefault: boolean;
};

export type CallInterface = {
	inputs: Record<string, CallInput>;
	outputs: string[];
};

export type TestMatrixEntry = {
	config: string;
	shard: number;
	numShards: number;
	runner?: string;
	extra: Record<string, unknown>;
};

export type TestMatrix =
	| { kind: "literal"; entries: TestMatrixEntry[]; problems: string[] }
	| { kind: "reference"; jobId: string; output: string; expression: string }
	| { kind: "expression"; expression: string }
	| { kind: "invalid"; reason: string };

export type PlannedShard = {
	jobId: string;
	sourceJobId: string;
	config: string;
	shard: number;
	numShards: number;
	runner?: string;
};

export type Severity = "error" | "warning";

export type Diagnostic = {
	ruleId: string;
	severity: Severity;
	message: string;
	workflowPath: string;
	jobId?: string;
	line?: number;
	column?: number;
};
