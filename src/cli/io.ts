export type CliIo = {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	isTty: boolean;
};

export function processIo(): CliIo {
	return {
		stdout: (text) => {
			process.stdout.write(text);
		},
		stderr: (text) => {
			process.stderr.write(text);
		},
		isTty: Boolean(process.stdout.isTTY),
	};
}

export type VerboseLog = (message: string) => void;

export function createVerboseLog(io: CliIo, enabled: boolean): VerboseLog {
	if (!enabled) {
		return () => {};
	}
	return (message) => io.stderr(`[wfcheck] ${message}\n`);
}

export function errorMessage(error: unknown, fallback: string): string {
	return error instanceof Error ? error.message : fallback;
}
