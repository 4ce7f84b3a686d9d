interface RunErrorContext {
	message: string;
	cmd?: string | undefined;
	killed?: boolean | undefined;
	code?: string | number | null | undefined;
	signal?: NodeJS.Signals | null | undefined;
}

export class RunError extends Error {
	static is(ex: unknown): ex is RunError {
		return ex instanceof RunError;
	}

	readonly cmd?: string | undefined;
	readonly killed?: boolean | undefined;
	readonly code?: string | number | undefined;
	readonly signal?: NodeJS.Signals | undefined;
	readonly stdout: string;
	readonly stderr: string;

	constructor(context: RunErrorContext, stdout: string, stderr: string) {
		super(context.message);

		this.cmd = context.cmd;
		this.killed = context.killed;
		this.code = context.code ?? undefined;
		this.signal = context.signal ?? undefined;
		this.stdout = stdout.trim();
		this.stderr = stderr.trim();

		this.name = 'RunError';
		Error.captureStackTrace?.(this, new.target);
	}
}

export class CancelledRunError extends RunError {
	static override is(ex: unknown): ex is CancelledRunError {
		return ex instanceof CancelledRunError;
	}

	constructor(cmd: string, killed: boolean, code?: number | string | undefined, signal: NodeJS.Signals = 'SIGTERM') {
		super(
			{ message: `Operation cancelled; command=${cmd}`, cmd: cmd, killed: killed, code: code, signal: signal },
			'',
			'',
		);

		this.name = 'CancelledRunError';
		Error.captureStackTrace?.(this, new.target);
	}
}
