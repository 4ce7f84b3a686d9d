import type { ToolInvocationErrorReason } from './errors.js';

export type GitResult = {
	readonly exitCode: number;
	readonly stdout: string;
};

export interface GitExecOptions {
	configs?: readonly string[];
	/** Failures with these reasons are an expected outcome: still thrown, but only logged at debug level */
	expectedErrors?: readonly ToolInvocationErrorReason[];

	// Below options comes from RunOptions
	cwd?: string;
	readonly env?: NodeJS.ProcessEnv;
	readonly maxBuffer?: number;
	readonly signal?: AbortSignal;
}
