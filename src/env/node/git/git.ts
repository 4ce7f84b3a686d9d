import * as process from 'process';
import type { GitExecOptions, GitResult } from '../../../git/execTypes.js';
import type { ToolInvocationErrorReason } from '../../../git/errors.js';
import { ToolInvocationError } from '../../../git/errors.js';
import { Logger } from '../../../system/logger.js';
import { slowCallWarningThreshold } from '../../../system/logger.constants.js';
import { getLoggableScopeBlockOverride } from '../../../system/logger.scope.js';
import { getDurationMilliseconds } from '../../../system/string.js';
import type { GitLocation } from './locator.js';
import { getEncoding, run } from './shell.js';
import { CancelledRunError, RunError } from './shell.errors.js';

const emptyArray: readonly string[] = Object.freeze([]);

export const gitLogDefaultConfigs = Object.freeze(['-c', 'log.showSignature=false']);

export const GitWarnings = {
	notARepository: /Not a git repository/i,
	noCommits: /does not have any commits/i,
	unknownRevision:
		/ambiguous argument '.*?': unknown revision or path not in the working tree|bad revision '.*?'|not stored as a remote-tracking branch/i,
};

export function getErrorReason(ex: Error): ToolInvocationErrorReason {
	if (CancelledRunError.is(ex)) return 'cancelled';

	const msg = RunError.is(ex) && ex.stderr ? ex.stderr : ex.message;
	if (GitWarnings.notARepository.test(msg)) return 'notARepository';
	if (GitWarnings.noCommits.test(msg)) return 'noCommits';
	if (GitWarnings.unknownRevision.test(msg)) return 'unknownRevision';
	return 'other';
}

export class Git {
	private _gitLocation: GitLocation | undefined;
	private _gitLocationPromise: Promise<GitLocation> | undefined;

	constructor(
		private readonly locator: () => Promise<GitLocation>,
		private readonly options?: {
			/** Encoding of git's output; anything other than utf8 is decoded with iconv-lite */
			encoding?: string;
			env?: NodeJS.ProcessEnv;
		},
	) {}

	private async getLocation(): Promise<GitLocation> {
		if (this._gitLocation == null) {
			this._gitLocationPromise ??= this.locator();
			this._gitLocation = await this._gitLocationPromise;
		}
		return this._gitLocation;
	}

	async path(): Promise<string> {
		return (await this.getLocation()).path;
	}

	async version(): Promise<string> {
		return (await this.getLocation()).version;
	}

	/**
	 * Runs `git` with the given arguments.
	 *
	 * Failures reject with a {@link ToolInvocationError} whose reason is derived from git's error output.
	 */
	async exec(options: GitExecOptions, ...args: (string | undefined)[]): Promise<GitResult> {
		const start = process.hrtime();

		const { configs, expectedErrors, ...opts } = options;
		const gitArgs = args.filter((a): a is string => a != null);

		const gitCommand = `[${opts.cwd ?? ''}] git ${gitArgs.join(' ')}`;

		let exception: Error | undefined;
		let expected = false;
		try {
			const stdout = await run(
				await this.path(),
				['-c', 'core.quotepath=false', '-c', 'color.ui=false', ...(configs ?? emptyArray), ...gitArgs],
				getEncoding(this.options?.encoding),
				{
					...opts,
					env: {
						...process.env,
						...this.options?.env,
						...opts.env,
						GIT_TERMINAL_PROMPT: '0',
						LC_ALL: 'C',
					},
				},
			);
			return { exitCode: 0, stdout: stdout };
		} catch (ex) {
			const error = ex instanceof Error ? ex : new Error(String(ex));
			exception = error;

			const reason = getErrorReason(error);
			expected = expectedErrors?.includes(reason) ?? false;

			throw new ToolInvocationError(
				{
					reason: reason,
					exitCode: RunError.is(error) ? error.code : undefined,
					stderr: RunError.is(error) ? error.stderr : error.message,
					gitCommand: { repoPath: opts.cwd, args: gitArgs },
				},
				error,
			);
		} finally {
			logGitCommand(gitCommand, exception, getDurationMilliseconds(start), expected);
		}
	}
}

/** Logs a finished git command; failures the caller expects are logged at debug level instead of as errors */
export function logGitCommand(command: string, ex: Error | undefined, duration: number, expected: boolean = false): void {
	const slow = duration > slowCallWarningThreshold;
	const status = slow ? ' (slow)' : '';

	if (ex != null) {
		if (expected) {
			Logger.debug(`${getLoggableScopeBlockOverride('GIT', `${duration}ms`)} ${command} • failed as expected`);
			return;
		}

		Logger.error(
			undefined,
			`${getLoggableScopeBlockOverride('GIT')} ${command} • FAILED${status} [${duration}ms]\n${ex.message}`,
		);
	} else if (slow) {
		Logger.warn(`${getLoggableScopeBlockOverride('GIT', `*${duration}ms`)} ${command} [*${duration}ms]`);
	} else {
		Logger.debug(`${getLoggableScopeBlockOverride('GIT', `${duration}ms`)} ${command}`);
	}
}
