export interface GitCommandContext {
	readonly repoPath: string | undefined;
	readonly args: readonly string[];
}

export abstract class GitCommandError<Details extends { gitCommand?: GitCommandContext }> extends Error {
	static is(ex: unknown): ex is GitCommandError<{ gitCommand?: GitCommandContext }> {
		return ex instanceof GitCommandError;
	}

	private _details: Details;
	get details(): Details {
		return this._details;
	}

	readonly original?: Error;

	constructor(message: string, details: Details, original: Error | undefined) {
		super(message);
		this.original = original;
		this._details = details;
		this.message = this.buildErrorMessage(details);
		Error.captureStackTrace?.(this, new.target);
	}

	protected abstract buildErrorMessage(details: Details): string;

	update(changes: Partial<Details>): this {
		this._details = { ...this._details, ...changes };
		this.message = this.buildErrorMessage(this._details);
		return this;
	}
}

export type ToolInvocationErrorReason = 'cancelled' | 'noCommits' | 'notARepository' | 'unknownRevision' | 'other';
interface ToolInvocationErrorDetails {
	reason?: ToolInvocationErrorReason;
	exitCode?: string | number;
	stderr?: string;
	gitCommand?: GitCommandContext;
}

/** Raised when a git command fails in a way the caller didn't ask to tolerate */
export class ToolInvocationError extends GitCommandError<ToolInvocationErrorDetails> {
	static override is(ex: unknown, reason?: ToolInvocationErrorReason): ex is ToolInvocationError {
		return ex instanceof ToolInvocationError && (reason == null || ex.details.reason === reason);
	}

	constructor(details: ToolInvocationErrorDetails, original?: Error) {
		super('Unable to run git', details, original);
		this.name = 'ToolInvocationError';
	}

	protected override buildErrorMessage(details: ToolInvocationErrorDetails): string {
		const command =
			details.gitCommand != null
				? `'git ${details.gitCommand.args.join(' ')}'${
						details.gitCommand.repoPath != null ? ` in '${details.gitCommand.repoPath}'` : ''
					}`
				: 'git';

		let message;
		switch (details.reason) {
			case 'cancelled':
				message = `Cancelled ${command}`;
				break;
			case 'noCommits':
				message = `Unable to run ${command} as the repository has no commits`;
				break;
			case 'notARepository':
				message = `Unable to run ${command} as it is not a git repository`;
				break;
			case 'unknownRevision':
				message = `Unable to run ${command} as a revision could not be found`;
				break;
			default:
				message = `Unable to run ${command}${details.exitCode != null ? ` (exit code ${details.exitCode})` : ''}`;
				break;
		}

		return details.stderr ? `${message}: ${details.stderr}` : message;
	}
}
