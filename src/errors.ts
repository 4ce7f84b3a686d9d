export type ResolutionErrorReason = 'notFound' | 'outOfOrder';

/** A boundary point of the primary project couldn't be resolved to a commit */
export class ResolutionError extends Error {
	static is(ex: unknown, reason?: ResolutionErrorReason): ex is ResolutionError {
		return ex instanceof ResolutionError && (reason == null || ex.reason === reason);
	}

	constructor(
		public readonly reason: ResolutionErrorReason,
		public readonly revisions: readonly string[],
		public readonly repoPath: string,
	) {
		super(
			reason === 'outOfOrder'
				? `Specified versions are out of order in '${repoPath}': '${revisions[0]}' was committed after '${revisions[1]}'`
				: `Specified version(s) don't exist in '${repoPath}': ${revisions.join(', ')}`,
		);

		this.name = 'ResolutionError';
		Error.captureStackTrace?.(this, new.target);
	}
}

export class ConfigurationError extends Error {
	static is(ex: unknown): ex is ConfigurationError {
		return ex instanceof ConfigurationError;
	}

	constructor(
		message: string,
		public readonly original?: Error,
	) {
		super(message);

		this.name = 'ConfigurationError';
		Error.captureStackTrace?.(this, new.target);
	}
}
