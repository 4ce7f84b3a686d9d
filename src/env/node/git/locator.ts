import * as process from 'process';
import { Logger } from '../../../system/logger.js';
import { getDurationMilliseconds } from '../../../system/string.js';
import { findExecutable, run } from './shell.js';

export class UnableToFindGitError extends Error {
	static is(ex: unknown): ex is UnableToFindGitError {
		return ex instanceof UnableToFindGitError;
	}

	constructor(
		public readonly path: string,
		public readonly original?: Error,
	) {
		super(`Unable to find git at '${path}'${original != null ? `: ${original.message}` : ''}`);

		Error.captureStackTrace?.(this, new.target);
	}
}

export interface GitLocation {
	path: string;
	version: string;
}

export async function findGitPath(path: string | null | undefined): Promise<GitLocation> {
	const start = process.hrtime();

	path = findExecutable(path || 'git');

	let version;
	try {
		version = await run(path, ['--version'], 'utf8');
	} catch (ex) {
		throw new UnableToFindGitError(path, ex instanceof Error ? ex : undefined);
	}

	const parsed = version
		.trim()
		.replace(/^git version /, '')
		.trim();

	Logger.debug(`findGitPath(${path}) • Found ${parsed} [${getDurationMilliseconds(start)}ms]`);

	return {
		path: path,
		version: parsed,
	};
}
