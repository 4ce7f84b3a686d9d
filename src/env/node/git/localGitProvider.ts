import { dirname } from 'path';
import { ToolInvocationError } from '../../../git/errors.js';
import type { GitHistoryProvider, GitRepositoryMirrorProvider, GitTimestamp } from '../../../git/gitProvider.js';
import type { GitShortLog } from '../../../git/models/shortlog.js';
import { parseShortlog } from '../../../git/parsers/shortlogParser.js';
import type { GitRevisionRange } from '../../../git/utils/revision.utils.js';
import { formatGitDate } from '../../../system/date.js';
import { Logger } from '../../../system/logger.js';
import type { Git } from './git.js';
import { gitLogDefaultConfigs } from './git.js';
import { fsExists } from './shell.js';

export class LocalGitHistoryProvider implements GitHistoryProvider, GitRepositoryMirrorProvider {
	constructor(
		private readonly git: Git,
		private readonly options?: {
			/** Aborts any running git command, e.g. when the run as a whole times out */
			signal?: AbortSignal;
		},
	) {}

	async getCommitTime(repoPath: string, rev: string): Promise<GitTimestamp | undefined> {
		try {
			const result = await this.git.exec(
				{
					cwd: repoPath,
					configs: gitLogDefaultConfigs,
					expectedErrors: ['unknownRevision'],
					signal: this.options?.signal,
				},
				'log',
				'-1',
				'--format=%ct',
				rev,
				'--',
			);

			const timestamp = parseInt(result.stdout.trim(), 10);
			return isNaN(timestamp) ? undefined : timestamp;
		} catch (ex) {
			if (ToolInvocationError.is(ex, 'unknownRevision')) {
				Logger.debug(`getCommitTime(${repoPath}, ${rev}) • revision not found`);
				return undefined;
			}
			throw ex;
		}
	}

	async getRevisionBefore(repoPath: string, ref: string, timestamp: GitTimestamp): Promise<string | undefined> {
		const result = await this.git.exec(
			{ cwd: repoPath, configs: gitLogDefaultConfigs, signal: this.options?.signal },
			'log',
			'-1',
			'--format=%H',
			`--before=${formatGitDate(timestamp)}`,
			ref,
			'--',
		);

		const sha = result.stdout.trim();
		return sha || undefined;
	}

	async getShortlog(repoPath: string, range: GitRevisionRange): Promise<GitShortLog> {
		const result = await this.git.exec(
			{ cwd: repoPath, configs: gitLogDefaultConfigs, signal: this.options?.signal },
			'shortlog',
			'-s',
			range,
			'--',
		);
		return parseShortlog(result.stdout, repoPath);
	}

	async getCommitCount(repoPath: string, range: GitRevisionRange): Promise<number> {
		const result = await this.git.exec(
			{ cwd: repoPath, signal: this.options?.signal },
			'rev-list',
			'--count',
			range,
			'--',
		);

		const count = parseInt(result.stdout.trim(), 10);
		if (isNaN(count)) {
			throw new ToolInvocationError({
				reason: 'other',
				stderr: `Unexpected output '${result.stdout.trim()}'`,
				gitCommand: { repoPath: repoPath, args: ['rev-list', '--count', range, '--'] },
			});
		}
		return count;
	}

	async ensureMirror(repoPath: string, cloneUrl: string, remote: string | undefined): Promise<'cloned' | 'fetched'> {
		if (!(await fsExists(repoPath))) {
			await this.git.exec(
				{ cwd: dirname(repoPath), signal: this.options?.signal },
				'clone',
				...(remote != null ? ['--origin', remote] : []),
				'--',
				cloneUrl,
				repoPath,
			);
			return 'cloned';
		}

		await this.git.exec({ cwd: repoPath, signal: this.options?.signal }, 'fetch', '--quiet', remote);
		return 'fetched';
	}
}
