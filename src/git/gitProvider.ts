import type { GitShortLog } from './models/shortlog.js';
import type { GitRevisionRange } from './utils/revision.utils.js';

/** Commit time in whole seconds since the Unix epoch */
export type GitTimestamp = number;

/**
 * The history queries contribution attribution needs from a version control system.
 * Every method takes the path of the repository to query.
 */
export interface GitHistoryProvider {
	/** Commit time of the tip of `rev`, or `undefined` if `rev` doesn't exist in the repository */
	getCommitTime(repoPath: string, rev: string): Promise<GitTimestamp | undefined>;
	/**
	 * The latest commit reachable from `ref` whose commit time is at or before `timestamp`,
	 * or `undefined` when there is none (the beginning of history)
	 */
	getRevisionBefore(repoPath: string, ref: string, timestamp: GitTimestamp): Promise<string | undefined>;
	/** Per-author commit counts for the commits in `range` */
	getShortlog(repoPath: string, range: GitRevisionRange): Promise<GitShortLog>;
	/** Number of commits in `range` */
	getCommitCount(repoPath: string, range: GitRevisionRange): Promise<number>;
}

export interface GitRepositoryMirrorProvider {
	/** Clones the repository into `repoPath` when missing, otherwise fetches `remote` */
	ensureMirror(repoPath: string, cloneUrl: string, remote: string | undefined): Promise<'cloned' | 'fetched'>;
}
