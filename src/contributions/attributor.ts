import type { GitHistoryProvider } from '../git/gitProvider.js';
import { createRevisionRange, shortenRevisionRange } from '../git/utils/revision.utils.js';
import { ResolutionError } from '../errors.js';
import { Logger } from '../system/logger.js';
import type { LogScope } from '../system/logger.scope.js';
import { getNewLogScope } from '../system/logger.scope.js';
import type { BotExclusionPolicy } from './botPolicy.js';
import { defaultBotExclusionPolicy } from './botPolicy.js';
import type {
	AttributionResult,
	BoundaryRange,
	ProcessedWindow,
	Repository,
	ResolvedBoundaries,
	RevisionWindow,
} from './models.js';
import { ContributionTally } from './tally.js';

export interface ContributionAttributorOptions {
	readonly primary: Repository;
	/** Processed in this order, after the primary */
	readonly satellites: readonly Repository[];
	readonly botPolicy?: BotExclusionPolicy;
	/** Remote whose copy of each default branch is used, e.g. `origin`; `undefined` for local branches */
	readonly remote?: string | undefined;
}

export interface WindowContributions {
	readonly tally: ContributionTally;
	readonly excludedCommits: number;
	readonly commitCount: number;
}

/**
 * Credits the commits of a primary project and its satellites to the primary's release windows.
 *
 * A satellite commit belongs to the primary window whose upper boundary is the first one committed
 * at or after it, so consecutive windows never share or lose a commit.
 */
export class ContributionAttributor {
	private readonly botPolicy: BotExclusionPolicy;

	constructor(
		private readonly git: GitHistoryProvider,
		private readonly options: ContributionAttributorOptions,
	) {
		this.botPolicy = options.botPolicy ?? defaultBotExclusionPolicy;
	}

	/** Runs the whole pipeline; any failure rejects and no partial result is returned */
	async attribute(range: BoundaryRange = {}): Promise<AttributionResult> {
		const scope = getNewLogScope('ContributionAttributor.attribute', false);

		const boundaries = await this.resolveBoundaries(range);
		Logger.log(
			scope,
			`resolved ${boundaries.lower?.rev ?? '(beginning)'}..${boundaries.upper.rev}`,
			boundaries.lower?.time,
			boundaries.upper.time,
		);

		const { primary, satellites } = this.options;

		let tally = new ContributionTally();
		let excludedCommits = 0;
		const windows: ProcessedWindow[] = [];

		for (const repository of [primary, ...satellites]) {
			const window =
				repository === primary
					? { lower: boundaries.lower?.rev, upper: boundaries.upper.rev }
					: await this.mapWindow(repository, boundaries);

			if (window == null) {
				Logger.log(scope, `${repository.name} has no commits before ${boundaries.upper.rev}`);
				windows.push({ repository: repository, window: undefined, commitCount: 0 });
				continue;
			}

			const contributions = await this.collect(repository, window, scope);
			tally = tally.merge(contributions.tally);
			excludedCommits += contributions.excludedCommits;
			windows.push({ repository: repository, window: window, commitCount: contributions.commitCount });
		}

		return { boundaries: boundaries, tally: tally, excludedCommits: excludedCommits, windows: windows };
	}

	/** Resolves the primary project's boundary points to the commit times of their tips */
	async resolveBoundaries(range: BoundaryRange): Promise<ResolvedBoundaries> {
		const { primary } = this.options;

		const upperRev = range.upper || this.getBranchRef(primary);
		const lowerRev = range.lower || undefined;

		const lowerTime = lowerRev != null ? await this.git.getCommitTime(primary.path, lowerRev) : undefined;
		const upperTime = await this.git.getCommitTime(primary.path, upperRev);

		const missing: string[] = [];
		if (lowerRev != null && lowerTime == null) {
			missing.push(lowerRev);
		}
		if (upperTime == null) {
			missing.push(upperRev);
		}
		if (missing.length !== 0 || upperTime == null) {
			throw new ResolutionError('notFound', missing, primary.path);
		}

		if (lowerRev == null || lowerTime == null) {
			return { lower: undefined, upper: { rev: upperRev, time: upperTime } };
		}

		if (lowerTime > upperTime) {
			throw new ResolutionError('outOfOrder', [lowerRev, upperRev], primary.path);
		}

		return { lower: { rev: lowerRev, time: lowerTime }, upper: { rev: upperRev, time: upperTime } };
	}

	/**
	 * Translates the primary's boundary times into revisions of `repository`: for each, its latest commit
	 * at or before that time. Returns `undefined` when the repository has nothing at or before the upper time.
	 */
	async mapWindow(repository: Repository, boundaries: ResolvedBoundaries): Promise<RevisionWindow | undefined> {
		const ref = this.getBranchRef(repository);

		const upper = await this.git.getRevisionBefore(repository.path, ref, boundaries.upper.time);
		if (upper == null) return undefined;

		const lower =
			boundaries.lower != null
				? await this.git.getRevisionBefore(repository.path, ref, boundaries.lower.time)
				: undefined;

		return { lower: lower, upper: upper };
	}

	/** Counts the commits in `window`, diverting the bots' counts into `excludedCommits` */
	async collect(repository: Repository, window: RevisionWindow, scope?: LogScope): Promise<WindowContributions> {
		const range = createRevisionRange(window.lower, window.upper);

		const commitCount = await this.git.getCommitCount(repository.path, range);
		const shortlog = await this.git.getShortlog(repository.path, range);

		const tally = new ContributionTally();
		let excludedCommits = 0;

		for (const contributor of shortlog.contributors) {
			if (this.botPolicy.isBot(contributor.name)) {
				excludedCommits += contributor.contributionCount;
				continue;
			}

			tally.add(contributor.name, contributor.contributionCount);
		}

		Logger.log(
			scope,
			`${commitCount} commits from ${repository.name}: ${shortenRevisionRange(window.lower, window.upper)}`,
		);

		return { tally: tally, excludedCommits: excludedCommits, commitCount: commitCount };
	}

	private getBranchRef(repository: Repository): string {
		return this.options.remote ? `${this.options.remote}/${repository.branch}` : repository.branch;
	}
}
