import type { GitTimestamp } from '../git/gitProvider.js';
import type { ContributionTally } from './tally.js';

/** A project whose commits are attributed, as supplied by configuration */
export interface RepositoryRef {
	/** Short name, used for display and as the checkout directory name */
	readonly name: string;
	/** Canonical identifier, e.g. `owner/repo` */
	readonly id: string;
	/** Default branch */
	readonly branch: string;
}

export interface Repository extends RepositoryRef {
	/** Local checkout */
	readonly path: string;
	readonly cloneUrl: string;
}

/** A named boundary in the primary project resolved to the commit time of its tip */
export interface ResolvedBoundary {
	readonly rev: string;
	readonly time: GitTimestamp;
}

export interface ResolvedBoundaries {
	/** `undefined` means from the beginning of history */
	readonly lower: ResolvedBoundary | undefined;
	readonly upper: ResolvedBoundary;
}

/** The commits in `(lower, upper]`; without a `lower`, everything reachable from `upper` */
export interface RevisionWindow {
	readonly lower: string | undefined;
	readonly upper: string;
}

export interface ProcessedWindow {
	readonly repository: Repository;
	/** `undefined` when the repository has no commits at or before the upper boundary */
	readonly window: RevisionWindow | undefined;
	/** Raw number of commits in the window, including bots */
	readonly commitCount: number;
}

export interface AttributionResult {
	readonly boundaries: ResolvedBoundaries;
	readonly tally: ContributionTally;
	/** Commits by contributors the bot policy excluded */
	readonly excludedCommits: number;
	readonly windows: readonly ProcessedWindow[];
}

export interface BoundaryRange {
	/** Omit to start at the beginning of history */
	readonly lower?: string | undefined;
	/** Omit for the latest point in history, the tip of the primary project's default branch */
	readonly upper?: string | undefined;
}
