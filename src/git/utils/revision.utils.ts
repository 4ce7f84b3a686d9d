const shaRegex = /^[0-9a-f]{40}$/;

export type GitRevisionRangeNotation = '..' | '...';
/** A single revision, or `<left>..<right>` */
export type GitRevisionRange = string;

export function isSha(rev: string): boolean {
	return shaRegex.test(rev);
}

const abbreviatedShaLength = 7;

/** Shortens full shas for display; named revisions (tags, branches) are returned as-is */
export function shortenRevision(rev: string | undefined): string {
	if (!rev) return '';
	if (!isSha(rev)) return rev;

	return rev.substring(0, abbreviatedShaLength);
}

/**
 * Builds the revision argument git expects for `(left, right]`.
 * Without a `left`, the range covers all history reachable from `right`.
 */
export function createRevisionRange(
	left: string | undefined,
	right: string,
	notation: GitRevisionRangeNotation = '..',
): GitRevisionRange {
	if (!left) return right;
	return `${left}${notation}${right}`;
}

export function shortenRevisionRange(left: string | undefined, right: string): string {
	return createRevisionRange(left != null ? shortenRevision(left) : undefined, shortenRevision(right));
}
