import { shortenRevisionRange } from '../git/utils/revision.utils.js';
import { pluralize } from '../system/string.js';
import type { AttributionResult, ProcessedWindow } from './models.js';
import type { ContributionEntry, ContributionTally, SortDirection } from './tally.js';

export function sortContributions(tally: ContributionTally, direction: SortDirection = 'descending'): ContributionEntry[] {
	return tally.sorted(direction);
}

function formatWindow({ repository, window, commitCount }: ProcessedWindow): string {
	const range = window != null ? shortenRevisionRange(window.lower, window.upper) : '(none)';
	return `${pluralize('commit', commitCount)} from ${repository.name}: ${range}`;
}

/**
 * Renders the report: a line per processed window, a tab-separated `<count>\t<name>` line per contributor,
 * then the excluded bot commits and the totals.
 */
export function formatReport(result: AttributionResult, options?: { direction?: SortDirection }): string[] {
	const lines = result.windows.map(formatWindow);

	for (const { name, count } of sortContributions(result.tally, options?.direction)) {
		lines.push(`${count}\t${name}`);
	}

	lines.push(`Excluded ${pluralize('commit', result.excludedCommits)} from bots`);
	lines.push(
		`Total: ${pluralize('commit', result.tally.total)} from ${pluralize('contributor', result.tally.size)}`,
	);

	return lines;
}
