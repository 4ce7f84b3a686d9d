import { iterateByDelimiter } from '../../system/string.js';
import type { GitContributor } from '../models/contributor.js';
import type { GitShortLog } from '../models/shortlog.js';

/**
 * Parses `git shortlog -s` output (optionally with `-e`) into contributors, in the order git listed them.
 * Lines for the same name and email are summed.
 */
export function parseShortlog(data: string, repoPath: string): GitShortLog {
	if (!data) return { repoPath: repoPath, contributors: [] };

	// Format: [count] [name] [<email>]

	const contributors = new Map<string, { name: string; email: string | undefined; contributionCount: number }>();

	for (let line of iterateByDelimiter(data, '\n')) {
		line = line.trim();
		if (!line) continue;

		// Find the first tab to separate the count from the rest
		let index = line.indexOf('\t');
		if (index === -1) continue;

		// Extract the count portion and the rest of the line
		const count = parseInt(line.substring(0, index), 10);
		if (isNaN(count)) continue;

		// Skip any additional spaces between count and name
		index++;
		while (index < line.length && line[index] === ' ') {
			index++;
		}

		// Look for email enclosed in angle brackets
		let name: string;
		let email: string | undefined;

		const emailStartIndex = line.lastIndexOf(' <');
		const emailEndIndex = line.lastIndexOf('>');

		if (emailStartIndex !== -1 && emailEndIndex === line.length - 1 && emailEndIndex > emailStartIndex) {
			name = line.substring(index, emailStartIndex);
			email = line.substring(emailStartIndex + 2, emailEndIndex); // +2 to skip ' <'
		} else {
			name = line.substring(index);
			email = undefined;
		}

		const key = `${name}|${email ?? ''}`;
		const contributor = contributors.get(key);
		if (contributor == null) {
			contributors.set(key, { name: name, email: email, contributionCount: count });
		} else {
			contributor.contributionCount += count;
		}
	}

	return { repoPath: repoPath, contributors: [...contributors.values()] satisfies GitContributor[] };
}
