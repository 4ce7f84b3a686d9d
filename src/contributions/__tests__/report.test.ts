import * as assert from 'assert';
import type { AttributionResult, Repository } from '../models.js';
import { formatReport, sortContributions } from '../report.js';
import { ContributionTally } from '../tally.js';

function repository(name: string): Repository {
	return { name: name, id: name, branch: 'main', path: `/repos/${name}`, cloneUrl: `/mirrors/${name}.git` };
}

const sha1 = '8f2c1e0b9a7d6c5b4a3928170f6e5d4c3b2a1908';
const sha2 = '0123456789abcdef0123456789abcdef01234567';

suite('Report Test Suite', () => {
	const result: AttributionResult = {
		boundaries: { lower: { rev: '1.0', time: 100 }, upper: { rev: '2.0', time: 200 } },
		tally: ContributionTally.from([
			['alice', 10],
			['bob', 10],
			['carol', 5],
		]),
		excludedCommits: 5,
		windows: [
			{ repository: repository('server'), window: { lower: '1.0', upper: '2.0' }, commitCount: 21 },
			{ repository: repository('mobile'), window: { lower: sha1, upper: sha2 }, commitCount: 8 },
			{ repository: repository('ios'), window: { lower: undefined, upper: sha2 }, commitCount: 1 },
			{ repository: repository('desktop'), window: undefined, commitCount: 0 },
		],
	};

	test('should render windows, contributors and totals', () => {
		assert.deepStrictEqual(formatReport(result), [
			'21 commits from server: 1.0..2.0',
			'8 commits from mobile: 8f2c1e0..0123456',
			'1 commit from ios: 0123456',
			'0 commits from desktop: (none)',
			'10\talice',
			'10\tbob',
			'5\tcarol',
			'Excluded 5 commits from bots',
			'Total: 25 commits from 3 contributors',
		]);
	});

	test('should list contributors in ascending order on request', () => {
		const lines = formatReport(result, { direction: 'ascending' });

		assert.deepStrictEqual(lines.slice(4, 7), ['5\tcarol', '10\talice', '10\tbob']);
	});

	test('should render an empty result', () => {
		const empty: AttributionResult = {
			boundaries: { lower: undefined, upper: { rev: 'origin/main', time: 100 } },
			tally: new ContributionTally(),
			excludedCommits: 1,
			windows: [{ repository: repository('server'), window: { lower: undefined, upper: 'origin/main' }, commitCount: 1 }],
		};

		assert.deepStrictEqual(formatReport(empty), [
			'1 commit from server: origin/main',
			'Excluded 1 commit from bots',
			'Total: 0 commits from 0 contributors',
		]);
	});

	test('should sort contributions without changing the tally', () => {
		assert.deepStrictEqual(
			sortContributions(result.tally, 'ascending').map(e => e.count),
			[5, 10, 10],
		);
		assert.deepStrictEqual(
			[...result.tally].map(e => e.name),
			['alice', 'bob', 'carol'],
		);
	});
});
