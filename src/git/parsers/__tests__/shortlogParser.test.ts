import * as assert from 'assert';
import { parseShortlog } from '../shortlogParser.js';

suite('Shortlog Parser Test Suite', () => {
	const repoPath = '/repos/server';

	test('should parse counts and names in the order git lists them', () => {
		const result = parseShortlog('     3\tAlice Example\n     1\tdependabot[bot]\n', repoPath);

		assert.strictEqual(result.repoPath, repoPath);
		assert.deepStrictEqual(result.contributors, [
			{ name: 'Alice Example', email: undefined, contributionCount: 3 },
			{ name: 'dependabot[bot]', email: undefined, contributionCount: 1 },
		]);
	});

	test('should split off a trailing email', () => {
		const result = parseShortlog('    12\tAlice Example <alice@example.com>\n', repoPath);

		assert.deepStrictEqual(result.contributors, [
			{ name: 'Alice Example', email: 'alice@example.com', contributionCount: 12 },
		]);
	});

	test('should keep angle brackets that are not a trailing email', () => {
		const result = parseShortlog('1\tAlice <a> Jr\n', repoPath);

		assert.deepStrictEqual(result.contributors, [{ name: 'Alice <a> Jr', email: undefined, contributionCount: 1 }]);
	});

	test('should skip spaces between the count and the name', () => {
		const result = parseShortlog('5\t  Dana\n', repoPath);

		assert.deepStrictEqual(result.contributors, [{ name: 'Dana', email: undefined, contributionCount: 5 }]);
	});

	test('should sum repeated names', () => {
		const result = parseShortlog('1\tBob\n4\tCarol\n2\tBob\n', repoPath);

		assert.deepStrictEqual(result.contributors, [
			{ name: 'Bob', email: undefined, contributionCount: 3 },
			{ name: 'Carol', email: undefined, contributionCount: 4 },
		]);
	});

	test('should skip lines without a count', () => {
		const result = parseShortlog('garbage\n  x\tname\n\n 4\tCarol\n', repoPath);

		assert.deepStrictEqual(result.contributors, [{ name: 'Carol', email: undefined, contributionCount: 4 }]);
	});

	test('should return no contributors for empty output', () => {
		assert.deepStrictEqual(parseShortlog('', repoPath), { repoPath: repoPath, contributors: [] });
	});
});
