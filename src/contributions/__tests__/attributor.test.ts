import * as assert from 'assert';
import * as sinon from 'sinon';
import { ResolutionError } from '../../errors.js';
import { ToolInvocationError } from '../../git/errors.js';
import { ContributionAttributor } from '../attributor.js';
import { createBotExclusionPolicy } from '../botPolicy.js';
import type { AttributionResult, Repository } from '../models.js';
import type { ContributionTally } from '../tally.js';
import type { FakeGitHistoryProvider } from './fakeGitHistoryProvider.js';
import { createFakeHistories } from './fakeGitHistoryProvider.js';

function repository(name: string, branch: string = 'main'): Repository {
	return {
		name: name,
		id: `example-org/${name}`,
		branch: branch,
		path: `/repos/${name}`,
		cloneUrl: `https://example.com/example-org/${name}.git`,
	};
}

function toObject(tally: ContributionTally): Record<string, number> {
	return Object.fromEntries([...tally].map(e => [e.name, e.count]));
}

function sumOfWindows(result: AttributionResult): number {
	return result.windows.reduce((sum, w) => sum + w.commitCount, 0);
}

suite('ContributionAttributor Test Suite', () => {
	let git: FakeGitHistoryProvider;
	let attributor: ContributionAttributor;

	setup(() => {
		git = createFakeHistories();
		attributor = new ContributionAttributor(git, {
			primary: repository('server'),
			satellites: [repository('mobile'), repository('desktop'), repository('ios', 'dev')],
			remote: 'origin',
		});
	});

	teardown(() => {
		sinon.restore();
	});

	suite('resolveBoundaries', () => {
		test('should resolve both boundaries to commit times', async () => {
			const boundaries = await attributor.resolveBoundaries({ lower: '1.0', upper: '2.0' });

			assert.deepStrictEqual(boundaries, {
				lower: { rev: '1.0', time: 200 },
				upper: { rev: '2.0', time: 400 },
			});
		});

		test('should default the upper boundary to the tip of the default branch', async () => {
			const boundaries = await attributor.resolveBoundaries({ lower: '2.0' });

			assert.deepStrictEqual(boundaries.upper, { rev: 'origin/main', time: 600 });
		});

		test('should leave the lower boundary open when not given', async () => {
			const boundaries = await attributor.resolveBoundaries({ upper: '1.0' });

			assert.strictEqual(boundaries.lower, undefined);
			assert.deepStrictEqual(boundaries.upper, { rev: '1.0', time: 200 });
		});

		test('should use the local branch when no remote is configured', async () => {
			git.addRepository('/repos/local', 'local', [['alice', 100]], { main: 'tip' });
			const local = new ContributionAttributor(git, { primary: repository('local'), satellites: [] });

			const boundaries = await local.resolveBoundaries({});

			assert.deepStrictEqual(boundaries.upper, { rev: 'main', time: 100 });
		});

		test('should fail with every version that does not exist', async () => {
			await assert.rejects(
				attributor.resolveBoundaries({ lower: '9.8', upper: '9.9' }),
				(ex: unknown) =>
					ResolutionError.is(ex, 'notFound') &&
					ex.revisions.join() === '9.8,9.9' &&
					ex.message === "Specified version(s) don't exist in '/repos/server': 9.8, 9.9",
			);
		});

		test('should fail when the lower boundary was committed after the upper one', async () => {
			await assert.rejects(
				attributor.resolveBoundaries({ lower: '2.0', upper: '1.0' }),
				(ex: unknown) => ResolutionError.is(ex, 'outOfOrder') && ex.revisions.join() === '2.0,1.0',
			);
		});

		test('should accept equal boundaries', async () => {
			const boundaries = await attributor.resolveBoundaries({ lower: '2.0', upper: '2.0' });

			assert.strictEqual(boundaries.lower?.time, boundaries.upper.time);
		});
	});

	suite('mapWindow', () => {
		test('should pick the latest commit at or before each boundary time', async () => {
			const window = await attributor.mapWindow(repository('mobile'), {
				lower: { rev: '1.0', time: 200 },
				upper: { rev: '2.0', time: 400 },
			});

			assert.deepStrictEqual(window, { lower: 'mobile1', upper: 'mobile3' });
		});

		test('should include a commit made exactly at the boundary time', async () => {
			const window = await attributor.mapWindow(repository('mobile'), {
				lower: undefined,
				upper: { rev: 'x', time: 250 },
			});

			assert.deepStrictEqual(window, { lower: undefined, upper: 'mobile2' });
		});

		test('should open the lower end when nothing precedes the lower boundary', async () => {
			const window = await attributor.mapWindow(repository('ios', 'dev'), {
				lower: { rev: '0.1', time: 100 },
				upper: { rev: '1.0', time: 200 },
			});

			assert.deepStrictEqual(window, { lower: undefined, upper: 'ios2' });
		});

		test('should return undefined when nothing precedes the upper boundary', async () => {
			const window = await attributor.mapWindow(repository('desktop'), {
				lower: { rev: '1.0', time: 200 },
				upper: { rev: '3.0', time: 600 },
			});

			assert.strictEqual(window, undefined);
		});

		test('should not look up the lower boundary when the upper one maps to nothing', async () => {
			const spy = sinon.spy(git, 'getRevisionBefore');

			await attributor.mapWindow(repository('desktop'), {
				lower: { rev: '1.0', time: 200 },
				upper: { rev: '3.0', time: 600 },
			});

			assert.strictEqual(spy.callCount, 1);
			assert.ok(spy.calledWithExactly('/repos/desktop', 'origin/main', 600));
		});
	});

	suite('collect', () => {
		test('should divert bot commits into the excluded total', async () => {
			git.addRepository(
				'/repos/bots',
				'bots',
				[
					['alice', 10],
					['dependabot[bot]', 20],
					['dependabot[bot]', 30],
					['dependabot[bot]', 40],
					['dependabot[bot]', 50],
					['dependabot[bot]', 60],
				],
				{ main: 'tip' },
			);

			const contributions = await attributor.collect(repository('bots'), { lower: undefined, upper: 'main' });

			assert.strictEqual(contributions.excludedCommits, 5);
			assert.strictEqual(contributions.commitCount, 6);
			assert.strictEqual(contributions.tally.has('dependabot[bot]'), false);
			assert.deepStrictEqual([...contributions.tally], [{ name: 'alice', count: 1 }]);
		});

		test('should use the configured bot policy', async () => {
			const custom = new ContributionAttributor(git, {
				primary: repository('server'),
				satellites: [],
				botPolicy: createBotExclusionPolicy({ names: ['carol'] }),
			});

			const contributions = await custom.collect(repository('server'), { lower: '1.0', upper: '3.0' });

			assert.strictEqual(contributions.excludedCommits, 1);
			assert.deepStrictEqual(
				[...contributions.tally],
				[
					{ name: 'alice', count: 2 },
					{ name: 'dependabot[bot]', count: 1 },
				],
			);
		});
	});

	suite('attribute', () => {
		test('should credit satellites by commit date within the window', async () => {
			const result = await attributor.attribute({ lower: '1.0', upper: '2.0' });

			assert.deepStrictEqual(toObject(result.tally), { alice: 1, carol: 1, dave: 1 });
			assert.strictEqual(result.excludedCommits, 1);
			assert.deepStrictEqual(
				result.windows.map(w => [w.repository.name, w.window, w.commitCount]),
				[
					['server', { lower: '1.0', upper: '2.0' }, 2],
					['mobile', { lower: 'mobile1', upper: 'mobile3' }, 2],
					['desktop', undefined, 0],
					['ios', { lower: 'ios2', upper: 'ios2' }, 0],
				],
			);
		});

		test('should add up adjacent windows to the enclosing window', async () => {
			const first = await attributor.attribute({ lower: '1.0', upper: '2.0' });
			const second = await attributor.attribute({ lower: '2.0', upper: '3.0' });
			const whole = await attributor.attribute({ lower: '1.0', upper: '3.0' });

			assert.deepStrictEqual(toObject(whole.tally), { alice: 2, carol: 1, dave: 2, erin: 1 });
			assert.deepStrictEqual(toObject(first.tally.merge(second.tally)), toObject(whole.tally));
			assert.strictEqual(first.excludedCommits + second.excludedCommits, whole.excludedCommits);
			assert.strictEqual(sumOfWindows(first) + sumOfWindows(second), sumOfWindows(whole));
		});

		test('should conserve every commit of every window', async () => {
			for (const range of [{}, { lower: '1.0' }, { lower: '1.0', upper: '2.0' }, { upper: '0.1' }]) {
				const result = await attributor.attribute(range);

				assert.strictEqual(result.tally.total + result.excludedCommits, sumOfWindows(result));
			}
		});

		test('should credit everything up to the upper boundary when there is no lower boundary', async () => {
			const result = await attributor.attribute({ upper: '1.0' });

			assert.deepStrictEqual(toObject(result.tally), { alice: 1, bob: 1, dave: 1, erin: 1, hank: 2, ivy: 1 });
			assert.strictEqual(result.tally.total, 7);
			assert.strictEqual(result.excludedCommits, 0);
		});

		test('should credit a satellite with no commit before the lower boundary with all its commits up to the upper one', async () => {
			const result = await attributor.attribute({ lower: '0.1', upper: '1.0' });

			const ios = result.windows.find(w => w.repository.name === 'ios');
			assert.ok(ios != null);
			assert.deepStrictEqual(ios.window, { lower: undefined, upper: 'ios2' });
			assert.strictEqual(ios.commitCount, 3);
			assert.strictEqual(result.tally.get('hank'), 2);
			assert.strictEqual(result.tally.get('ivy'), 1);
		});

		test('should fail without querying any logs when a version does not exist', async () => {
			const shortlog = sinon.spy(git, 'getShortlog');

			await assert.rejects(attributor.attribute({ lower: '9.9' }), (ex: unknown) =>
				ResolutionError.is(ex, 'notFound'),
			);
			assert.strictEqual(shortlog.callCount, 0);
		});

		test('should stop at the first failing repository', async () => {
			const failing = new ContributionAttributor(git, {
				primary: repository('server'),
				satellites: [repository('mobile'), repository('missing'), repository('ios', 'dev')],
				remote: 'origin',
			});
			const shortlog = sinon.spy(git, 'getShortlog');

			await assert.rejects(failing.attribute({ lower: '1.0' }), (ex: unknown) =>
				ToolInvocationError.is(ex, 'notARepository'),
			);
			assert.deepStrictEqual(
				shortlog.getCalls().map(c => c.args[0]),
				['/repos/server', '/repos/mobile'],
			);
		});
	});
});
