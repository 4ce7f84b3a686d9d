import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { resolve } from 'path';
import * as process from 'process';
import type { ResolvedConfig } from './config.js';
import { loadConfig, resolveConfig } from './config.js';
import { ContributionAttributor } from './contributions/attributor.js';
import { createBotExclusionPolicy } from './contributions/botPolicy.js';
import type { BoundaryRange } from './contributions/models.js';
import { formatReport } from './contributions/report.js';
import { Git } from './env/node/git/git.js';
import { LocalGitHistoryProvider } from './env/node/git/localGitProvider.js';
import { findGitPath, UnableToFindGitError } from './env/node/git/locator.js';
import { ConfigurationError, ResolutionError } from './errors.js';
import type { GitHistoryProvider, GitRepositoryMirrorProvider } from './git/gitProvider.js';
import { ToolInvocationError } from './git/errors.js';
import { createStreamLogChannelProvider, Logger } from './system/logger.js';
import type { LogLevel } from './system/logger.constants.js';
import { logLevels } from './system/logger.constants.js';

export const programName = 'git-credits';

export const exitCodes = {
	success: 0,
	unresolvedVersion: 1,
	invalidConfiguration: 2,
	failure: 3,
} as const;

export type ExitCode = (typeof exitCodes)[keyof typeof exitCodes];

interface Writable {
	write(chunk: string): unknown;
}

export type CreditsProvider = GitHistoryProvider & GitRepositoryMirrorProvider;

export interface ProgramContext {
	readonly stdout: Writable;
	readonly stderr: Writable;
	readonly cwd?: string;
	/** Defaults to running the git executable; tests substitute an in-process fake */
	readonly createProvider?: (config: ResolvedConfig, signal: AbortSignal | undefined) => CreditsProvider;
}

interface ProgramOptions {
	ascending: boolean;
	config?: string;
	checkoutDir?: string;
	fetch: boolean;
	timeout?: number;
	logLevel?: LogLevel;
}

function parseTimeout(value: string): number {
	const timeout = Number(value);
	if (!Number.isInteger(timeout) || timeout <= 0) {
		throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.');
	}
	return timeout;
}

function createLocalProvider(config: ResolvedConfig, signal: AbortSignal | undefined): CreditsProvider {
	const git = new Git(() => findGitPath(config.gitPath), { encoding: config.encoding });
	return new LocalGitHistoryProvider(git, { signal: signal });
}

export function toBoundaryRange(versions: readonly string[], defaultRange: BoundaryRange): BoundaryRange {
	switch (versions.length) {
		case 0:
			return defaultRange;
		case 1:
			return { lower: versions[0] };
		case 2:
			return { lower: versions[0], upper: versions[1] };
		default:
			throw new ConfigurationError(
				`Expected at most two versions, but got ${versions.length}: ${versions.join(' ')}`,
			);
	}
}

export function createProgram(context: ProgramContext): Command {
	const program = new Command(programName);

	program
		.description(
			'Counts commits per contributor between two versions of the primary project, crediting satellite repositories by commit date',
		)
		.argument('[versions...]', 'lower and upper version (tag or branch) of the primary project')
		.option('--ascending', 'sort contributors by ascending commit count', false)
		.option('-c, --config <path>', 'configuration file')
		.option('--checkout-dir <dir>', 'directory containing the repository checkouts')
		.option('--fetch', 'clone missing repositories and fetch the others before counting', false)
		.option('--timeout <ms>', 'abort the run after this many milliseconds', parseTimeout)
		.addOption(new Option('--log-level <level>', 'diagnostic output written to stderr').choices(logLevels))
		.exitOverride()
		.configureOutput({
			writeOut: s => void context.stdout.write(s),
			writeErr: s => void context.stderr.write(s),
		})
		.action(async (versions: string[]) => {
			const options = program.opts<ProgramOptions>();

			// Reject bad arguments before doing any work
			const requested = versions.length !== 0 ? toBoundaryRange(versions, {}) : undefined;

			const cwd = context.cwd ?? process.cwd();
			const { config: fileConfig, baseDir } = await loadConfig(options.config, cwd);
			const config = resolveConfig(fileConfig, baseDir, {
				checkoutDir: options.checkoutDir != null ? resolve(cwd, options.checkoutDir) : undefined,
				logLevel: options.logLevel,
			});

			Logger.configure(createStreamLogChannelProvider(programName, context.stderr), config.logLevel);

			const signal = options.timeout != null ? AbortSignal.timeout(options.timeout) : undefined;
			const provider = (context.createProvider ?? createLocalProvider)(config, signal);

			if (options.fetch) {
				for (const repository of [config.primary, ...config.satellites]) {
					const action = await provider.ensureMirror(repository.path, repository.cloneUrl, config.remote);
					Logger.log(`${action} ${repository.name} in ${repository.path}`);
				}
			}

			const attributor = new ContributionAttributor(provider, {
				primary: config.primary,
				satellites: config.satellites,
				botPolicy: createBotExclusionPolicy(config.bots),
				remote: config.remote,
			});

			const result = await attributor.attribute(requested ?? config.defaultRange);
			const lines = formatReport(result, { direction: options.ascending ? 'ascending' : 'descending' });
			context.stdout.write(`${lines.join('\n')}\n`);
		});

	return program;
}

/** Parses `args` (without the node executable and script) and runs the command, resolving with the exit code */
export async function run(args: readonly string[], context: ProgramContext): Promise<ExitCode> {
	const program = createProgram(context);

	try {
		await program.parseAsync([...args], { from: 'user' });
		return exitCodes.success;
	} catch (ex) {
		if (ex instanceof CommanderError) {
			// Help and version output end by "throwing" with a zero exit code
			return ex.exitCode === 0 ? exitCodes.success : exitCodes.invalidConfiguration;
		}

		if (ResolutionError.is(ex)) {
			context.stderr.write(`${ex.message}\n`);
			return exitCodes.unresolvedVersion;
		}

		if (ConfigurationError.is(ex)) {
			context.stderr.write(`error: ${ex.message}\n`);
			return exitCodes.invalidConfiguration;
		}

		Logger.error(ex, `${programName} failed`);

		if (ToolInvocationError.is(ex) || UnableToFindGitError.is(ex)) {
			context.stderr.write(`error: ${ex.message}\n`);
		} else {
			context.stderr.write(`error: ${ex instanceof Error ? (ex.stack ?? ex.message) : String(ex)}\n`);
		}
		return exitCodes.failure;
	}
}
