import { readFile } from 'fs/promises';
import iconv from 'iconv-lite';
import { basename, dirname, isAbsolute, join, resolve } from 'path';
import * as process from 'process';
import { z } from 'zod';
import type { BotExclusionOptions } from './contributions/botPolicy.js';
import { defaultBotExclusionOptions } from './contributions/botPolicy.js';
import type { Repository } from './contributions/models.js';
import { ConfigurationError } from './errors.js';
import { logLevels } from './system/logger.constants.js';

export const defaultConfigFileName = 'credits.config.json';

const repositoryRefSchema = z.object({
	name: z.string().min(1, 'Repository name is required'),
	id: z.string().min(1).optional(),
	branch: z.string().min(1).default('main'),
	/** Overrides `<checkoutDir>/<name>` */
	path: z.string().min(1).optional(),
});

const patternSchema = z.string().refine(
	p => {
		try {
			new RegExp(p);
			return true;
		} catch {
			return false;
		}
	},
	{ message: 'Invalid regular expression' },
);

export const configSchema = z.object({
	checkoutDir: z.string().default('.'),
	remote: z.string().min(1).nullable().default('origin'),
	cloneUrl: z.string().includes('{id}', { message: "cloneUrl must contain '{id}'" }).default('https://github.com/{id}.git'),
	gitPath: z.string().min(1).optional(),
	encoding: z
		.string()
		.refine(e => iconv.encodingExists(e), e => ({ message: `Unsupported encoding '${e}'` }))
		.default('utf8'),
	logLevel: z.enum(logLevels).default('warn'),
	primary: repositoryRefSchema.optional(),
	satellites: z.array(repositoryRefSchema).default([]),
	defaultRange: z
		.object({
			lower: z.string().min(1).nullable().default(null),
			upper: z.string().min(1).nullable().default(null),
		})
		.default({}),
	bots: z
		.object({
			suffixes: z.array(z.string().min(1)).default([...defaultBotExclusionOptions.suffixes]),
			names: z.array(z.string().min(1)).default([...defaultBotExclusionOptions.names]),
			patterns: z.array(patternSchema).default([]),
		})
		.default({}),
});

export type RepositoryRefConfig = z.infer<typeof repositoryRefSchema>;
export type Config = z.infer<typeof configSchema>;

export interface ResolvedConfig {
	readonly primary: Repository;
	readonly satellites: readonly Repository[];
	readonly remote: string | undefined;
	readonly gitPath: string | undefined;
	readonly encoding: string;
	readonly logLevel: Config['logLevel'];
	readonly defaultRange: { readonly lower: string | undefined; readonly upper: string | undefined };
	readonly bots: BotExclusionOptions;
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map(i => `${i.path.length ? `${i.path.join('.')}: ` : ''}${i.message}`).join('; ');
}

export function parseConfig(data: unknown, source: string = 'configuration'): Config {
	const result = configSchema.safeParse(data);
	if (!result.success) {
		throw new ConfigurationError(`Invalid ${source}: ${formatIssues(result.error)}`, result.error);
	}
	return result.data;
}

/**
 * Reads the configuration file. Without an explicit `path`, a missing default file means the built-in defaults.
 *
 * @returns the parsed configuration and the directory relative paths in it resolve against
 */
export async function loadConfig(path?: string, cwd: string = process.cwd()): Promise<{ config: Config; baseDir: string }> {
	const file = resolve(cwd, path ?? defaultConfigFileName);

	let content;
	try {
		content = await readFile(file, 'utf8');
	} catch (ex) {
		if (path == null && isErrnoException(ex) && ex.code === 'ENOENT') {
			return { config: parseConfig({}), baseDir: cwd };
		}
		throw new ConfigurationError(
			`Unable to read configuration file '${file}'`,
			ex instanceof Error ? ex : undefined,
		);
	}

	let data: unknown;
	try {
		data = JSON.parse(content);
	} catch (ex) {
		throw new ConfigurationError(
			`Unable to parse configuration file '${file}': ${ex instanceof Error ? ex.message : String(ex)}`,
			ex instanceof Error ? ex : undefined,
		);
	}

	return { config: parseConfig(data, `configuration file '${file}'`), baseDir: dirname(file) };
}

function toRepository(ref: RepositoryRefConfig, checkoutDir: string, cloneUrl: string): Repository {
	const id = ref.id ?? ref.name;
	return {
		name: ref.name,
		id: id,
		branch: ref.branch,
		path: ref.path != null ? resolve(checkoutDir, ref.path) : join(checkoutDir, ref.name),
		cloneUrl: cloneUrl.replaceAll('{id}', id),
	};
}

/** Resolves paths and fills in the primary project; without one, `baseDir` itself is the primary's checkout */
export function resolveConfig(
	config: Config,
	baseDir: string,
	overrides?: { checkoutDir?: string | undefined; logLevel?: Config['logLevel'] | undefined },
): ResolvedConfig {
	const checkoutDir =
		overrides?.checkoutDir != null
			? resolve(overrides.checkoutDir)
			: isAbsolute(config.checkoutDir)
				? config.checkoutDir
				: resolve(baseDir, config.checkoutDir);

	const primaryRef = config.primary ?? { name: basename(baseDir), branch: 'main', path: baseDir };
	const primary = toRepository(primaryRef, checkoutDir, config.cloneUrl);

	const satellites = config.satellites.map(s => toRepository(s, checkoutDir, config.cloneUrl));

	const names = new Set<string>([primary.name]);
	for (const satellite of satellites) {
		if (names.has(satellite.name)) {
			throw new ConfigurationError(`Duplicate repository name '${satellite.name}'`);
		}
		names.add(satellite.name);
	}

	return {
		primary: primary,
		satellites: satellites,
		remote: config.remote ?? undefined,
		gitPath: config.gitPath,
		encoding: config.encoding,
		logLevel: overrides?.logLevel ?? config.logLevel,
		defaultRange: {
			lower: config.defaultRange.lower ?? undefined,
			upper: config.defaultRange.upper ?? undefined,
		},
		bots: config.bots,
	};
}

function isErrnoException(ex: unknown): ex is NodeJS.ErrnoException {
	return ex instanceof Error && 'code' in ex;
}
