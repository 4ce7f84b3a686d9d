export interface BotExclusionPolicy {
	isBot(name: string): boolean;
}

export interface BotExclusionOptions {
	/** Names ending with any of these are bots, e.g. `[bot]` for GitHub apps */
	readonly suffixes?: readonly string[];
	/** Exact names of automation accounts */
	readonly names?: readonly string[];
	/** Regular expression sources, matched against the whole name */
	readonly patterns?: readonly string[];
}

export const defaultBotExclusionOptions = {
	suffixes: ['[bot]'],
	names: ['Hosted Weblate'],
	patterns: [],
} as const satisfies BotExclusionOptions;

export function createBotExclusionPolicy(options: BotExclusionOptions = defaultBotExclusionOptions): BotExclusionPolicy {
	const suffixes = options.suffixes ?? [];
	const names = new Set(options.names ?? []);
	const patterns = (options.patterns ?? []).map(p => new RegExp(`^(?:${p})$`));

	return {
		isBot: name => names.has(name) || suffixes.some(s => name.endsWith(s)) || patterns.some(p => p.test(name)),
	};
}

export const defaultBotExclusionPolicy: BotExclusionPolicy = createBotExclusionPolicy();
