// Ids stay within V8's small integer range
const maxScopeId = 2 ** 30 - 1;

/** Hands out log scope ids, wrapping back to 1 after `maxScopeId` */
export const logScopeIdGenerator = new (class ScopeIdGenerator {
	private _current = 0;
	get current(): number {
		return this._current;
	}

	next(): number {
		this._current = this._current === maxScopeId ? 1 : this._current + 1;
		return this._current;
	}
})();

export interface LogScope {
	readonly scopeId?: number;
	readonly prevScopeId?: number;
	readonly prefix: string;
}

export function getLoggableScopeBlock(scopeId: number, prevScopeId?: number): string {
	return prevScopeId == null
		? `[${scopeId.toString(16).padStart(13)}]`
		: `[${prevScopeId.toString(16).padStart(5)} → ${scopeId.toString(16).padStart(5)}]`;
}

export function getLoggableScopeBlockOverride(prefix: string, suffix?: string): string {
	if (suffix == null) return `[${prefix.padEnd(13)}]`;

	return `[${prefix}${suffix.padStart(13 - prefix.length)}]`;
}

export function getNewLogScope(prefix: string, scope: LogScope | boolean | undefined): LogScope {
	if (scope != null && typeof scope !== 'boolean') {
		return {
			scopeId: scope.scopeId,
			prevScopeId: scope.prevScopeId,
			prefix: `${scope.prefix}${prefix}`,
		};
	}

	const prevScopeId = scope ? logScopeIdGenerator.current : undefined;
	const scopeId = logScopeIdGenerator.next();
	return {
		scopeId: scopeId,
		prevScopeId: prevScopeId,
		prefix: `${getLoggableScopeBlock(scopeId, prevScopeId)} ${prefix}`,
	};
}
