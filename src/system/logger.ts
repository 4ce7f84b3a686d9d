import type { LogLevel } from './logger.constants.js';
import type { LogScope } from './logger.scope.js';

const enum OrderedLevel {
	Off = 0,
	Error = 1,
	Warn = 2,
	Info = 3,
	Debug = 4,
}

export interface LogChannelProvider {
	readonly name: string;
	createChannel(name: string): LogChannel;
}

export interface LogChannel {
	readonly name: string;
	appendLine(value: string): void;
	dispose?(): void;
}

export const Logger = new (class Logger {
	private output: LogChannel | undefined;
	private provider: LogChannelProvider | undefined;

	configure(provider: LogChannelProvider, logLevel: LogLevel): void {
		this.output?.dispose?.();
		this.output = undefined;
		this.provider = provider;
		this.logLevel = logLevel;
	}

	enabled(level: LogLevel): boolean {
		return this.level >= toOrderedLevel(level);
	}

	private level: OrderedLevel = OrderedLevel.Off;
	private _logLevel: LogLevel = 'off';
	get logLevel(): LogLevel {
		return this._logLevel;
	}
	set logLevel(value: LogLevel) {
		this._logLevel = value;
		this.level = toOrderedLevel(this._logLevel);

		if (value === 'off') {
			this.output?.dispose?.();
			this.output = undefined;
		} else if (this.provider != null) {
			this.output ??= this.provider.createChannel(this.provider.name);
		}
	}

	get timestamp(): string {
		return `[${new Date().toISOString().replace(/T/, ' ').slice(0, -1)}]`;
	}

	debug(message: string, ...params: unknown[]): void;
	debug(scope: LogScope | undefined, message: string, ...params: unknown[]): void;
	debug(scopeOrMessage: LogScope | string | undefined, ...params: unknown[]): void {
		if (this.output == null || this.level < OrderedLevel.Debug) return;

		const message = this.toMessage(scopeOrMessage, params);
		this.output.appendLine(`${this.timestamp} ${message}${this.toLoggableParams(params)}`);
	}

	error(ex: unknown, message?: string, ...params: unknown[]): void;
	error(ex: unknown, scope?: LogScope, message?: string, ...params: unknown[]): void;
	error(ex: unknown, scopeOrMessage: LogScope | string | undefined, ...params: unknown[]): void {
		if (this.output == null || this.level < OrderedLevel.Error) return;

		let message;
		if (scopeOrMessage == null || typeof scopeOrMessage === 'string') {
			message = scopeOrMessage;
		} else {
			message = `${scopeOrMessage.prefix} ${String(params.shift() ?? '')}`;
		}

		if (message == null) {
			const stack = ex instanceof Error ? ex.stack : undefined;
			if (stack) {
				const match = /.*\s*?at\s(.+?)\s/.exec(stack);
				if (match != null) {
					message = match[1];
				}
			}
		}

		this.output.appendLine(
			`${this.timestamp} ${message ?? ''}${this.toLoggableParams(params)}${ex != null ? `\n${String(ex)}` : ''}`,
		);
	}

	log(message: string, ...params: unknown[]): void;
	log(scope: LogScope | undefined, message: string, ...params: unknown[]): void;
	log(scopeOrMessage: LogScope | string | undefined, ...params: unknown[]): void {
		if (this.output == null || this.level < OrderedLevel.Info) return;

		const message = this.toMessage(scopeOrMessage, params);
		this.output.appendLine(`${this.timestamp} ${message}${this.toLoggableParams(params)}`);
	}

	warn(message: string, ...params: unknown[]): void;
	warn(scope: LogScope | undefined, message: string, ...params: unknown[]): void;
	warn(scopeOrMessage: LogScope | string | undefined, ...params: unknown[]): void {
		if (this.output == null || this.level < OrderedLevel.Warn) return;

		const message = this.toMessage(scopeOrMessage, params);
		this.output.appendLine(`${this.timestamp} ${message}${this.toLoggableParams(params)}`);
	}

	toLoggable(o: unknown): string {
		if (typeof o !== 'object' || o == null) return String(o);

		if (Array.isArray(o)) {
			return `[${o.map(i => this.toLoggable(i)).join(', ')}]`;
		}

		try {
			return JSON.stringify(o);
		} catch {
			return '<error>';
		}
	}

	private toMessage(scopeOrMessage: LogScope | string | undefined, params: unknown[]): string {
		if (typeof scopeOrMessage === 'string') return scopeOrMessage;

		const message = String(params.shift() ?? '');
		return scopeOrMessage != null ? `${scopeOrMessage.prefix} ${message}` : message;
	}

	private toLoggableParams(params: unknown[]): string {
		if (params.length === 0) return '';

		const loggableParams = params.map(p => this.toLoggable(p)).join(', ');
		return loggableParams.length !== 0 ? ` — ${loggableParams}` : '';
	}
})();

/** Writes each log line to a stream, e.g. `process.stderr`, keeping stdout free for command output */
export class StreamLogChannel implements LogChannel {
	constructor(
		public readonly name: string,
		private readonly stream: { write(chunk: string): unknown },
	) {}

	appendLine(value: string): void {
		this.stream.write(`${value}\n`);
	}
}

export function createStreamLogChannelProvider(
	name: string,
	stream: { write(chunk: string): unknown },
): LogChannelProvider {
	return {
		name: name,
		createChannel: channelName => new StreamLogChannel(channelName, stream),
	};
}

function toOrderedLevel(logLevel: LogLevel): OrderedLevel {
	switch (logLevel) {
		case 'off':
			return OrderedLevel.Off;
		case 'error':
			return OrderedLevel.Error;
		case 'warn':
			return OrderedLevel.Warn;
		case 'info':
			return OrderedLevel.Info;
		case 'debug':
			return OrderedLevel.Debug;
		default:
			return OrderedLevel.Off;
	}
}
