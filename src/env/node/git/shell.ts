import type { ExecFileException } from 'child_process';
import { execFile } from 'child_process';
import type { Stats } from 'fs';
import { access, constants, existsSync, statSync } from 'fs';
import iconv from 'iconv-lite';
import { join as joinPaths } from 'path';
import * as process from 'process';
import { Logger } from '../../../system/logger.js';
import { CancelledRunError, RunError } from './shell.errors.js';

export const isWindows = process.platform === 'win32';

const slashesRegex = /[\\/]/;

/**
 * Search PATH to see if a file exists in any of the path folders.
 *
 * @returns A fully qualified path, or the original path if nothing is found
 */
function runDownPath(exe: string): string {
	// NB: Windows won't search PATH looking for executables in spawn like
	// Posix does

	// Files with any directory path don't get this applied
	if (slashesRegex.test(exe)) return exe;

	const target = joinPaths('.', exe);
	try {
		const stats = statSync(target);
		if (stats?.isFile() && isExecutable(stats)) return target;
	} catch {}

	const path = process.env.PATH;
	if (path != null && path.length !== 0) {
		const haystack = path.split(isWindows ? ';' : ':');
		let stats;
		for (const p of haystack) {
			const needle = joinPaths(p, exe);
			try {
				stats = statSync(needle);
				if (stats?.isFile() && isExecutable(stats)) return needle;
			} catch {}
		}
	}

	return exe;
}

function isExecutable(stats: Stats): boolean {
	if (isWindows) return true;

	const isGroup = stats.gid ? process.getgid != null && stats.gid === process.getgid() : true;
	const isUser = stats.uid ? process.getuid != null && stats.uid === process.getuid() : true;

	return Boolean(stats.mode & 0o0001 || (stats.mode & 0o0010 && isGroup) || (stats.mode & 0o0100 && isUser));
}

/**
 * Finds the executable to run. On Windows, also tries the usual executable
 * extensions, since spawn there doesn't run down PATH the way it does on POSIX.
 */
export function findExecutable(exe: string): string {
	if (!isWindows || existsSync(exe)) return runDownPath(exe);

	for (const ext of ['.exe', '.cmd', '.bat']) {
		const possibleFullPath = runDownPath(`${exe}${ext}`);
		if (existsSync(possibleFullPath)) return possibleFullPath;
	}

	return exe;
}

export interface RunOptions {
	cwd?: string;
	readonly env?: NodeJS.ProcessEnv;
	/**
	 * The size the output buffer to allocate to the spawned process. Set this
	 * if you are anticipating a large amount of output.
	 *
	 * If not specified, this will be 100MB which should be
	 * enough for most Git operations.
	 */
	readonly maxBuffer?: number;
	/** Aborting the signal kills the process and rejects with a {@link CancelledRunError} */
	readonly signal?: AbortSignal;
}

const bufferExceededRegex = /stdout maxBuffer( length)? exceeded/;

/** Returns `encoding` when iconv-lite supports it, otherwise utf8 */
export function getEncoding(encoding: string | undefined): string {
	return encoding != null && iconv.encodingExists(encoding) ? encoding : 'utf8';
}

export function decodeOutput(data: Buffer, encoding: string): string {
	if (encoding === 'utf8' || encoding === 'utf-8') return data.toString('utf8');
	return iconv.decode(data, encoding);
}

/**
 * Runs a command to completion, resolving with its decoded stdout.
 * Output in encodings other than utf8 is decoded with iconv-lite.
 */
export function run(command: string, args: readonly string[], encoding: string, options?: RunOptions): Promise<string> {
	const { signal, ...opts } = { maxBuffer: 100 * 1024 * 1024, ...options };
	if (signal?.aborted) return Promise.reject(new CancelledRunError(command, false));

	let cancelled = false;
	return new Promise<string>((resolve, reject) => {
		const proc = execFile(
			command,
			args,
			{ ...opts, encoding: 'buffer' },
			(error: ExecFileException | null, stdout: Buffer, stderr: Buffer) => {
				signal?.removeEventListener('abort', onAbort);
				if (cancelled) return;

				try {
					if (error != null) {
						if (bufferExceededRegex.test(error.message)) {
							error.message = `Command output exceeded the allocated stdout buffer. Set 'options.maxBuffer' to a larger value than ${opts.maxBuffer} bytes`;
						}

						reject(
							new RunError(
								{
									message: error.message,
									cmd: error.cmd,
									killed: error.killed,
									code: error.code,
									signal: error.signal,
								},
								decodeOutput(stdout, encoding),
								decodeOutput(stderr, encoding),
							),
						);

						return;
					}

					if (stderr.length) {
						Logger.warn(`Warning(${command} ${args.join(' ')}): ${decodeOutput(stderr, encoding)}`);
					}

					resolve(decodeOutput(stdout, encoding));
				} catch (ex) {
					// Undecodable output
					reject(ex instanceof Error ? ex : new Error(String(ex)));
				}
			},
		);

		function onAbort() {
			cancelled = true;
			const killed = proc.kill();
			reject(new CancelledRunError(`${command} ${args.join(' ')}`, killed));
		}
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

export async function fsExists(path: string): Promise<boolean> {
	return new Promise<boolean>(resolve => access(path, constants.F_OK, err => resolve(err == null)));
}
