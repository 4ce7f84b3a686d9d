function pad(n: number): string {
	return String(n).padStart(2, '0');
}

/** Formats seconds since the Unix epoch the way `git log --format=%ci` does, in UTC, e.g. `2024-03-01 12:00:00 +0000` */
export function formatGitDate(seconds: number): string {
	const date = new Date(seconds * 1000);
	return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ${pad(
		date.getUTCHours(),
	)}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +0000`;
}
