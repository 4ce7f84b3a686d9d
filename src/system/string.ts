import * as process from 'process';

export function getDurationMilliseconds(start: [number, number]): number {
	const [secs, nanosecs] = process.hrtime(start);
	return secs * 1000 + Math.floor(nanosecs / 1000000);
}

export function* iterateByDelimiter(data: string, delimiter: string): IterableIterator<string> {
	const delimiterLen = delimiter.length;
	let i = 0;
	let j;

	while (i < data.length) {
		j = data.indexOf(delimiter, i);
		if (j === -1) {
			j = data.length;
		}

		yield data.substring(i, j);
		i = j + delimiterLen;
	}
}

let numericFormat: Intl.NumberFormat | undefined;

/** Formats `count` with thousands separators followed by `s`, adding an `s` unless the count is 1 */
export function pluralize(s: string, count: number): string {
	numericFormat ??= new Intl.NumberFormat('en-US');
	return `${numericFormat.format(count)} ${s}${count === 1 ? '' : 's'}`;
}
