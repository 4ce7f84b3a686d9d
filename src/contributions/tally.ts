export interface ContributionEntry {
	readonly name: string;
	readonly count: number;
}

export type SortDirection = 'ascending' | 'descending';

/**
 * Commit counts per contributor display name, in the order names were first seen.
 * Names are kept exactly as given; two spellings of one person are two entries.
 */
export class ContributionTally implements Iterable<ContributionEntry> {
	private readonly counts = new Map<string, number>();

	static from(entries: Iterable<ContributionEntry | readonly [string, number]>): ContributionTally {
		const tally = new ContributionTally();
		for (const entry of entries) {
			if (isEntryTuple(entry)) {
				tally.add(entry[0], entry[1]);
			} else {
				tally.add(entry.name, entry.count);
			}
		}
		return tally;
	}

	get size(): number {
		return this.counts.size;
	}

	/** Sum of every contributor's count */
	get total(): number {
		let total = 0;
		for (const count of this.counts.values()) {
			total += count;
		}
		return total;
	}

	add(name: string, count: number): this {
		if (!Number.isInteger(count) || count < 0) {
			throw new RangeError(`Invalid commit count for '${name}': ${count}`);
		}

		this.counts.set(name, (this.counts.get(name) ?? 0) + count);
		return this;
	}

	get(name: string): number {
		return this.counts.get(name) ?? 0;
	}

	has(name: string): boolean {
		return this.counts.has(name);
	}

	/** Returns a new tally with the counts of both; shared names are summed. Neither tally is changed */
	merge(other: ContributionTally): ContributionTally {
		const merged = ContributionTally.from(this);
		for (const { name, count } of other) {
			merged.add(name, count);
		}
		return merged;
	}

	/** Entries ordered by count; ties keep the order names were first added in */
	sorted(direction: SortDirection = 'descending'): ContributionEntry[] {
		const entries = [...this];
		// Array.prototype.sort is stable
		return direction === 'ascending'
			? entries.sort((a, b) => a.count - b.count)
			: entries.sort((a, b) => b.count - a.count);
	}

	*[Symbol.iterator](): IterableIterator<ContributionEntry> {
		for (const [name, count] of this.counts) {
			yield { name: name, count: count };
		}
	}
}

function isEntryTuple(entry: ContributionEntry | readonly [string, number]): entry is readonly [string, number] {
	return Array.isArray(entry);
}
