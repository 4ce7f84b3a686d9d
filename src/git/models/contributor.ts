export interface GitContributor {
	readonly name: string;
	readonly email: string | undefined;
	readonly contributionCount: number;
}
