const MASK = "***";

/**
 * Replace every occurrence of the given values with a mask.
 * Empty values are ignored.
 */
export function redact(text: string, values: readonly string[] = []): string {
	let result = text;
	for (const value of values) {
		if (value) {
			result = result.split(value).join(MASK);
		}
	}
	return result;
}
