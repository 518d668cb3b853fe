/**
 * Format an unknown thrown value into a single-line message.
 * Error causes are appended so wrapped transport errors keep their origin.
 */
export function formatError(err: unknown): string {
	if (!(err instanceof Error)) {
		return String(err);
	}
	if (err.cause instanceof Error && !err.message.includes(err.cause.message)) {
		return `${err.message} (caused by: ${err.cause.message})`;
	}
	return err.message;
}
