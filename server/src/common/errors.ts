/**
 * Stack trace of a thrown value for `Logger.error`, or its string form when
 * something other than an Error was thrown.
 */
export function errorStack(err: unknown): string {
	if (err instanceof Error) return err.stack ?? `${err.name}: ${err.message}`;
	return String(err);
}
