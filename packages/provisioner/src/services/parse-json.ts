export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON document, handing parse failures to the caller's error factory.
 */
export function parseJsonDocument(text: string, createError: (message: string) => Error): unknown {
	try {
		return JSON.parse(text);
	} catch (err) {
		throw createError(err instanceof Error ? err.message : String(err));
	}
}
