// Small shared utilities

/** Raised when a value the type system rules out shows up at runtime. */
export class InvariantError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'InvariantError';
	}
}

/**
 * Compile-time exhaustiveness helper. Unlike a plain `never` annotation it also
 * aborts at runtime, so a malformed value from a collaborator cannot slip through
 * as a default case.
 */
export function AssertNever(x: never, message?: string): never {
	throw new InvariantError(message ?? `Unexpected value in AssertNever: ${String(x)}`);
}

export type JsonObject = { [key: string]: unknown };

export function isObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
