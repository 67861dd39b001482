import * as path from "node:path";

/**
 * Express a path relative to the application root as a `$PWD` reference,
 * so it resolves wherever the application is staged.
 */
export function qualifyPath(target: string, root: string): string {
	const relative = path.posix.relative(path.posix.resolve(root), path.posix.resolve(target));
	return `$PWD/${relative}`;
}
