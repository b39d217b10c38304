import { join } from "path";

/**
 * Returns the root directory the engine reads its `data/` folder from.
 * Prefers the `DIRQUEST_ROOT` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const root = process.env.DIRQUEST_ROOT;
	if (root) return root;
	return process.cwd();
}

/** Directory holding `classes.yaml` and `config.yaml`. */
export function getDataDirectory(): string {
	return join(getSafeRootDirectory(), "data");
}
