import debug from 'debug';

const BASE_NAMESPACE = 'computed-hash';

/**
 * Logger for one subsystem, e.g. `createLogger('migration:resolver')` logs under
 * `computed-hash:migration:resolver`. Warnings go to `log.extend('warn')`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Turns on logging for a namespace pattern, optionally redirecting output.
 * `computed-hash:*:warn` shows only insecure-algorithm warnings.
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

export function disableLogging(): void {
	debug.disable();
}

/** @param namespace Subsystem namespace, without the `computed-hash:` prefix */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
