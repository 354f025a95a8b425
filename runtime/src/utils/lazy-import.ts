/**
 * Generic lazy-import helper for optional npm dependencies.
 *
 * The browser adapter loads playwright through here by name; the catalog's
 * feature probes use {@link canImport}.
 *
 * @module
 */

/**
 * Dynamically import an optional npm package and configure a client from it.
 *
 * Wraps "Cannot find module" errors with an install message via the
 * caller-provided error factory.
 *
 * @param packageName - npm package to import (e.g. 'openai', 'playwright')
 * @param createError - Factory that creates a domain-specific error from a message
 * @param configure - Extract and instantiate the client from the imported module
 * @returns The configured client instance
 */
export async function ensureLazyModule<T>(
  packageName: string,
  createError: (message: string) => Error,
  configure: (mod: Record<string, unknown>) => T,
): Promise<T> {
  let mod: Record<string, unknown>;
  try {
    mod = await import(packageName);
  } catch {
    throw createError(
      `${packageName} package not installed. Install it: npm install ${packageName}`,
    );
  }
  return configure(mod);
}

/**
 * Report whether a package can be imported, without keeping the module.
 */
export async function canImport(packageName: string): Promise<boolean> {
  try {
    await import(packageName);
    return true;
  } catch {
    return false;
  }
}
