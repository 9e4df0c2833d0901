import { pathToFileURL } from "url"

/**
 * Import all given typescript files so that trigger their decorators
 * and register their classes and functions inside the registry.
 *
 * @param files List of absolute paths of the files to load.
 */
export async function load(files: string[]): Promise<unknown[]> {
  return await Promise.all(
    files.map(async (f): Promise<unknown> => await import(pathToFileURL(f).href)),
  )
}
