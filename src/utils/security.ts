import * as path from 'path';

/**
 * Resolve a path against a base directory and verify it stays inside it.
 * Template files are addressed relative to the project root; nothing outside it is touched.
 */
export function resolveWithinDir(parentDir: string, childPath: string): string {
  const realParent = path.resolve(parentDir);
  const realChild = path.resolve(realParent, childPath);
  if (!realChild.startsWith(realParent + path.sep) && realChild !== realParent) {
    throw new Error(`Path ${childPath} resolves outside of ${parentDir}`);
  }
  return realChild;
}
