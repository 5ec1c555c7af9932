import { access, realpath } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";

export type DirectoryKey = string;

export type KeyResolver = (directory: string) => Promise<DirectoryKey | null>;

async function exists(p: string): Promise<boolean> {
  try {
    await access(p, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function canonicalDirectory(directory: string): Promise<string> {
  const abs = path.resolve(directory);
  try {
    return await realpath(abs);
  } catch {
    // directory may be gone; the lexical path is still a stable key
    return abs;
  }
}

/**
 * Nearest ancestor of `directory` (itself included) holding one of
 * `configFiles`, canonicalized. Null when there is none up to the root.
 */
export async function findConfigDirectory(directory: string, configFiles: readonly string[]): Promise<DirectoryKey | null> {
  let current = await canonicalDirectory(directory);
  for (;;) {
    for (const name of configFiles) {
      if (await exists(path.join(current, name))) return current;
    }
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function createKeyResolver(configFiles: readonly string[]): KeyResolver {
  return (directory) => findConfigDirectory(directory, configFiles);
}
