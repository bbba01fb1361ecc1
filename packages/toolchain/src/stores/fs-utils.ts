import { readdir } from 'node:fs/promises';
import { SOURCE_EXTENSION, stripSourceExtension } from '@deployer/core';

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Names of the `.sol` files in `dir`, without extension. A missing directory lists as empty. */
export async function listSources(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
  return entries
    .filter((entry) => entry.endsWith(SOURCE_EXTENSION))
    .map(stripSourceExtension)
    .sort();
}
