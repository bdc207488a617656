import type { IGitObjectStore } from './git_object_store';
import type { TreeEntry } from './types';
import { FILE_MODE, TREE_MODE } from './types';
import { InvalidTreePathError } from './errors';

type TreeAccess = Pick<IGitObjectStore, 'readTree' | 'writeTree'>;

/**
 * Splits a repository-relative path into tree entry names.
 *
 * @throws InvalidTreePathError for empty, absolute or relative segments
 */
export function splitTreePath(filePath: string): string[] {
  if (filePath.length === 0) {
    throw new InvalidTreePathError(filePath, 'path is empty');
  }

  const parts = filePath.split('/');
  for (const part of parts) {
    if (part === '') {
      throw new InvalidTreePathError(filePath, 'empty path segment');
    }
    if (part === '.' || part === '..') {
      throw new InvalidTreePathError(filePath, `relative segment "${part}"`);
    }
    if (part.includes('\0')) {
      throw new InvalidTreePathError(filePath, 'NUL byte in path');
    }
  }
  return parts;
}

/**
 * Rebuilds the trees along filePath so that it points at blobSha.
 *
 * Entries that are not on the path are carried over as-is, so their shas
 * (and whole untouched subtrees) stay byte-identical to the base.
 */
export async function buildTreeWithFile(
  store: TreeAccess,
  baseTreeSha: string | null,
  filePath: string,
  blobSha: string
): Promise<string> {
  const parts = splitTreePath(filePath);
  return rebuildLevel(store, baseTreeSha, parts, blobSha);
}

async function rebuildLevel(
  store: TreeAccess,
  treeSha: string | null,
  parts: readonly string[],
  blobSha: string
): Promise<string> {
  const [name, ...rest] = parts;
  if (name === undefined) {
    throw new InvalidTreePathError('', 'path is empty');
  }

  const entries = treeSha ? await store.readTree(treeSha) : [];
  const existing = entries.find(entry => entry.name === name);

  let replacement: TreeEntry;
  if (rest.length === 0) {
    // keep an existing executable/symlink mode when overwriting a blob
    const mode = existing?.type === 'blob' ? existing.mode : FILE_MODE;
    replacement = { mode, type: 'blob', sha: blobSha, name };
  } else {
    const childBase = existing?.type === 'tree' ? existing.sha : null;
    const childSha = await rebuildLevel(store, childBase, rest, blobSha);
    replacement = { mode: TREE_MODE, type: 'tree', sha: childSha, name };
  }

  const nextEntries = entries.filter(entry => entry.name !== name);
  nextEntries.push(replacement);
  return store.writeTree(nextEntries);
}

/**
 * Unions two trees. On a shared name the preferred entry is kept, except
 * that two different subtrees are unioned level by level.
 */
export async function mergeTrees(store: TreeAccess, preferredSha: string, otherSha: string): Promise<string> {
  if (preferredSha === otherSha) {
    return preferredSha;
  }

  const preferred = await store.readTree(preferredSha);
  const other = await store.readTree(otherSha);
  const otherByName = new Map(other.map(entry => [entry.name, entry]));

  const merged: TreeEntry[] = [];
  for (const entry of preferred) {
    const counterpart = otherByName.get(entry.name);
    otherByName.delete(entry.name);
    if (entry.type === 'tree' && counterpart?.type === 'tree' && counterpart.sha !== entry.sha) {
      merged.push({ ...entry, sha: await mergeTrees(store, entry.sha, counterpart.sha) });
    } else {
      merged.push(entry);
    }
  }
  merged.push(...otherByName.values());
  return store.writeTree(merged);
}
