/**
 * MemoryGitObjectStore - In-memory object database for tests
 *
 * Content-addressed blobs, trees and commits plus a ref table, all kept in
 * memory with no filesystem or subprocess access. Remotes are other
 * MemoryGitObjectStore instances; fetch and push copy objects between them.
 *
 * Test Helpers:
 * - addRemote(name, store): Register another store as a remote
 * - interceptNextUpdateRef(fn): Run fn right before the next CAS is evaluated
 * - setRef(ref, sha): Move a ref without CAS
 * - listRefs(): Snapshot of the ref table
 *
 * @module git/memory
 */

import { createHash } from 'crypto';
import type { IGitObjectStore } from '../git_object_store';
import type { PushOutcome, TreeEntry } from '../types';
import { GitCommandError, ObjectNotFoundError } from '../errors';
import { buildTreeWithFile } from '../tree_builder';

type MemoryObject =
  | { type: 'blob'; content: string }
  | { type: 'tree'; entries: TreeEntry[] }
  | { type: 'commit'; tree: string; parents: string[]; message: string; sequence: number };

type UpdateRefInterceptor = (ref: string) => Promise<void>;

export class MemoryGitObjectStore implements IGitObjectStore {
  private readonly objects = new Map<string, MemoryObject>();
  private readonly refs = new Map<string, string>();
  private readonly remotes = new Map<string, MemoryGitObjectStore>();
  private interceptor: UpdateRefInterceptor | null = null;
  private commitSequence = 0;

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  addRemote(name: string, remote: MemoryGitObjectStore): void {
    this.remotes.set(name, remote);
  }

  /**
   * Registers a one-shot hook awaited inside the next updateRef call,
   * after the caller has prepared its commit and before the CAS compares.
   */
  interceptNextUpdateRef(interceptor: UpdateRefInterceptor): void {
    this.interceptor = interceptor;
  }

  setRef(ref: string, sha: string): void {
    this.refs.set(ref, sha);
  }

  listRefs(): Record<string, string> {
    return Object.fromEntries(this.refs);
  }

  /** Parents of a commit, for history assertions */
  getParents(commitSha: string): string[] {
    return [...this.getCommit(commitSha).parents];
  }

  getCommitMessage(commitSha: string): string {
    return this.getCommit(commitSha).message;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private store(object: MemoryObject): string {
    const sha = hashObject(object);
    if (!this.objects.has(sha)) {
      this.objects.set(sha, object);
    }
    return sha;
  }

  private getCommit(sha: string): Extract<MemoryObject, { type: 'commit' }> {
    const object = this.objects.get(sha);
    if (!object || object.type !== 'commit') {
      throw new ObjectNotFoundError(sha, 'commit');
    }
    return object;
  }

  private getTree(sha: string): Extract<MemoryObject, { type: 'tree' }> {
    const object = this.objects.get(sha);
    if (!object || object.type !== 'tree') {
      throw new ObjectNotFoundError(sha, 'tree');
    }
    return object;
  }

  private ancestors(commitSha: string): Set<string> {
    const seen = new Set<string>();
    const queue = [commitSha];
    while (queue.length > 0) {
      const sha = queue.shift();
      if (sha === undefined || seen.has(sha)) continue;
      seen.add(sha);
      queue.push(...this.getCommit(sha).parents);
    }
    return seen;
  }

  private copyObjectsFrom(other: MemoryGitObjectStore): void {
    for (const [sha, object] of other.objects) {
      if (!this.objects.has(sha)) {
        this.objects.set(sha, object);
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(): Promise<boolean> {
    return true;
  }

  async resolveRef(ref: string): Promise<string | null> {
    const target = this.refs.get(ref);
    if (target !== undefined) {
      return target;
    }
    const object = this.objects.get(ref);
    return object?.type === 'commit' ? ref : null;
  }

  async getFileAtRef(ref: string, filePath: string): Promise<string | null> {
    const commitSha = await this.resolveRef(ref);
    if (!commitSha) {
      return null;
    }

    let current: MemoryObject | undefined = this.objects.get(this.getCommit(commitSha).tree);
    for (const name of filePath.split('/')) {
      if (!current || current.type !== 'tree') {
        return null;
      }
      const entry = current.entries.find(candidate => candidate.name === name);
      current = entry ? this.objects.get(entry.sha) : undefined;
    }

    return current?.type === 'blob' ? current.content : null;
  }

  async readTree(treeSha: string): Promise<TreeEntry[]> {
    return this.getTree(treeSha).entries.map(entry => ({ ...entry }));
  }

  async getCommitTree(commitSha: string): Promise<string> {
    return this.getCommit(commitSha).tree;
  }

  async getMergeBase(commitA: string, commitB: string): Promise<string | null> {
    const fromA = this.ancestors(commitA);
    const queue = [commitB];
    const seen = new Set<string>();
    while (queue.length > 0) {
      const sha = queue.shift();
      if (sha === undefined || seen.has(sha)) continue;
      if (fromA.has(sha)) {
        return sha;
      }
      seen.add(sha);
      queue.push(...this.getCommit(sha).parents);
    }
    return null;
  }

  async hasRemote(remote: string): Promise<boolean> {
    return this.remotes.has(remote);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async writeBlob(content: string): Promise<string> {
    return this.store({ type: 'blob', content });
  }

  async writeTree(entries: readonly TreeEntry[]): Promise<string> {
    const names = new Set<string>();
    for (const entry of entries) {
      if (names.has(entry.name)) {
        throw new GitCommandError(`Duplicate tree entry: ${entry.name}`);
      }
      names.add(entry.name);
      if (entry.type !== 'commit' && !this.objects.has(entry.sha)) {
        throw new ObjectNotFoundError(entry.sha, entry.type);
      }
    }
    const sorted = [...entries]
      .map(entry => ({ ...entry }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return this.store({ type: 'tree', entries: sorted });
  }

  async buildTreeWithFile(baseTreeSha: string | null, filePath: string, blobSha: string): Promise<string> {
    return buildTreeWithFile(this, baseTreeSha, filePath, blobSha);
  }

  async commitTree(treeSha: string, parents: readonly string[], message: string): Promise<string> {
    this.getTree(treeSha);
    for (const parent of parents) {
      this.getCommit(parent);
    }
    // the sequence number keeps otherwise identical commits distinct, like timestamps do in git
    this.commitSequence += 1;
    return this.store({
      type: 'commit',
      tree: treeSha,
      parents: [...parents],
      message,
      sequence: this.commitSequence,
    });
  }

  async updateRef(ref: string, newSha: string, expectedOldSha: string | null): Promise<boolean> {
    const interceptor = this.interceptor;
    if (interceptor) {
      this.interceptor = null;
      await interceptor(ref);
    }

    this.getCommit(newSha);
    const current = this.refs.get(ref) ?? null;
    if (current !== expectedOldSha) {
      return false;
    }
    this.refs.set(ref, newSha);
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REMOTE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  private getRemote(remote: string): MemoryGitObjectStore {
    const store = this.remotes.get(remote);
    if (!store) {
      throw new GitCommandError(
        `Failed to reach ${remote}`,
        `fatal: '${remote}' does not appear to be a git repository`
      );
    }
    return store;
  }

  async fetchRef(remote: string, branch: string, trackingRef: string): Promise<boolean> {
    const store = this.getRemote(remote);
    const remoteSha = store.refs.get(`refs/heads/${branch}`);
    if (remoteSha === undefined) {
      return false;
    }
    this.copyObjectsFrom(store);
    this.refs.set(trackingRef, remoteSha);
    return true;
  }

  async pushRef(remote: string, localRef: string, remoteBranch: string, trackingRef: string): Promise<PushOutcome> {
    const store = this.getRemote(remote);
    const localSha = await this.resolveRef(localRef);
    if (!localSha) {
      throw new GitCommandError(`Cannot push ${localRef}: ref does not exist`);
    }

    const remoteRef = `refs/heads/${remoteBranch}`;
    const remoteSha = store.refs.get(remoteRef);
    if (remoteSha !== undefined && remoteSha !== localSha && !this.ancestors(localSha).has(remoteSha)) {
      return 'rejected';
    }

    store.copyObjectsFrom(this);
    store.refs.set(remoteRef, localSha);
    this.refs.set(trackingRef, localSha);
    return 'pushed';
  }
}

function hashObject(object: MemoryObject): string {
  let payload: string;
  switch (object.type) {
    case 'blob':
      payload = object.content;
      break;
    case 'tree':
      payload = object.entries.map(entry => `${entry.mode} ${entry.name}\0${entry.sha}`).join('');
      break;
    case 'commit':
      payload = [
        `tree ${object.tree}`,
        ...object.parents.map(parent => `parent ${parent}`),
        `sequence ${object.sequence}`,
        '',
        object.message,
      ].join('\n');
      break;
  }
  const body = Buffer.from(payload, 'utf8');
  return createHash('sha1')
    .update(`${object.type} ${body.length}\0`)
    .update(body)
    .digest('hex');
}
