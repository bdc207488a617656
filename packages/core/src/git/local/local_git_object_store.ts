/**
 * LocalGitObjectStore - git CLI plumbing implementation of IGitObjectStore
 *
 * Uses hash-object, mktree, ls-tree, commit-tree and update-ref so that
 * state can be written to a branch that is never checked out. The working
 * tree, the index and HEAD are never read or modified.
 *
 * @module git/local
 */

import type { IGitObjectStore } from '../git_object_store';
import type {
  CommitAuthor,
  ExecCommand,
  ExecOptions,
  ExecResult,
  GitCallOptions,
  GitObjectStoreDependencies,
  PushOutcome,
  TreeEntry,
  TreeEntryType,
} from '../types';
import { GitCommandError } from '../errors';
import { buildTreeWithFile } from '../tree_builder';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[GitObjectStore] ');

const DEFAULT_TIMEOUT_MS = 60_000;

/** update-ref reports every lost race (stale old value, held lock) this way */
const CAS_MISMATCH_PATTERN = /cannot lock ref/i;

const MISSING_REMOTE_REF_PATTERN = /couldn't find remote ref/i;

const PUSH_REJECTED_PATTERN = /\[rejected\]|non-fast-forward|fetch first|\(stale info\)/i;

export class LocalGitObjectStore implements IGitObjectStore {
  private repoRoot: string;
  private readonly execCommand: ExecCommand;
  private readonly author: CommitAuthor | undefined;
  private readonly timeoutMs: number;

  /**
   * @param dependencies - Required dependencies (execCommand) and optional config (repoRoot)
   * @throws Error if execCommand is not provided
   */
  constructor(dependencies: GitObjectStoreDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitObjectStore');
    }

    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot || '';
    this.author = dependencies.author;
    this.timeoutMs = dependencies.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel'], {
        timeout: this.timeoutMs,
      });
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr, 'git rev-parse --show-toplevel');
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  /**
   * Executes a git command and returns the raw result.
   * Callers decide which non-zero exits are expected.
   */
  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.ensureRepoRoot();
    logger.debug(`git ${args.join(' ')}`);
    return this.execCommand('git', args, {
      ...options,
      cwd,
      timeout: options?.timeout ?? this.timeoutMs,
    });
  }

  /**
   * Executes a git command that must succeed and returns its trimmed stdout.
   *
   * @throws GitCommandError if the command exits non-zero
   */
  private async runGit(args: string[], failureMessage: string, options?: ExecOptions): Promise<string> {
    const result = await this.execGit(args, options);
    if (result.exitCode !== 0) {
      throw new GitCommandError(failureMessage, result.stderr.trim(), `git ${args.join(' ')}`, result.stdout);
    }
    return result.stdout.trim();
  }

  private authorEnv(): Record<string, string> | undefined {
    if (!this.author) return undefined;
    return {
      GIT_AUTHOR_NAME: this.author.name,
      GIT_AUTHOR_EMAIL: this.author.email,
      GIT_COMMITTER_NAME: this.author.name,
      GIT_COMMITTER_EMAIL: this.author.email,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(options?: GitCallOptions): Promise<boolean> {
    try {
      const result = await this.execGit(['rev-parse', '--git-dir'], { timeout: options?.timeoutMs });
      return result.exitCode === 0;
    } catch (error) {
      if (error instanceof GitCommandError) {
        return false;
      }
      throw error;
    }
  }

  async resolveRef(ref: string, options?: GitCallOptions): Promise<string | null> {
    const args = ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`];
    const result = await this.execGit(args, { timeout: options?.timeoutMs });

    if (result.exitCode === 0) {
      return result.stdout.trim();
    }
    // --quiet keeps stderr empty for a missing ref; anything else is a real failure
    if (result.stderr.trim().length === 0) {
      return null;
    }
    throw new GitCommandError(`Failed to resolve ref "${ref}"`, result.stderr.trim(), `git ${args.join(' ')}`);
  }

  async getFileAtRef(ref: string, filePath: string, options?: GitCallOptions): Promise<string | null> {
    const commitSha = await this.resolveRef(ref, options);
    if (!commitSha) {
      return null;
    }

    const lookupArgs = ['rev-parse', '--verify', '--quiet', `${commitSha}:${filePath}`];
    const lookup = await this.execGit(lookupArgs, { timeout: options?.timeoutMs });
    if (lookup.exitCode !== 0) {
      // --quiet: a missing path is exit 1 with nothing on stderr; a timeout or any other failure is not absence
      if (lookup.exitCode === 1 && lookup.stderr.trim().length === 0) {
        return null;
      }
      throw new GitCommandError(
        `Failed to look up ${filePath} at ${ref}`,
        lookup.stderr.trim(),
        `git ${lookupArgs.join(' ')}`
      );
    }
    const objectSha = lookup.stdout.trim();

    const objectType = await this.runGit(['cat-file', '-t', objectSha], `Failed to read object type of ${objectSha}`, {
      timeout: options?.timeoutMs,
    });
    if (objectType !== 'blob') {
      return null;
    }

    const result = await this.execGit(['cat-file', 'blob', objectSha], { timeout: options?.timeoutMs });
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to read ${filePath} at ${ref}`, result.stderr.trim(), `git cat-file blob ${objectSha}`);
    }
    // blob content is returned verbatim, trailing newline included
    return result.stdout;
  }

  async readTree(treeSha: string): Promise<TreeEntry[]> {
    const args = ['ls-tree', '-z', treeSha];
    const result = await this.execGit(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to read tree ${treeSha}`, result.stderr.trim(), `git ${args.join(' ')}`);
    }
    return parseLsTree(result.stdout);
  }

  async getCommitTree(commitSha: string): Promise<string> {
    return this.runGit(
      ['rev-parse', '--verify', `${commitSha}^{tree}`],
      `Failed to read tree of commit ${commitSha}`
    );
  }

  async getMergeBase(commitA: string, commitB: string, options?: GitCallOptions): Promise<string | null> {
    const args = ['merge-base', commitA, commitB];
    const result = await this.execGit(args, { timeout: options?.timeoutMs });

    if (result.exitCode === 0) {
      return result.stdout.trim() || null;
    }
    // exit 1 without output: the commits share no history
    if (result.exitCode === 1 && result.stderr.trim().length === 0) {
      return null;
    }
    throw new GitCommandError(
      `Failed to find merge base between ${commitA} and ${commitB}`,
      result.stderr.trim(),
      `git ${args.join(' ')}`
    );
  }

  async hasRemote(remote: string, options?: GitCallOptions): Promise<boolean> {
    const result = await this.execGit(['remote', 'get-url', remote], { timeout: options?.timeoutMs });
    return result.exitCode === 0;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async writeBlob(content: string): Promise<string> {
    const sha = await this.runGit(['hash-object', '-w', '--stdin'], 'Failed to write blob', { input: content });
    logger.debug(`Created blob: ${sha}`);
    return sha;
  }

  async writeTree(entries: readonly TreeEntry[]): Promise<string> {
    const input = entries
      .map(entry => `${entry.mode} ${entry.type} ${entry.sha}\t${entry.name}\0`)
      .join('');
    return this.runGit(['mktree', '-z'], 'Failed to write tree', { input });
  }

  async buildTreeWithFile(baseTreeSha: string | null, filePath: string, blobSha: string): Promise<string> {
    const treeSha = await buildTreeWithFile(this, baseTreeSha, filePath, blobSha);
    logger.debug(`Created tree ${treeSha} with ${filePath}`);
    return treeSha;
  }

  async commitTree(treeSha: string, parents: readonly string[], message: string): Promise<string> {
    const args = ['commit-tree', treeSha];
    for (const parent of parents) {
      args.push('-p', parent);
    }
    args.push('-m', message);

    const sha = await this.runGit(args, `Failed to create commit for tree ${treeSha}`, { env: this.authorEnv() });
    logger.debug(`Created commit: ${sha}`);
    return sha;
  }

  async updateRef(ref: string, newSha: string, expectedOldSha: string | null): Promise<boolean> {
    // an empty old value makes update-ref require that the ref does not exist
    const args = ['update-ref', ref, newSha, expectedOldSha ?? ''];
    const result = await this.execGit(args);

    if (result.exitCode === 0) {
      return true;
    }
    if (CAS_MISMATCH_PATTERN.test(result.stderr)) {
      logger.debug(`CAS on ${ref} lost: ${result.stderr.trim()}`);
      return false;
    }
    throw new GitCommandError(`Failed to update ref ${ref}`, result.stderr.trim(), `git ${args.join(' ')}`);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REMOTE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async fetchRef(remote: string, branch: string, trackingRef: string): Promise<boolean> {
    const args = ['fetch', '--no-tags', remote, `+refs/heads/${branch}:${trackingRef}`];
    const result = await this.execGit(args);

    if (result.exitCode === 0) {
      return true;
    }
    if (MISSING_REMOTE_REF_PATTERN.test(result.stderr)) {
      return false;
    }
    throw new GitCommandError(`Failed to fetch ${branch} from ${remote}`, result.stderr.trim(), `git ${args.join(' ')}`);
  }

  async pushRef(remote: string, localRef: string, remoteBranch: string, trackingRef: string): Promise<PushOutcome> {
    const localSha = await this.resolveRef(localRef);
    if (!localSha) {
      throw new GitCommandError(`Cannot push ${localRef}: ref does not exist`);
    }

    const args = ['push', '--porcelain', remote, `${localSha}:refs/heads/${remoteBranch}`];
    const result = await this.execGit(args);

    if (result.exitCode !== 0) {
      if (PUSH_REJECTED_PATTERN.test(result.stdout) || PUSH_REJECTED_PATTERN.test(result.stderr)) {
        return 'rejected';
      }
      throw new GitCommandError(`Failed to push ${localRef} to ${remote}`, result.stderr.trim(), `git ${args.join(' ')}`, result.stdout);
    }

    await this.runGit(['update-ref', trackingRef, localSha], `Failed to update ${trackingRef}`);
    return 'pushed';
  }
}

/**
 * Parses `git ls-tree -z` output: "<mode> SP <type> SP <sha> TAB <name> NUL".
 */
export function parseLsTree(output: string): TreeEntry[] {
  const entries: TreeEntry[] = [];

  for (const record of output.split('\0')) {
    if (record.length === 0) continue;

    const tab = record.indexOf('\t');
    if (tab === -1) {
      throw new GitCommandError(`Unexpected ls-tree record: ${record}`);
    }
    const [mode, type, sha] = record.slice(0, tab).split(' ');
    if (!mode || !sha || !isTreeEntryType(type)) {
      throw new GitCommandError(`Unexpected ls-tree record: ${record}`);
    }
    entries.push({ mode, type, sha, name: record.slice(tab + 1) });
  }

  return entries;
}

function isTreeEntryType(value: string | undefined): value is TreeEntryType {
  return value === 'blob' || value === 'tree' || value === 'commit';
}
