/**
 * Git Test Helpers
 *
 * Temporary repositories under os.tmpdir() for tests that exercise the git
 * CLI for real. Nothing here touches the repository the tests run from.
 */

import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { execFileSync } from 'child_process';
import { LocalGitObjectStore } from '../git/local/local_git_object_store';
import { createExecCommand, TIMEOUT_EXIT_CODE } from '../git/local/exec_command';
import type { ExecCommand } from '../git/types';

const TEMP_PREFIX = 'tasksync-test-';

const TEST_AUTHOR = { name: 'Test User', email: 'test@example.com' };

export function git(cwd: string, ...args: string[]): string {
  return execFileSync('git', args, { cwd, encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] }).trim();
}

function makeTempDir(kind: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), `${TEMP_PREFIX}${kind}-`));
  // macOS /tmp -> /private/tmp
  return fs.realpathSync(dir);
}

/**
 * Creates a working repository with one commit on its default branch.
 */
export function createTempRepo(): string {
  const repo = makeTempDir('repo');
  git(repo, 'init', '--quiet');
  git(repo, 'config', 'user.name', TEST_AUTHOR.name);
  git(repo, 'config', 'user.email', TEST_AUTHOR.email);
  fs.writeFileSync(path.join(repo, 'README.md'), '# Test Repo\n');
  git(repo, 'add', 'README.md');
  git(repo, 'commit', '--quiet', '-m', 'Initial commit');
  return repo;
}

/** Creates a bare repository to act as a remote */
export function createBareRemote(): string {
  const remote = makeTempDir('remote');
  git(remote, 'init', '--bare', '--quiet');
  return remote;
}

/** Creates a working repository with origin pointing at remotePath */
export function createRepoWithRemote(remotePath: string, remoteName: string = 'origin'): string {
  const repo = createTempRepo();
  git(repo, 'remote', 'add', remoteName, remotePath);
  return repo;
}

/** A directory that is not inside any git repository */
export function createPlainDir(): string {
  return makeTempDir('plain');
}

export function createLocalStore(
  repoRoot: string,
  timeoutMs?: number,
  execCommand: ExecCommand = createExecCommand(repoRoot)
): LocalGitObjectStore {
  return new LocalGitObjectStore({
    repoRoot,
    execCommand,
    author: TEST_AUTHOR,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
  });
}

/**
 * Real execCommand, except that `rev-parse <commit>:<filePath>` lookups
 * report a timeout while `control.timingOut` is set.
 */
export function createTimingOutLookupExec(
  repoRoot: string,
  filePath: string
): { execCommand: ExecCommand; control: { timingOut: boolean } } {
  const real = createExecCommand(repoRoot);
  const control = { timingOut: false };
  const execCommand: ExecCommand = async (command, args, options) => {
    const isLookup = args[0] === 'rev-parse' && args.some(arg => arg.endsWith(`:${filePath}`));
    if (control.timingOut && isLookup) {
      return { exitCode: TIMEOUT_EXIT_CODE, stdout: '', stderr: `git rev-parse timed out after 10ms` };
    }
    return real(command, args, options);
  };
  return { execCommand, control };
}

export function removeTempDir(dir: string): void {
  if (path.basename(dir).startsWith(TEMP_PREFIX)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
