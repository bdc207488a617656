import { SyncBranch } from './sync_branch';
import { MemoryGitObjectStore } from '../git/memory/memory_git_object_store';
import { NotInitializedError } from '../sync/errors';

const REF = 'refs/heads/task-sync';

describe('SyncBranch', () => {
  let store: MemoryGitObjectStore;
  let branch: SyncBranch;
  const noSleep = jest.fn(async (_ms: number) => undefined);

  beforeEach(() => {
    store = new MemoryGitObjectStore();
    branch = new SyncBranch({ store, branch: 'task-sync', retryHooks: { sleep: noSleep } });
    noSleep.mockClear();
  });

  async function createBranch(): Promise<string> {
    const root = await branch.create(await store.writeTree([]), 'Initialize');
    if (!root) throw new Error('branch already existed');
    return root;
  }

  it('should name its refs after the branch', () => {
    expect(branch.ref).toBe(REF);
    expect(branch.trackingRef('origin')).toBe('refs/remotes/origin/task-sync');
  });

  describe('create', () => {
    it('should create the branch once', async () => {
      const root = await createBranch();

      expect(await branch.tip()).toBe(root);
      expect(await branch.create(await store.writeTree([]), 'Again')).toBeNull();
      expect(await branch.tip()).toBe(root);
    });
  });

  describe('requireTip', () => {
    it('should throw NotInitializedError for a missing branch', async () => {
      await expect(branch.requireTip()).rejects.toBeInstanceOf(NotInitializedError);
    });
  });

  describe('treeWithFile', () => {
    it('should add a file on top of a commit tree', async () => {
      const root = await createBranch();
      const tree = await branch.treeWithFile(root, 'dir/file.txt', 'content');
      const commit = await store.commitTree(tree, [root], 'Add file');

      expect(await branch.readFile(commit, 'dir/file.txt')).toBe('content');
      expect(await branch.readFile(root, 'dir/file.txt')).toBeNull();
    });
  });

  describe('transact', () => {
    it('should commit a planned tree on top of the tip', async () => {
      const root = await createBranch();

      const outcome = await branch.transact<string>(async (tip) => ({
        kind: 'commit',
        treeSha: await branch.treeWithFile(tip, 'a.txt', 'a'),
        parents: [tip],
        message: 'Write a',
        value: 'done',
      }));

      if (outcome.state !== 'success') throw new Error('transaction failed');
      expect(outcome.attempts).toBe(1);
      expect(outcome.value.value).toBe('done');
      expect(outcome.value.created).toBe(true);
      expect(await branch.tip()).toBe(outcome.value.commitSha);
      expect(store.getParents(outcome.value.commitSha)).toEqual([root]);
    });

    it('should leave the ref alone for a noop', async () => {
      const root = await createBranch();

      const outcome = await branch.transact<number>(async () => ({ kind: 'noop', value: 1 }));

      expect(outcome).toEqual({ state: 'success', value: { value: 1, commitSha: root, created: false }, attempts: 1 });
    });

    it('should advance to an existing commit', async () => {
      const root = await createBranch();
      const next = await store.commitTree(await store.getCommitTree(root), [root], 'Next');

      const outcome = await branch.transact<null>(async () => ({ kind: 'advance', commitSha: next, value: null }));

      expect(outcome.state).toBe('success');
      expect(await branch.tip()).toBe(next);
    });

    it('should replan against the new tip after losing the CAS', async () => {
      const root = await createBranch();
      const seenTips: string[] = [];
      const interloper = await store.commitTree(await store.getCommitTree(root), [root], 'Interloper');
      store.interceptNextUpdateRef(async () => {
        store.setRef(REF, interloper);
      });

      const outcome = await branch.transact<string>(async (tip) => {
        seenTips.push(tip);
        return { kind: 'commit', treeSha: await store.getCommitTree(tip), parents: [tip], message: 'Mine', value: tip };
      });

      expect(seenTips).toEqual([root, interloper]);
      expect(outcome.state).toBe('success');
      expect(noSleep).toHaveBeenCalledWith(50);
      const tip = await branch.tip();
      expect(tip && store.getParents(tip)).toEqual([interloper]);
    });

    it('should report failure once retries are exhausted', async () => {
      const root = await createBranch();
      const limited = new SyncBranch({
        store,
        branch: 'task-sync',
        retryPolicy: { maxRetries: 1, initialDelayMs: 5, backoffFactor: 2 },
        retryHooks: { sleep: noSleep },
      });
      const moveTip = async (): Promise<void> => {
        const tip = (await store.resolveRef(REF)) ?? root;
        store.setRef(REF, await store.commitTree(await store.getCommitTree(tip), [tip], 'Interloper'));
        store.interceptNextUpdateRef(moveTip);
      };
      store.interceptNextUpdateRef(moveTip);

      const outcome = await limited.transact<null>(async (tip) => ({
        kind: 'commit',
        treeSha: await store.getCommitTree(tip),
        parents: [tip],
        message: 'Never lands',
        value: null,
      }));

      expect(outcome.state).toBe('failed');
      expect(outcome.attempts).toBe(2);
    });

    it('should throw NotInitializedError without a branch', async () => {
      await expect(branch.transact<null>(async () => ({ kind: 'noop', value: null }))).rejects.toBeInstanceOf(
        NotInitializedError
      );
    });
  });
});
