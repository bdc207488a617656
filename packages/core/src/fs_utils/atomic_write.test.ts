import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isErrnoException, readFileIfExists, writeFileAtomic } from './atomic_write';

describe('atomic_write', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tasksync-fs-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create missing parent directories and write the content', async () => {
    const target = path.join(tempDir, 'nested', 'dir', 'file.json');

    await writeFileAtomic(target, '{"a":1}\n');

    expect(fs.readFileSync(target, 'utf-8')).toBe('{"a":1}\n');
  });

  it('should replace existing content and leave no temp files behind', async () => {
    const target = path.join(tempDir, 'file.txt');
    fs.writeFileSync(target, 'old');

    await writeFileAtomic(target, 'new');

    expect(fs.readFileSync(target, 'utf-8')).toBe('new');
    expect(fs.readdirSync(tempDir)).toEqual(['file.txt']);
  });

  it('should return null for a missing file', async () => {
    expect(await readFileIfExists(path.join(tempDir, 'missing.txt'))).toBeNull();
  });

  it('should rethrow errors other than a missing file', async () => {
    await expect(readFileIfExists(tempDir)).rejects.toThrow();
  });

  describe('isErrnoException', () => {
    it('should accept errno-shaped objects that are not Error instances', () => {
      // fs rejections cross a realm boundary under Jest
      expect(isErrnoException({ code: 'ENOENT', message: 'no such file' })).toBe(true);
    });

    it('should accept Error instances carrying a code', () => {
      expect(isErrnoException(Object.assign(new Error('busy'), { code: 'EBUSY' }))).toBe(true);
    });

    it('should reject values without a string code', () => {
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException({ code: 2 })).toBe(false);
      expect(isErrnoException(null)).toBe(false);
      expect(isErrnoException('ENOENT')).toBe(false);
    });
  });
});
