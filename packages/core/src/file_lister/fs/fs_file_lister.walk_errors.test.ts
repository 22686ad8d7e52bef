/**
 * FsFileLister directory read failures.
 *
 * fast-glob is mocked so that unreadable directories can be simulated
 * regardless of the user running the tests.
 */

jest.mock('fast-glob', () => ({
  __esModule: true,
  default: jest.fn()
}));

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsFileLister } from './fs_file_lister';
import type { Logger } from '../../logger';

const mockFg = fg as unknown as jest.Mock;

function fileEntry(name: string, size: number, mtimeMs: number) {
  return {
    name,
    path: name,
    dirent: { isDirectory: () => false },
    stats: { size, mtimeMs },
  };
}

function dirEntry(name: string) {
  return {
    name,
    path: name,
    dirent: { isDirectory: () => true },
    stats: { size: 4096, mtimeMs: 0 },
  };
}

function permissionDenied(dir: string): Error {
  return Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: 'EACCES' });
}

describe('FsFileLister directory read failures', () => {
  let tempDir: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(async () => {
    jest.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-file-lister-errors-'));
    logger = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      setLevel: jest.fn(),
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should log an unreadable subdirectory and keep walking', async () => {
    mockFg.mockImplementation(async (_pattern: string, options: { cwd: string }) => {
      if (options.cwd === tempDir) {
        return [fileEntry('a.go', 10, 2000), dirEntry('locked'), fileEntry('z.go', 20, 1000)];
      }
      throw permissionDenied(options.cwd);
    });

    const lister = new FsFileLister({ cwd: tempDir, logger });
    const entries = await lister.walk();

    expect(entries).toEqual([
      { path: 'a.go', modTime: 2000, size: 10 },
      { path: 'z.go', modTime: 1000, size: 20 },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      `Error accessing locked: EACCES: permission denied, scandir '${path.join(tempDir, 'locked')}'`
    );
  });

  it('should fail the whole walk when the root cannot be read', async () => {
    mockFg.mockImplementation(async (_pattern: string, options: { cwd: string }) => {
      throw permissionDenied(options.cwd);
    });

    const lister = new FsFileLister({ cwd: tempDir, logger });

    await expect(lister.walk()).rejects.toMatchObject({
      name: 'FileListerError',
      code: 'PERMISSION_DENIED',
      filePath: tempDir,
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should skip an entry that comes back without metadata', async () => {
    mockFg.mockResolvedValue([
      { name: 'ghost.go', path: 'ghost.go', dirent: { isDirectory: () => false } },
    ]);

    const lister = new FsFileLister({ cwd: tempDir, logger });

    expect(await lister.walk()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Error accessing ghost.go: metadata unavailable');
  });
});
