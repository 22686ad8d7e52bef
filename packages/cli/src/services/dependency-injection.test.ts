import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileLister } from '@newestfiles/core';
import { DependencyInjectionService } from './dependency-injection';

describe('DependencyInjectionService', () => {
  beforeEach(() => {
    DependencyInjectionService.resetInstance();
  });

  it('should return the same instance until reset', () => {
    const first = DependencyInjectionService.getInstance();

    expect(DependencyInjectionService.getInstance()).toBe(first);

    DependencyInjectionService.resetInstance();
    expect(DependencyInjectionService.getInstance()).not.toBe(first);
  });

  it('should share one logger', () => {
    const service = DependencyInjectionService.getInstance();

    expect(service.getLogger()).toBe(service.getLogger());
  });

  it('should create a filesystem lister', () => {
    const service = DependencyInjectionService.getInstance();

    expect(service.getFileLister('/tmp')).toBeInstanceOf(FileLister.FsFileLister);
  });

  it('should cache one FileFinder per directory', async () => {
    const service = DependencyInjectionService.getInstance();

    const first = await service.getFileFinder('/one');
    const again = await service.getFileFinder('/one');
    const other = await service.getFileFinder('/two');

    expect(again).toBe(first);
    expect(other).not.toBe(first);
  });

  it('should find files under the given directory', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'di-test-'));
    try {
      await fs.writeFile(path.join(tempDir, 'main.go'), 'package main', 'utf-8');
      await fs.writeFile(path.join(tempDir, 'notes.txt'), 'notes', 'utf-8');

      const finder = await DependencyInjectionService.getInstance().getFileFinder(tempDir);
      const result = await finder.find({ extensions: ['go'] });

      expect(result.entries.map(e => e.path)).toEqual(['main.go']);
      expect(result.filtered).toBe(true);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });
});
