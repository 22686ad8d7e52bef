import { FileFinder, FileLister, Logger } from '@newestfiles/core';

/**
 * Dependency Injection Service for the newestfiles CLI
 *
 * Creates and caches the core instances commands depend on.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private logger: Logger.Logger | null = null;
  private fileFinders = new Map<string, FileFinder.IFileFinder>();

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the cached instance (tests only)
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Logger shared by commands, the finder and the filesystem walk. Every
   * level goes to stderr since stdout carries the listing; messages have no
   * prefix so they read like any other CLI diagnostic.
   */
  getLogger(): Logger.Logger {
    if (!this.logger) {
      this.logger = Logger.createLogger('', undefined, 'stderr');
    }
    return this.logger;
  }

  /**
   * FileLister rooted at `cwd`
   */
  getFileLister(cwd: string = process.cwd()): FileLister.FileLister {
    return new FileLister.FsFileLister({ cwd, logger: this.getLogger() });
  }

  /**
   * FileFinder over the filesystem rooted at `cwd`, one per directory
   */
  async getFileFinder(cwd: string = process.cwd()): Promise<FileFinder.IFileFinder> {
    let finder = this.fileFinders.get(cwd);
    if (!finder) {
      finder = new FileFinder.FileFinder({ fileLister: this.getFileLister(cwd), logger: this.getLogger() });
      this.fileFinders.set(cwd, finder);
    }
    return finder;
  }
}
