import { Config } from '@taskcheck/core';
import type { TaskStore } from '@taskcheck/core';
import { FsTaskStore } from '@taskcheck/core/fs';

/**
 * Dependency Injection Service for the task checker CLI
 *
 * Builds the TaskStore the commands read from. Tests replace it with
 * setTaskStore().
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private overrideStore: TaskStore | null = null;
  private fsStores = new Map<string, FsTaskStore>();

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
   * Drops the singleton so the next getInstance() starts clean
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Returns the TaskStore for the given task file.
   *
   * @param file - Path from --file; defaults to project-tasks.json in the working directory
   */
  getTaskStore(file?: string): TaskStore {
    if (this.overrideStore) {
      return this.overrideStore;
    }

    const filePath = Config.resolveTaskStorePath(file);
    let store = this.fsStores.get(filePath);
    if (!store) {
      store = new FsTaskStore(filePath);
      this.fsStores.set(filePath, store);
    }
    return store;
  }

  /**
   * Replaces the store for every command; pass null to go back to the filesystem
   */
  setTaskStore(store: TaskStore | null): void {
    this.overrideStore = store;
  }
}
