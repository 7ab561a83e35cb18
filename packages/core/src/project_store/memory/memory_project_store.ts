import { createLogger } from '../../logger/logger';
import type { Logger } from '../../logger/logger';
import type { Project } from '../../model/project';
import type { ProjectTables } from '../project_store.types';
import { createTables } from '../row_mapping';
import { TableProjectStore } from '../table_project_store';

/**
 * Options for MemoryProjectStore
 */
export interface MemoryProjectStoreOptions {
  /** Projects stored before the first call (saved as-is, names lower-cased). */
  initial?: Project[];
  logger?: Logger;
  /**
   * Called with the tables on every commit; throwing fails the commit.
   * Lets tests exercise rollback after a failed write.
   */
  onCommit?: (tables: ProjectTables) => void;
}

/**
 * MemoryProjectStore - In-memory implementation of ProjectStore
 *
 * Designed for unit tests and scenarios without persistence.
 *
 * @example
 * const store = new MemoryProjectStore();
 * store.save(new Project({ name: 'backend' }));
 *
 * expect(store.size()).toBe(1);
 * store.clear();
 */
export class MemoryProjectStore extends TableProjectStore {
  private readonly onCommit: ((tables: ProjectTables) => void) | undefined;

  constructor(options: MemoryProjectStoreOptions = {}) {
    super(createTables(), options.logger ?? createLogger('[ProjectStore] '));
    this.onCommit = options.onCommit;
    for (const project of options.initial ?? []) {
      this.save(project);
    }
  }

  protected persist(tables: ProjectTables): void {
    this.onCommit?.(tables);
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of ProjectStore, only for tests)
  // ─────────────────────────────────────────────────────────

  /** Removes every stored row */
  clear(): void {
    this.tables = createTables();
  }

  /** Returns the number of stored projects */
  size(): number {
    return this.tables.projects.size;
  }

  /** Row counts per table (for cascade assertions) */
  rowCounts(): { projects: number; metrics: number; tasks: number; dataPoints: number } {
    return {
      projects: this.tables.projects.size,
      metrics: this.tables.metrics.size,
      tasks: this.tables.tasks.size,
      dataPoints: this.tables.dataPoints.size,
    };
  }
}
