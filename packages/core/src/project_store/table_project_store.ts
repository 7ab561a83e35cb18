import { ModelError, TransactionError } from '../errors/errors';
import type { Logger } from '../logger/logger';
import type { Project } from '../model/project';
import { formatQualifiedName } from '../model/names';
import { compareNatural } from '../utils/natural_sort';
import type { ProjectStore, TransactionScope } from './project_store';
import type { ProjectRow, ProjectTables } from './project_store.types';
import { copyTables, dataPointKey, packProject, unpackProject } from './row_mapping';

class Scope implements TransactionScope {
  private _aborted = false;
  private open = true;

  get aborted(): boolean {
    return this._aborted;
  }

  abort(): void {
    if (!this.open) {
      throw new TransactionError('Transaction scope is already closed');
    }
    this._aborted = true;
  }

  close(): void {
    this.open = false;
  }
}

function isThenable(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function qualifiedNameOf(row: ProjectRow): string {
  return formatQualifiedName(row.name, row.organization);
}

/**
 * Shared ProjectStore logic over in-memory row tables.
 *
 * Subclasses decide where committed tables go by implementing `persist`;
 * the tables are only replaced once `persist` returns.
 */
export abstract class TableProjectStore implements ProjectStore {
  protected tables: ProjectTables;
  protected readonly logger: Logger;
  private activeScope: Scope | null = null;

  protected constructor(tables: ProjectTables, logger: Logger) {
    this.tables = tables;
    this.logger = logger;
  }

  /**
   * Makes committed tables durable.
   * Throwing here fails the commit and restores the previous tables.
   */
  protected abstract persist(tables: ProjectTables): void;

  // ─────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────

  listAll(): Project[] {
    return [...this.tables.projects.values()]
      .sort((a, b) => compareNatural(qualifiedNameOf(a), qualifiedNameOf(b)))
      .map(row => unpackProject(row, this.tables));
  }

  getByQualifiedName(qualifiedName: string): Project | null {
    const row = this.findRow(qualifiedName);
    return row ? unpackProject(row, this.tables) : null;
  }

  allNamed(...qualifiedNames: string[]): Project[] {
    const projects: Project[] = [];
    for (const name of qualifiedNames) {
      const project = this.getByQualifiedName(name);
      if (project) projects.push(project);
    }
    return projects;
  }

  matchingName(partial: string): string[] {
    const prefix = partial.trim().toLowerCase();
    return [...this.tables.projects.values()]
      .map(qualifiedNameOf)
      .filter(name => name.toLowerCase().startsWith(prefix))
      .sort(compareNatural);
  }

  // ─────────────────────────────────────────────────────────
  // Writes
  // ─────────────────────────────────────────────────────────

  save(project: Project): void {
    const name = project.name.toLowerCase();
    const organization = project.organization?.toLowerCase() ?? null;
    const qualifiedName = formatQualifiedName(name, organization);

    this.write(() => {
      const existing = this.findRow(qualifiedName);
      if (existing && existing.id !== project.id) {
        throw new ModelError(`Another project is already stored as ${qualifiedName}`, 'DUPLICATE_PROJECT');
      }

      // Packing may refuse the aggregate; rename only once it cannot fail
      const packed = packProject(project);
      project.rename(name, organization);

      this.removeGraph(project.id);
      this.tables.projects.set(packed.project.id, { ...packed.project, name, organization });
      for (const row of packed.metrics) this.tables.metrics.set(row.id, row);
      for (const row of packed.tasks) this.tables.tasks.set(row.id, row);
      for (const row of packed.dataPoints) this.tables.dataPoints.set(dataPointKey(row), row);

      this.logger.debug(`Saved ${qualifiedName}`);
    });
  }

  delete(...projects: Project[]): void {
    this.write(() => {
      for (const project of projects) {
        if (this.removeGraph(project.id)) {
          this.logger.debug(`Deleted ${project.qualifiedName}`);
        }
      }
    });
  }

  scopedTransaction<T>(work: (scope: TransactionScope) => T): T {
    if (this.activeScope) {
      throw new TransactionError('Transactions cannot be nested');
    }

    const snapshot = copyTables(this.tables);
    const scope = new Scope();
    this.activeScope = scope;

    try {
      const result = work(scope);
      if (isThenable(result)) {
        throw new TransactionError('Transaction work must be synchronous');
      }
      if (scope.aborted) {
        this.tables = snapshot;
        this.logger.debug('Transaction aborted');
        return result;
      }
      this.commit();
      return result;
    } catch (error) {
      this.tables = snapshot;
      this.logger.debug('Transaction rolled back');
      throw error;
    } finally {
      scope.close();
      this.activeScope = null;
    }
  }

  // ─────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────

  private write(change: () => void): void {
    if (this.activeScope) {
      change();
      return;
    }
    this.scopedTransaction(change);
  }

  private commit(): void {
    try {
      this.persist(this.tables);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransactionError(`Failed to commit project store: ${reason}`, error);
    }
    this.logger.debug(`Committed ${this.tables.projects.size} project(s)`);
  }

  private findRow(qualifiedName: string): ProjectRow | null {
    const wanted = qualifiedName.trim().toLowerCase();
    for (const row of this.tables.projects.values()) {
      if (qualifiedNameOf(row).toLowerCase() === wanted) return row;
    }
    return null;
  }

  /**
   * Removes a project's rows in dependency order: data points, tasks,
   * metrics, then the project itself.
   */
  private removeGraph(projectId: string): boolean {
    const taskIds = new Set<string>();
    for (const task of this.tables.tasks.values()) {
      if (task.projectId === projectId) taskIds.add(task.id);
    }
    const metricIds = new Set<string>();
    for (const metric of this.tables.metrics.values()) {
      if (metric.projectId === projectId) metricIds.add(metric.id);
    }

    for (const [key, point] of this.tables.dataPoints) {
      if (taskIds.has(point.taskId) || metricIds.has(point.metricId)) {
        this.tables.dataPoints.delete(key);
      }
    }
    for (const id of taskIds) this.tables.tasks.delete(id);
    for (const id of metricIds) this.tables.metrics.delete(id);
    return this.tables.projects.delete(projectId);
  }
}
