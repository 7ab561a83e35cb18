import type { Project } from '../model/project';

/**
 * Handle passed to the work function of `scopedTransaction`.
 */
export interface TransactionScope {
  /** Discards every change made in the scope once the work returns. */
  abort(): void;
  readonly aborted: boolean;
}

/**
 * ProjectStore - repository of Project aggregates
 *
 * Every read returns detached copies rebuilt from storage; a change to an
 * aggregate is only persistent after `save`. All operations are
 * synchronous.
 */
export interface ProjectStore {
  /** All projects, ordered by qualified name. */
  listAll(): Project[];

  /**
   * Finds a project by `organization/name` (or bare `name`),
   * ignoring case.
   */
  getByQualifiedName(qualifiedName: string): Project | null;

  /** Projects for each name that exists, in the order requested. */
  allNamed(...qualifiedNames: string[]): Project[];

  /** Stored qualified names starting with `partial`, ignoring case. */
  matchingName(partial: string): string[];

  /**
   * Upserts the whole aggregate. Lower-cases `organization` and `name`
   * on the aggregate and in storage. Metrics, tasks and data points no
   * longer on the aggregate are deleted.
   * @throws ModelError when a different project is stored under the same
   *   qualified name
   */
  save(project: Project): void;

  /**
   * Deletes each project with its data points, tasks and metrics.
   * Projects that were never stored are ignored.
   */
  delete(...projects: Project[]): void;

  /**
   * Runs `work` as one unit: its writes are committed together when it
   * returns, and discarded when it throws or calls `scope.abort()`.
   * Writes outside a scope commit immediately.
   * @throws TransactionError on nested scopes, asynchronous work, or a
   *   failed commit
   */
  scopedTransaction<T>(work: (scope: TransactionScope) => T): T;
}
