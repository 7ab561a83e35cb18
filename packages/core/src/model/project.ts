import { ConfigError, ModelError } from '../errors/errors';
import { generateId } from '../utils/id_generator';
import { sortNaturally } from '../utils/natural_sort';
import { Metric } from './metric';
import type { MetricDefinition, ProjectInit, QualifiedName, TaskInit } from './model.types';
import {
  ORGANIZATION_SEPARATOR,
  formatQualifiedName,
  normalizeMetricName,
  splitQualifiedName,
} from './names';
import { Task } from './task';

/**
 * Root of the aggregate: a project owns its metrics and tasks, and tasks
 * own their data points. Stores persist and delete the whole graph.
 */
export class Project {
  readonly id: string;
  private _name: string;
  private _organization: string | null;
  description: string | null;

  // Insertion order is the declaration order of the definition file
  private readonly metrics = new Map<string, Metric>();
  private readonly tasks = new Map<string, Task>();

  constructor(init: ProjectInit) {
    this.id = init.id ?? generateId();
    this._name = '';
    this._organization = null;
    this.rename(init.name, init.organization ?? null);
    this.description = init.description ?? null;
  }

  static splitQualifiedName(qualifiedName: string): QualifiedName {
    return splitQualifiedName(qualifiedName);
  }

  get name(): string {
    return this._name;
  }

  get organization(): string | null {
    return this._organization;
  }

  get qualifiedName(): string {
    return formatQualifiedName(this._name, this._organization);
  }

  /**
   * Without an organization the name must not contain the separator,
   * otherwise the qualified name would read back as organization/name.
   *
   * @throws ModelError when the name is empty or either part breaks the
   *   qualified-name format
   */
  rename(name: string, organization: string | null = this._organization): void {
    const trimmedName = name.trim();
    const trimmedOrg = organization?.trim() || null;
    if (!trimmedName) {
      throw new ModelError('Project name must not be empty');
    }
    if (trimmedOrg?.includes(ORGANIZATION_SEPARATOR)) {
      throw new ModelError(
        `Organization must not contain "${ORGANIZATION_SEPARATOR}": ${trimmedOrg}`,
        'MALFORMED_REFERENCE'
      );
    }
    if (!trimmedOrg && trimmedName.includes(ORGANIZATION_SEPARATOR)) {
      throw new ModelError(
        `Project name must not contain "${ORGANIZATION_SEPARATOR}" without an organization: ${trimmedName}`,
        'MALFORMED_REFERENCE'
      );
    }
    this._name = trimmedName;
    this._organization = trimmedOrg;
  }

  // ─────────────────────────────────────────────────────────
  // Metrics
  // ─────────────────────────────────────────────────────────

  /**
   * Declares a metric on this project.
   * @throws ConfigError when a metric with the same name exists
   */
  addMetric(definition: MetricDefinition, id?: string): Metric {
    const metric = new Metric({ ...definition, id, projectId: this.id });
    if (this.metrics.has(metric.name)) {
      throw new ConfigError(`Metric "${metric.name}" already exists in project ${this.qualifiedName}`);
    }
    this.metrics.set(metric.name, metric);
    return metric;
  }

  /**
   * Finds a metric by exact name, then by its normalized form
   * (case, underscores and repeated whitespace ignored).
   */
  metric(name: string): Metric | null {
    const exact = this.metrics.get(name);
    if (exact) return exact;

    const wanted = normalizeMetricName(name);
    for (const metric of this.metrics.values()) {
      if (normalizeMetricName(metric.name) === wanted) return metric;
    }
    return null;
  }

  /**
   * Like `metric()` but throws when nothing matches.
   * @throws ModelError
   */
  requireMetric(name: string): Metric {
    const metric = this.metric(name);
    if (!metric) {
      throw new ModelError(`No metric "${name}" in project ${this.qualifiedName}`, 'METRIC_NOT_FOUND');
    }
    return metric;
  }

  /** Metrics in declaration order. */
  metricList(): Metric[] {
    return [...this.metrics.values()];
  }

  /**
   * Removes a metric and every data point recorded against it.
   */
  removeMetric(name: string): Metric | null {
    const metric = this.metric(name);
    if (!metric) return null;

    this.metrics.delete(metric.name);
    metric.detach();
    for (const task of this.tasks.values()) {
      task.dropMetric(metric.id);
    }
    return metric;
  }

  // ─────────────────────────────────────────────────────────
  // Tasks
  // ─────────────────────────────────────────────────────────

  task(name: string): Task | null {
    return this.tasks.get(name.trim()) ?? null;
  }

  /**
   * @throws ModelError when a task with the same name exists
   */
  addTask(name: string, description?: string | null): Task {
    return this.attachTask({ name, description, projectId: this.id });
  }

  /** Returns the named task, creating it on first use. */
  ensureTask(name: string, description?: string | null): Task {
    return this.task(name) ?? this.addTask(name, description);
  }

  /**
   * Adds a fully formed task (with id, timestamps and data points), as
   * rebuilt by a store.
   */
  restoreTask(init: Omit<TaskInit, 'projectId'>): Task {
    return this.attachTask({ ...init, projectId: this.id });
  }

  removeTask(name: string): Task | null {
    const task = this.task(name);
    if (!task) return null;
    this.tasks.delete(task.name);
    return task;
  }

  /** Tasks in natural name order ("Task 2" before "Task 10"). */
  taskList(): Task[] {
    return sortNaturally(this.tasks.values(), task => task.name);
  }

  private attachTask(init: TaskInit): Task {
    const task = new Task(init);
    if (this.tasks.has(task.name)) {
      throw new ModelError(`Task "${task.name}" already exists in project ${this.qualifiedName}`, 'DUPLICATE_TASK');
    }
    for (const point of task.dataPoints()) {
      if (!this.hasMetricId(point.metricId)) {
        throw new ModelError(`Task "${task.name}" references unknown metric ${point.metricId}`);
      }
    }
    this.tasks.set(task.name, task);
    return task;
  }

  private hasMetricId(id: string): boolean {
    for (const metric of this.metrics.values()) {
      if (metric.id === id) return true;
    }
    return false;
  }
}
