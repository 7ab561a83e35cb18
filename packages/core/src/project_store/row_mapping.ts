import { ModelError } from '../errors/errors';
import type { DataPoint, Metric } from '../model';
import { Project } from '../model/project';
import { unitFor } from '../units/units';
import type {
  DataPointRow,
  MetricRow,
  ProjectRow,
  ProjectStoreDocument,
  ProjectTables,
  TaskRow,
} from './project_store.types';

export type PackedProject = {
  project: ProjectRow;
  metrics: MetricRow[];
  tasks: TaskRow[];
  dataPoints: DataPointRow[];
};

export function createTables(): ProjectTables {
  return {
    projects: new Map(),
    metrics: new Map(),
    tasks: new Map(),
    dataPoints: new Map(),
  };
}

/** Rows are never mutated in place, so copying the maps is enough. */
export function copyTables(tables: ProjectTables): ProjectTables {
  return {
    projects: new Map(tables.projects),
    metrics: new Map(tables.metrics),
    tasks: new Map(tables.tasks),
    dataPoints: new Map(tables.dataPoints),
  };
}

export function dataPointKey(row: Pick<DataPointRow, 'taskId' | 'metricId' | 'entryId'>): string {
  return row.entryId === null
    ? `${row.taskId}:${row.metricId}`
    : `${row.taskId}:${row.metricId}:${row.entryId}`;
}

// ─────────────────────────────────────────────────────────
// Aggregate -> rows
// ─────────────────────────────────────────────────────────

export function packProject(project: Project): PackedProject {
  const metrics = project.metricList();
  const units = new Map(metrics.map(metric => [metric.id, metric.unit]));

  const metricRows = metrics.map((metric): MetricRow => {
    const unit = metric.unit;
    return {
      id: metric.id,
      projectId: project.id,
      name: metric.name,
      valueKind: metric.valueKind,
      description: metric.description,
      allowedValues: metric.allowedValues?.map(value => unit.serialize(value)) ?? null,
      defaultValue: metric.defaultValue === null ? null : unit.serialize(metric.defaultValue),
    };
  });

  const taskRows: TaskRow[] = [];
  const dataPointRows: DataPointRow[] = [];
  for (const task of project.taskList()) {
    taskRows.push({
      id: task.id,
      projectId: project.id,
      name: task.name,
      description: task.description,
      createdAt: task.createdAt.toISOString(),
      lastUpdatedAt: task.lastUpdatedAt.toISOString(),
    });

    for (const point of task.dataPoints()) {
      const unit = units.get(point.metricId);
      if (!unit) {
        throw new ModelError(`Task "${task.name}" holds data for a metric that is not in project ${project.qualifiedName}`);
      }
      dataPointRows.push({
        kind: point.kind,
        taskId: task.id,
        metricId: point.metricId,
        entryId: point.kind === 'histogram' ? point.entryId : null,
        value: unit.serialize(point.value),
        timestamp: point.timestamp.toISOString(),
      });
    }
  }

  return {
    project: {
      id: project.id,
      name: project.name,
      organization: project.organization,
      description: project.description,
    },
    metrics: metricRows,
    tasks: taskRows,
    dataPoints: dataPointRows,
  };
}

// ─────────────────────────────────────────────────────────
// Rows -> aggregate
// ─────────────────────────────────────────────────────────

function toDataPoint(row: DataPointRow, metric: Metric): DataPoint {
  const value = metric.unit.deserialize(row.value);
  const timestamp = new Date(row.timestamp);
  if (row.kind === 'scalar') {
    return { kind: 'scalar', metricId: metric.id, value, timestamp };
  }
  if (row.entryId === null) {
    throw new ModelError(`Histogram entry of metric "${metric.name}" has no entry id`);
  }
  return { kind: 'histogram', entryId: row.entryId, metricId: metric.id, value, timestamp };
}

/**
 * Rebuilds a detached Project from the rows that belong to it.
 * @throws ModelError when the rows are inconsistent
 */
export function unpackProject(row: ProjectRow, tables: ProjectTables): Project {
  const project = new Project({
    id: row.id,
    name: row.name,
    organization: row.organization,
    description: row.description,
  });

  const metrics = new Map<string, Metric>();
  for (const metricRow of tables.metrics.values()) {
    if (metricRow.projectId !== row.id) continue;
    const unit = unitFor(metricRow.valueKind);
    const metric = project.addMetric(
      {
        name: metricRow.name,
        valueKind: metricRow.valueKind,
        description: metricRow.description,
        allowedValues: metricRow.allowedValues?.map(value => unit.deserialize(value)) ?? null,
        defaultValue: metricRow.defaultValue === null ? null : unit.deserialize(metricRow.defaultValue),
      },
      metricRow.id
    );
    metrics.set(metric.id, metric);
  }

  const pointsByTask = new Map<string, DataPoint[]>();
  for (const pointRow of tables.dataPoints.values()) {
    const metric = metrics.get(pointRow.metricId);
    if (!metric) continue;
    const points = pointsByTask.get(pointRow.taskId) ?? [];
    points.push(toDataPoint(pointRow, metric));
    pointsByTask.set(pointRow.taskId, points);
  }

  for (const taskRow of tables.tasks.values()) {
    if (taskRow.projectId !== row.id) continue;
    project.restoreTask({
      id: taskRow.id,
      name: taskRow.name,
      description: taskRow.description,
      createdAt: new Date(taskRow.createdAt),
      lastUpdatedAt: new Date(taskRow.lastUpdatedAt),
      dataPoints: pointsByTask.get(taskRow.id) ?? [],
    });
  }

  return project;
}

// ─────────────────────────────────────────────────────────
// Tables <-> document
// ─────────────────────────────────────────────────────────

export function tablesToDocument(tables: ProjectTables): ProjectStoreDocument {
  return {
    version: 1,
    projects: [...tables.projects.values()],
    metrics: [...tables.metrics.values()],
    tasks: [...tables.tasks.values()],
    dataPoints: [...tables.dataPoints.values()],
  };
}

export function tablesFromDocument(document: ProjectStoreDocument): ProjectTables {
  return {
    projects: new Map(document.projects.map(row => [row.id, row])),
    metrics: new Map(document.metrics.map(row => [row.id, row])),
    tasks: new Map(document.tasks.map(row => [row.id, row])),
    dataPoints: new Map(document.dataPoints.map(row => [dataPointKey(row), row])),
  };
}
