import { ConfigError, ProjectConflictError } from '../errors/errors';
import { createLogger } from '../logger/logger';
import type { Logger } from '../logger/logger';
import type { Project } from '../model/project';
import type { ProjectStore } from '../project_store/project_store';
import { FileSchemaLoader } from '../schema_loader/fs/file_schema_loader';
import type { SchemaLoader } from '../schema_loader/schema_loader';
import { isImportStrategy } from './import_engine.types';
import type {
  ImportEngineDependencies,
  ImportReport,
  ImportStrategy,
  MergeWarning,
} from './import_engine.types';

type Candidate = {
  incoming: Project;
  stored: Project | null;
};

/**
 * ImportEngine - reconciles loaded project definitions with a store.
 *
 * Definitions are loaded first; every write of one `importConfig` call then
 * happens inside a single `scopedTransaction`, so a failure leaves the
 * store as it was.
 */
export class ImportEngine {
  private readonly store: ProjectStore;
  private readonly logger: Logger;

  constructor(dependencies: ImportEngineDependencies) {
    this.store = dependencies.store;
    this.logger = dependencies.logger ?? createLogger('[ImportEngine] ');
  }

  /**
   * Imports projects from a definition file path or a loader.
   *
   * @throws ConfigError for invalid definitions or duplicate project names
   * @throws ProjectConflictError under `abort` when any project exists
   */
  importConfig(source: string | SchemaLoader, strategy: ImportStrategy = 'abort'): ImportReport {
    if (!isImportStrategy(strategy)) {
      throw new ConfigError(`Unknown import strategy: ${String(strategy)}`);
    }

    const loader = typeof source === 'string' ? new FileSchemaLoader(source) : source;
    const projects = loader.load();
    this.assertUniqueNames(projects, loader.source);

    const report = this.store.scopedTransaction((): ImportReport => {
      const candidates = projects.map(
        (incoming): Candidate => ({ incoming, stored: this.store.getByQualifiedName(incoming.qualifiedName) })
      );
      switch (strategy) {
        case 'abort':
          return this.applyAbort(candidates, loader.source);
        case 'overwrite':
          return this.applyOverwrite(candidates, loader.source);
        case 'merge':
          return this.applyMerge(candidates, loader.source);
      }
    });

    for (const warning of report.warnings) {
      this.logger.warn(warning.message);
    }
    this.logger.info(
      `Imported ${report.projects.length} project(s) from ${report.source} using ${strategy}: ` +
        `${report.created.length} created, ${report.merged.length} merged, ${report.replaced.length} replaced`
    );
    return report;
  }

  private applyAbort(candidates: Candidate[], source: string): ImportReport {
    const conflicts = candidates.flatMap(({ stored }) => (stored ? [stored.qualifiedName] : []));
    if (conflicts.length > 0) {
      throw new ProjectConflictError(conflicts);
    }

    const report = emptyReport('abort', source);
    for (const { incoming } of candidates) {
      this.create(incoming, report);
    }
    return report;
  }

  private applyOverwrite(candidates: Candidate[], source: string): ImportReport {
    const report = emptyReport('overwrite', source);
    for (const { incoming, stored } of candidates) {
      if (!stored) {
        this.create(incoming, report);
        continue;
      }
      this.store.delete(stored);
      this.store.save(incoming);
      report.projects.push(incoming);
      report.replaced.push(incoming.qualifiedName);
    }
    return report;
  }

  private applyMerge(candidates: Candidate[], source: string): ImportReport {
    const report = emptyReport('merge', source);
    for (const { incoming, stored } of candidates) {
      if (!stored) {
        this.create(incoming, report);
        continue;
      }
      report.warnings.push(...mergeProject(stored, incoming));
      this.store.save(stored);
      report.projects.push(stored);
      report.merged.push(stored.qualifiedName);
    }
    return report;
  }

  private create(project: Project, report: ImportReport): void {
    this.store.save(project);
    report.projects.push(project);
    report.created.push(project.qualifiedName);
  }

  private assertUniqueNames(projects: Project[], source: string): void {
    const seen = new Set<string>();
    for (const project of projects) {
      const key = project.qualifiedName.toLowerCase();
      if (seen.has(key)) {
        throw new ConfigError(`Project ${project.qualifiedName} is defined more than once`, source);
      }
      seen.add(key);
    }
  }
}

function emptyReport(strategy: ImportStrategy, source: string): ImportReport {
  return { strategy, source, projects: [], created: [], merged: [], replaced: [], warnings: [] };
}

/**
 * Reconciles `incoming` into `stored` in place. Metric names match exactly.
 * Tasks and data points of `stored` are kept.
 */
export function mergeProject(stored: Project, incoming: Project): MergeWarning[] {
  const warnings: MergeWarning[] = [];
  stored.description = incoming.description;

  for (const metric of incoming.metricList()) {
    const existing = stored.metricList().find(candidate => candidate.name === metric.name);
    if (!existing) {
      stored.addMetric(metric.toDefinition());
      continue;
    }

    if (existing.valueKind !== metric.valueKind) {
      warnings.push({
        project: stored.qualifiedName,
        metric: metric.name,
        existingKind: existing.valueKind,
        incomingKind: metric.valueKind,
        message:
          `Skipped metric "${metric.name}" of ${stored.qualifiedName}: ` +
          `stored as ${existing.valueKind}, incoming ${metric.valueKind}`,
      });
      continue;
    }

    existing.update({
      description: metric.description,
      allowedValues: metric.allowedValues,
      defaultValue: metric.defaultValue,
    });
  }
  return warnings;
}
