import { ImportEngine } from '../import_engine/import_engine';
import type { ImportReport, ImportStrategy } from '../import_engine/import_engine.types';
import type { IConfigManager } from '../config_manager/config_manager.types';
import { createLogger } from '../logger/logger';
import type { Logger } from '../logger/logger';
import type { Project } from '../model/project';
import type { ProjectStore } from '../project_store/project_store';
import type { SchemaLoader } from '../schema_loader/schema_loader';
import type { TrackerDependencies } from './tracker.types';

/**
 * Tracker - one root directory's configuration, project store and import
 * engine, wired together.
 *
 * @example
 * ```typescript
 * const tracker = createTracker('/path/to/root');
 * const report = tracker.importConfig('projects.yaml');
 * console.log(report.created);
 * ```
 */
export class Tracker {
  readonly rootPath: string;
  readonly config: IConfigManager;
  readonly store: ProjectStore;
  readonly engine: ImportEngine;
  private readonly logger: Logger;

  constructor(dependencies: TrackerDependencies) {
    this.rootPath = dependencies.rootPath;
    this.config = dependencies.configManager;
    this.store = dependencies.store;
    this.logger = dependencies.logger ?? createLogger('[Tracker] ', this.config.getLogLevel());
    this.engine = dependencies.engine ?? new ImportEngine({
      store: this.store,
      logger: createLogger('[ImportEngine] ', this.config.getLogLevel()),
    });
  }

  /**
   * Imports definitions with `strategy`, or with the configured
   * `defaultImportStrategy` when none is given.
   */
  importConfig(source: string | SchemaLoader, strategy?: ImportStrategy): ImportReport {
    const effective = strategy ?? this.config.getDefaultImportStrategy();
    this.logger.debug(`Importing with strategy ${effective}`);
    return this.engine.importConfig(source, effective);
  }

  projects(): Project[] {
    return this.store.listAll();
  }

  project(qualifiedName: string): Project | null {
    return this.store.getByQualifiedName(qualifiedName);
  }
}
