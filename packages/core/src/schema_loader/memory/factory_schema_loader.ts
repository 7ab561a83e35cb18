import { ConfigError } from '../../errors/errors';
import { Project } from '../../model/project';
import type { SchemaLoader } from '../schema_loader';

/**
 * Wraps a function that builds projects in code.
 *
 * The function must return definition-only projects: Project instances
 * with metrics but no tasks. It runs on every `load()`, so each import
 * gets fresh aggregates.
 */
export class FactorySchemaLoader implements SchemaLoader {
  readonly source: string;
  private readonly configure: () => unknown;

  constructor(configure: () => readonly Project[], source: string = '<factory>') {
    this.configure = configure;
    this.source = source;
  }

  load(): Project[] {
    const output = this.configure();
    if (!Array.isArray(output)) {
      throw new ConfigError('Project factory must return an array of projects', this.source);
    }

    const projects: Project[] = [];
    output.forEach((item: unknown, index) => {
      if (!(item instanceof Project)) {
        throw new ConfigError(`Project factory returned a non-project at index ${index}`, this.source);
      }
      if (item.taskList().length > 0) {
        throw new ConfigError(
          `Project factory returned ${item.qualifiedName} with tasks; only definitions can be imported`,
          this.source
        );
      }
      projects.push(item);
    });
    return projects;
  }
}
