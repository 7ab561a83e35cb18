import { createLogger } from '../../logger/logger';
import type { Logger } from '../../logger/logger';
import type { Project } from '../../model/project';
import { parseProjectDefinitions } from '../schema_loader';
import type { SchemaLoader, SchemaLoaderOptions } from '../schema_loader';

/**
 * Loads project definitions from an already decoded document, e.g. one
 * built in a test or received over an API.
 *
 * @example
 * const loader = new DocumentSchemaLoader({
 *   projects: [{ name: 'backend', metrics: [{ name: 'Story Points', metric_type: 'Integer' }] }],
 * });
 */
export class DocumentSchemaLoader implements SchemaLoader {
  readonly source: string;
  private readonly document: unknown;
  private readonly logger: Logger;

  constructor(document: unknown, source: string = '<document>', options: SchemaLoaderOptions = {}) {
    this.document = document;
    this.source = source;
    this.logger = options.logger ?? createLogger('[SchemaLoader] ');
  }

  load(): Project[] {
    const projects = parseProjectDefinitions(this.document, this.source);
    this.logger.debug(`Loaded ${projects.length} project definition(s) from ${this.source}`);
    return projects;
  }
}
