import { ConfigError, ParsingError, TallyError } from '../errors/errors';
import type { Logger } from '../logger/logger';
import { Project } from '../model/project';
import { conformsTo, schemaError } from '../schemas/schema_cache';
import { resolveValueKind, unitFor } from '../units/units';
import type { MetricValue, Unit } from '../units/units.types';
import type {
  DefinitionScalar,
  MetricDefinitionEntry,
  ProjectDefinitionEntry,
  ProjectDefinitionsDocument,
} from './schema_loader.types';

/**
 * Source of candidate projects for an import. Loaders never touch a store.
 */
export interface SchemaLoader {
  /** Where the definitions came from, used in errors and logs. */
  readonly source: string;

  /**
   * @throws ConfigError when the definitions are missing or invalid
   */
  load(): Project[];
}

export type SchemaLoaderOptions = {
  logger?: Logger;
};

function isProjectDefinitionsDocument(data: unknown): data is ProjectDefinitionsDocument {
  return conformsTo('project_definition_schema', data);
}

function parseEntry(unit: Unit, raw: DefinitionScalar, field: string): MetricValue {
  try {
    return unit.parse(String(raw));
  } catch (error) {
    if (error instanceof ParsingError) {
      throw new ConfigError(`${field}: ${error.message}`);
    }
    throw error;
  }
}

function addMetric(project: Project, entry: MetricDefinitionEntry, source: string): void {
  try {
    const valueKind = resolveValueKind(entry.metric_type);
    const unit = unitFor(valueKind);
    const allowedValues = entry.value_range?.map(raw => parseEntry(unit, raw, 'value_range')) ?? null;
    const defaultValue =
      entry.default_value === undefined || entry.default_value === null
        ? null
        : parseEntry(unit, entry.default_value, 'default_value');

    project.addMetric({
      name: entry.name,
      valueKind,
      description: entry.desc ?? null,
      allowedValues,
      defaultValue,
    });
  } catch (error) {
    if (error instanceof TallyError) {
      throw new ConfigError(
        `Project "${project.qualifiedName}", metric "${entry.name}": ${error.message}`,
        source
      );
    }
    throw error;
  }
}

function buildProject(entry: ProjectDefinitionEntry, source: string): Project {
  let project: Project;
  try {
    project = new Project({
      name: entry.name,
      organization: entry.organization ?? null,
      description: entry.desc ?? null,
    });
  } catch (error) {
    if (error instanceof TallyError) {
      throw new ConfigError(`Project "${entry.name}": ${error.message}`, source);
    }
    throw error;
  }

  for (const metric of entry.metrics ?? []) {
    addMetric(project, metric, source);
  }
  return project;
}

/**
 * Validates a decoded definition document and builds one unsaved Project
 * per entry, metrics in declaration order.
 *
 * `value_range` and `default_value` entries are stringified and parsed with
 * the unit of the metric's type, so `2` and `"2"` are the same Integer and
 * `"1:30"` is a Duration of 5400 seconds.
 *
 * @throws DetailedValidationError when the document shape is wrong
 * @throws ConfigError naming project, metric and field for anything else
 */
export function parseProjectDefinitions(document: unknown, source: string): Project[] {
  if (!isProjectDefinitionsDocument(document)) {
    throw schemaError('project_definition_schema', 'Project definitions', source);
  }
  return document.projects.map(entry => buildProject(entry, source));
}
