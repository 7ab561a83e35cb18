import type { Logger } from '../logger/logger';
import type { Project } from '../model/project';
import type { ProjectStore } from '../project_store/project_store';
import type { ValueKind } from '../units/units.types';

/**
 * How incoming projects that collide with stored ones are handled:
 * - abort: refuse the whole import
 * - merge: reconcile field by field
 * - overwrite: delete the stored project and save the incoming one
 */
export type ImportStrategy = 'abort' | 'merge' | 'overwrite';

export const IMPORT_STRATEGIES: readonly ImportStrategy[] = ['abort', 'merge', 'overwrite'];

export function isImportStrategy(value: unknown): value is ImportStrategy {
  return typeof value === 'string' && IMPORT_STRATEGIES.some(strategy => strategy === value);
}

/** A same-name metric left untouched because its kind differs. */
export type MergeWarning = {
  project: string;
  metric: string;
  existingKind: ValueKind;
  incomingKind: ValueKind;
  message: string;
};

export type ImportReport = {
  strategy: ImportStrategy;
  source: string;
  /** Imported aggregates as stored, in definition order. */
  projects: Project[];
  /** Qualified names saved as new projects */
  created: string[];
  merged: string[];
  replaced: string[];
  warnings: MergeWarning[];
};

export type ImportEngineDependencies = {
  store: ProjectStore;
  logger?: Logger;
};
