import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../../errors/errors';
import { createLogger } from '../../logger/logger';
import type { Logger } from '../../logger/logger';
import { conformsTo, schemaError } from '../../schemas/schema_cache';
import { isNotFound } from '../../utils/fs_errors';
import type { ProjectStoreDocument, ProjectTables } from '../project_store.types';
import { createTables, tablesFromDocument, tablesToDocument } from '../row_mapping';
import { TableProjectStore } from '../table_project_store';

/**
 * Serializer for FsProjectStore - allows custom serialization
 */
export interface DocumentSerializer {
  stringify: (document: ProjectStoreDocument) => string;
  parse: (text: string) => unknown;
}

/**
 * Options for FsProjectStore
 */
export interface FsProjectStoreOptions {
  /** JSON document holding every row */
  filePath: string;

  /** Custom serializer (default: JSON with indent 2) */
  serializer?: DocumentSerializer;

  /** Create the parent directory on first commit (default: true) */
  createIfMissing?: boolean;

  logger?: Logger;
}

const DEFAULT_SERIALIZER: DocumentSerializer = {
  stringify: (document) => JSON.stringify(document, null, 2),
  parse: (text) => JSON.parse(text),
};

function isProjectStoreDocument(data: unknown): data is ProjectStoreDocument {
  return conformsTo('project_store_schema', data);
}

function readTables(filePath: string, serializer: DocumentSerializer): ProjectTables {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return createTables();
    }
    throw error;
  }

  let document: unknown;
  try {
    document = serializer.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Project store is not valid JSON: ${reason}`, filePath);
  }
  if (!isProjectStoreDocument(document)) {
    throw schemaError('project_store_schema', 'Project store', filePath);
  }
  return tablesFromDocument(document);
}

/**
 * FsProjectStore - Filesystem implementation of ProjectStore
 *
 * Keeps every row in one JSON document. The document is validated when the
 * store opens and rewritten on each commit through a temporary file and a
 * rename, so a reader never sees a partial write.
 *
 * @example
 * const store = new FsProjectStore({ filePath: '.tasktally/tasktally.json' });
 * store.scopedTransaction(() => store.save(project));
 */
export class FsProjectStore extends TableProjectStore {
  readonly filePath: string;
  private readonly serializer: DocumentSerializer;
  private readonly createIfMissing: boolean;

  /**
   * @throws ConfigError when the document is unreadable or fails its schema
   * @throws ModelError when its rows do not form valid projects
   */
  constructor(options: FsProjectStoreOptions) {
    const serializer = options.serializer ?? DEFAULT_SERIALIZER;
    super(
      readTables(options.filePath, serializer),
      options.logger ?? createLogger('[ProjectStore] ')
    );
    this.filePath = options.filePath;
    this.serializer = serializer;
    this.createIfMissing = options.createIfMissing ?? true;

    // Rebuild every aggregate once so a corrupt file fails here, not on first read
    this.listAll();
  }

  protected persist(tables: ProjectTables): void {
    if (this.createIfMissing) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
    const content = this.serializer.stringify(tablesToDocument(tables));
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tempPath, content, 'utf-8');
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }
}
