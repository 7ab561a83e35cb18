import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError } from '../../errors/errors';
import { createLogger } from '../../logger/logger';
import type { Logger } from '../../logger/logger';
import type { Project } from '../../model/project';
import { isNotFound } from '../../utils/fs_errors';
import { parseProjectDefinitions } from '../schema_loader';
import type { SchemaLoader, SchemaLoaderOptions } from '../schema_loader';

type Decoder = (text: string) => unknown;

const DECODERS: Record<string, Decoder> = {
  '.yaml': text => yaml.load(text),
  '.yml': text => yaml.load(text),
  '.json': text => JSON.parse(text),
};

/**
 * Loads project definitions from a `.yaml`, `.yml` or `.json` file.
 */
export class FileSchemaLoader implements SchemaLoader {
  readonly source: string;
  private readonly logger: Logger;

  constructor(filePath: string, options: SchemaLoaderOptions = {}) {
    this.source = filePath;
    this.logger = options.logger ?? createLogger('[SchemaLoader] ');
  }

  load(): Project[] {
    const extension = path.extname(this.source).toLowerCase();
    const decode = Object.hasOwn(DECODERS, extension) ? DECODERS[extension] : undefined;
    if (!decode) {
      throw new ConfigError(
        `Unsupported definition file type "${extension || path.basename(this.source)}" (expected .yaml, .yml or .json)`,
        this.source
      );
    }

    const text = this.read();
    let document: unknown;
    try {
      document = decode(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot decode definition file: ${reason}`, this.source);
    }

    const projects = parseProjectDefinitions(document, this.source);
    this.logger.debug(`Loaded ${projects.length} project definition(s) from ${this.source}`);
    return projects;
  }

  private read(): string {
    try {
      return fs.readFileSync(this.source, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new ConfigError(`Definition file not found: ${this.source}`, this.source);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read definition file: ${reason}`, this.source);
    }
  }
}
