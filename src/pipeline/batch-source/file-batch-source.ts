import { Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { toErrorMessage } from '../../common/async.utils';
import { BatchSourceError } from '../interfaces/pipeline.errors';
import { BatchSource } from './batch-source';

/**
 * Reads batches from a local directory that plays the hand-off buffer.
 *
 * Locators are paths relative to the root directory
 * (e.g. "raw/energy_data_2025-06-20-10-00-00.json"). Locators resolving
 * outside the root are refused.
 */
export class FileBatchSource extends BatchSource {
  private readonly logger = new Logger(FileBatchSource.name);
  private readonly rootDir: string;

  constructor(rootDir: string) {
    super();
    this.rootDir = path.resolve(rootDir);
    this.logger.log(`Reading batches from ${this.rootDir}`);
  }

  async fetch(batchLocator: string): Promise<unknown> {
    const filePath = this.resolve(batchLocator);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new BatchSourceError(
        batchLocator,
        `Cannot read batch: ${toErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    this.logger.debug(`Read ${content.length} characters from ${filePath}`);

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new BatchSourceError(
        batchLocator,
        `Batch is not valid JSON: ${toErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private resolve(batchLocator: string): string {
    const filePath = path.resolve(this.rootDir, batchLocator);
    const relative = path.relative(this.rootDir, filePath);
    if (
      relative === '' ||
      relative === '..' ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      throw new BatchSourceError(
        batchLocator,
        'Locator does not point inside the batch root directory',
      );
    }
    return filePath;
  }
}
