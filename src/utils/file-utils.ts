import fs from 'fs-extra';
import path from 'path';
import { NotFoundError, ParsingError, ValidationError } from './errors.js';
import logger from '../logger.js';

/**
 * File system helpers for graph documents
 */
export class FileUtils {
  private static readonly MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

  /**
   * Read and parse a JSON document
   */
  static async readJsonFile(filePath: string): Promise<unknown> {
    const resolved = path.resolve(filePath);

    if (!(await fs.pathExists(resolved))) {
      throw new NotFoundError(`File not found: ${filePath}`, { filePath: resolved });
    }

    const stats = await fs.stat(resolved);
    if (!stats.isFile()) {
      throw new ValidationError(`Not a file: ${filePath}`, undefined, { filePath: resolved });
    }
    if (stats.size > FileUtils.MAX_FILE_SIZE) {
      throw new ValidationError(`File too large: ${stats.size} bytes (max ${FileUtils.MAX_FILE_SIZE})`, undefined, {
        filePath: resolved
      });
    }

    const content = await fs.readFile(resolved, 'utf-8');
    try {
      const data: unknown = JSON.parse(content);
      logger.debug({ filePath: resolved, size: stats.size }, 'Read JSON file');
      return data;
    } catch (error) {
      throw new ParsingError(
        `Invalid JSON in ${filePath}`,
        { filePath: resolved },
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Write text, creating parent directories as needed
   */
  static async writeTextFile(filePath: string, content: string): Promise<void> {
    const resolved = path.resolve(filePath);
    await fs.ensureDir(path.dirname(resolved));
    await fs.writeFile(resolved, content, 'utf-8');
    logger.debug({ filePath: resolved, size: Buffer.byteLength(content) }, 'Wrote file');
  }
}
