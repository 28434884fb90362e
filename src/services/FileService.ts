/**
 * File Service
 *
 * File system writes for CSV exports, with consistent error handling.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { FILESYSTEM } from '../utils/constants.js';
import { createLogger, LOG_NAMESPACES } from '../utils/index.js';

const logger = createLogger(LOG_NAMESPACES.EXPORT);

/**
 * Handles all file system I/O operations
 */
export class FileService {
  constructor(private readonly rootDir: string) {}

  /**
   * Ensure a directory exists, creating it if necessary
   */
  async ensureDirectory(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      logger.error(`Error creating directory ${dirPath}`, error);
      throw new Error(
        `Failed to create directory: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Write a CSV export below the root directory
   *
   * @param name - File name without extension; path separators are replaced
   * @returns Absolute path of the written file
   */
  async writeCsv(name: string, content: string): Promise<string> {
    const fileName = `${name.replace(/[\\/]/g, '_')}${FILESYSTEM.CSV_EXTENSION}`;
    const filePath = path.resolve(this.rootDir, fileName);

    await this.writeText(filePath, content, `exporting ${fileName}`);
    logger.info(`Exported ${fileName} to ${filePath}`);

    return filePath;
  }

  /**
   * Write text content to a file
   */
  async writeText(filePath: string, content: string, context: string): Promise<void> {
    await this.ensureDirectory(path.dirname(filePath));

    try {
      await fs.writeFile(filePath, content, FILESYSTEM.ENCODING);
    } catch (error) {
      logger.error(`Error while ${context}`, error);
      throw new Error(
        `Failed while ${context}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }
}
