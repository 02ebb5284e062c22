import fs from 'fs';
import path from 'path';
import { ParseError, PersistenceError } from '../errors';

/**
 * Utilities for reading and atomically replacing files
 */
export class FileUtils {
  private static tempCounter = 0;

  /**
   * Read and parse a JSON file
   * @param filePath File to read
   * @returns The parsed value, or null when the file does not exist
   * @throws ParseError when the file exists but is not valid JSON
   */
  static readJson(filePath: string): unknown {
    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if (FileUtils.isMissingFile(error)) {
        return null;
      }
      throw new ParseError(`Cannot read ${filePath}: ${FileUtils.describe(error)}`, filePath, error);
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new ParseError(`Malformed JSON in ${filePath}: ${FileUtils.describe(error)}`, filePath, error);
    }
  }

  /**
   * Serialize a value as pretty JSON and atomically replace the file
   */
  static writeJsonAtomic(filePath: string, value: unknown): void {
    FileUtils.writeTextAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
  }

  /**
   * Write to a temporary sibling, then rename it over the target. A crash
   * at any point leaves the previous file untouched.
   * @throws PersistenceError when the write or the rename fails
   */
  static writeTextAtomic(filePath: string, text: string): void {
    FileUtils.tempCounter += 1;
    const tempPath = `${filePath}.tmp-${process.pid}-${FileUtils.tempCounter}`;

    try {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      fs.writeFileSync(tempPath, text, 'utf-8');
      FileUtils.commit(tempPath, filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw new PersistenceError(`Failed to write ${filePath}: ${FileUtils.describe(error)}`, filePath, error);
    }
  }

  /**
   * Move a fully written temporary file into place
   */
  static commit(tempPath: string, filePath: string): void {
    fs.renameSync(tempPath, filePath);
  }

  /**
   * Delete a file if it exists
   * @returns True if a file was removed
   */
  static remove(filePath: string): boolean {
    if (!fs.existsSync(filePath)) {
      return false;
    }
    try {
      fs.rmSync(filePath);
      return true;
    } catch (error) {
      throw new PersistenceError(`Failed to delete ${filePath}: ${FileUtils.describe(error)}`, filePath, error);
    }
  }

  /**
   * fs errors are not always `instanceof Error` (Jest runs tests in a
   * separate realm), so match on shape
   */
  private static isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
  }

  private static describe(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    return String(error);
  }
}
