import { promises as fs } from 'fs';
import * as path from 'path';
import type { TokenStore } from '../daikin/Provider';
import { toError } from '../daikin/errors';

export interface JsonFileStoreOptions<T> {
  filePath: string;
  /**
   * Invoked whenever a file interaction fails. The context string contains the
   * operation that failed ("get", "set", "unset", etc.).
   */
  onError?: (context: string, error: unknown) => void;
  /**
   * Allows callers to validate stored values. Returning `false` discards the
   * value and removes the file.
   */
  validate?: (value: unknown) => value is T;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * TokenStore backed by a single JSON file. Files are written owner-readable only
 * since they hold account credentials and bearer tokens.
 */
export default class JsonFileStore<T> implements TokenStore<T> {
  private readonly filePath: string;
  private readonly onError?: (context: string, error: unknown) => void;
  private readonly validate?: (value: unknown) => value is T;

  constructor(options: JsonFileStoreOptions<T>) {
    this.filePath = options.filePath;
    this.onError = options.onError;
    this.validate = options.validate;
  }

  async get(): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logError('get', error);
      }
      return null;
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      this.logError('parse', error);
      await this.clearInvalidValue();
      return null;
    }

    if (value === null || value === undefined) {
      return null;
    }
    if (!this.validate) {
      return value as T;
    }
    if (!this.validate(value)) {
      this.logError('get', new Error(`Invalid value detected in "${this.filePath}"`));
      await this.clearInvalidValue();
      return null;
    }
    return value;
  }

  async set(value: T): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(value, null, 2), { encoding: 'utf8', mode: 0o600 });
    } catch (error) {
      this.logError('set', error);
      throw toError(error);
    }
  }

  async unset(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logError('unset', error);
      }
    }
  }

  private async clearInvalidValue(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      this.logError('clear', error);
    }
  }

  private logError(context: string, error: unknown): void {
    this.onError?.(context, error);
  }
}
