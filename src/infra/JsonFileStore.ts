import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StorageError } from '../domain/errors.js';
import { logger } from './logger.js';

/**
 * JsonFileStore - a JSON object mapping id → record, read whole and
 * replaced whole. Updates from this process are applied one at a time;
 * nothing coordinates with other processes.
 */
export class JsonFileStore<T> {
  private readonly schema: z.ZodType<Record<string, T>, z.ZodTypeDef, unknown>;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    recordSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    this.schema = z.record(z.string(), recordSchema);
  }

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<Record<string, T>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw new StorageError(`Failed to read ${this.filePath}`, { cause: String(error) });
    }

    if (raw.trim() === '') {
      return {};
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`Invalid JSON in ${this.filePath}`, { cause: String(error) });
    }

    const parsed = this.schema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError(`Unexpected record shape in ${this.filePath}`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  /**
   * Read, mutate, replace the whole file. Calls are serialized.
   */
  update<R>(mutate: (records: Record<string, T>) => R): Promise<R> {
    const run = this.pending.then(async () => {
      const records = await this.read();
      const result = mutate(records);
      await this.write(records);
      return result;
    });
    this.pending = run.catch((error: unknown) => {
      logger.error('Store update failed', { file: this.filePath, error: String(error) });
    });
    return run;
  }

  private async write(records: Record<string, T>): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new StorageError(`Failed to write ${this.filePath}`, { cause: String(error) });
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
