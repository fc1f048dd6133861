import fs from "fs-extra";
import path from "node:path";
import logger from "./logger";
import { StorageError } from "./errors";

/**
 * Outcome of a read-modify-write. No `value` leaves the document untouched; with `bestEffort`
 * a failed write is logged and `result` still returned.
 */
export interface TableChange<T, R> {
  value?: T;
  result: R;
  bestEffort?: boolean;
}

export interface TableSchema<T> {
  name: string;
  empty: () => T;
  /** Throws when the document on disk does not have the table's shape. */
  parse: (data: unknown) => T;
}

/**
 * One JSON document on disk. Operations on a table run one at a time; writes replace the
 * whole document through a temporary file and a rename.
 */
export class JsonTable<T> {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly schema: TableSchema<T>,
  ) {}

  read(): Promise<T> {
    return this.exclusive(() => this.load());
  }

  write(value: T): Promise<void> {
    return this.exclusive(() => this.persist(value));
  }

  /** Read-modify-write under the table lock. */
  update<R>(mutate: (current: T) => TableChange<T, R> | Promise<TableChange<T, R>>): Promise<R> {
    return this.exclusive(async () => {
      const current = await this.load();
      const { value, result, bestEffort } = await mutate(current);
      if (value === undefined) return result;
      try {
        await this.persist(value);
      } catch (error) {
        if (!bestEffort) throw error;
        logger.warn({ err: error, table: this.schema.name }, "Failed to write table, keeping previous document");
      }
      return result;
    });
  }

  private exclusive<R>(task: () => Promise<R>): Promise<R> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<T> {
    const { name } = this.schema;
    if (!(await fs.pathExists(this.filePath))) {
      logger.info({ table: name, file: this.filePath }, "Store file missing, creating empty table");
      return this.heal();
    }

    const stats = await fs.stat(this.filePath);
    if (!stats.isFile()) {
      logger.warn({ table: name, file: this.filePath }, "Store path is not a file, recreating");
      try {
        await fs.remove(this.filePath);
      } catch (error) {
        logger.error({ err: error, table: name }, "Failed to remove invalid store path");
        return this.schema.empty();
      }
      return this.heal();
    }

    try {
      const data: unknown = await fs.readJson(this.filePath);
      return this.schema.parse(data);
    } catch (error) {
      logger.warn({ err: error, table: name, file: this.filePath }, "Store file unreadable, resetting table");
      return this.heal();
    }
  }

  private async heal(): Promise<T> {
    const empty = this.schema.empty();
    try {
      await this.persist(empty);
    } catch (error) {
      logger.error({ err: error, table: this.schema.name }, "Failed to recreate store file");
    }
    return empty;
  }

  private async persist(value: T): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.writeJson(tmpPath, value, { spaces: 2 });
      await fs.move(tmpPath, this.filePath, { overwrite: true });
    } catch (error) {
      throw new StorageError(this.filePath, `Failed to write ${this.schema.name} table`, { cause: error });
    }
  }
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const expectObject = (value: unknown, what: string): Record<string, unknown> => {
  if (!isPlainObject(value)) {
    throw new TypeError(`${what} must be an object`);
  }
  return value;
};
