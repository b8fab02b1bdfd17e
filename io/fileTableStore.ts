/**
 * File-backed table store. One file per table and format under rootDir.
 * Adapter only — encoding/decoding lives in domain/.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { NotFoundError } from "../domain/errors.js";
import { readDelimited, writeDelimited } from "../domain/delimited.js";
import type { ColumnSchema, ReadOptions, ReadResult } from "../domain/schema.js";
import {
  readSpreadsheet,
  writeSpreadsheet,
  type ReadSpreadsheetOptions,
  type WriteSpreadsheetOptions,
} from "../domain/spreadsheet.js";
import type { Table } from "../domain/table.js";
import { safeId } from "./safeId.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileTableStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  /** Absolute path of a stored file, e.g. filePath("ts.csv"). */
  filePath(fileName: string): string {
    return path.join(this.rootDir, safeId(fileName));
  }

  private async writeAtomic(fileName: string, data: string | Uint8Array): Promise<string> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const file = this.filePath(fileName);
    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, file);
    return file;
  }

  private async read(fileName: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.filePath(fileName));
    } catch (err: unknown) {
      if (isNotFound(err)) throw new NotFoundError(`No stored file "${fileName}"`, { fileName });
      throw err;
    }
  }

  /** Raw text of a stored file, as a text editor would show it. */
  async readRaw(fileName: string): Promise<string> {
    const bytes = await this.read(fileName);
    return bytes.toString("utf8");
  }

  /** Writes `<name>.csv`; returns the file path. */
  async writeCsv(name: string, table: Table): Promise<string> {
    return this.writeAtomic(`${name}.csv`, writeDelimited(table));
  }

  async readCsv(name: string, schema: ColumnSchema, options?: ReadOptions): Promise<ReadResult> {
    return readDelimited(await this.readRaw(`${name}.csv`), schema, options);
  }

  /** Writes `<name>.xlsx`; returns the file path. */
  async writeXlsx(name: string, table: Table, options?: WriteSpreadsheetOptions): Promise<string> {
    return this.writeAtomic(`${name}.xlsx`, writeSpreadsheet(table, options));
  }

  async readXlsx(name: string, schema: ColumnSchema, options?: ReadSpreadsheetOptions): Promise<ReadResult> {
    const bytes = await this.read(`${name}.xlsx`);
    return readSpreadsheet(bytes, schema, options);
  }
}
