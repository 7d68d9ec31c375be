import fs from "fs/promises";
import path from "path";
import { createChildLogger } from "./logger";
import { StorageError } from "./types";

export type TableRow = Record<string, unknown>;

/**
 * Append-only table sink. A header is written only when the table does not exist
 * yet; existing content is never rewritten, so appending twice duplicates rows.
 */
export interface TableStore {
  append(tablePath: string, columns: readonly string[], rows: readonly TableRow[]): Promise<void>;
}

export function escapeCsvField(value: unknown): string {
  if (value === null || value === undefined) return "";
  const str = Array.isArray(value) ? JSON.stringify(value) : String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function formatCsvLine(cells: readonly unknown[]): string {
  return cells.map((cell) => escapeCsvField(cell)).join(",") + "\n";
}

/** Directory name for one patient's tables; URL-safe so any identifier stays a single path segment. */
export function encodePatientId(patientId: string): string {
  return Buffer.from(patientId, "utf8").toString("base64url");
}

export function resolveTablePath(options: {
  outputDir: string;
  table: string;
  patientId: string;
  splitPatient: boolean;
}): string {
  const dir = options.splitPatient
    ? path.join(options.outputDir, encodePatientId(options.patientId))
    : options.outputDir;
  return path.join(dir, `${options.table}.csv`);
}

const log = createChildLogger({ component: "storage" });

export class CsvTableStore implements TableStore {
  private readonly queues = new Map<string, Promise<void>>();

  /** Appends are chained per resolved path so concurrent writers never interleave. */
  public append(tablePath: string, columns: readonly string[], rows: readonly TableRow[]): Promise<void> {
    const key = path.resolve(tablePath);
    const previous = this.queues.get(key) ?? Promise.resolve();
    const next = previous.then(() => this.write(key, columns, rows));
    const settled = next.catch(() => undefined);
    this.queues.set(key, settled);
    void settled.then(() => {
      if (this.queues.get(key) === settled) this.queues.delete(key);
    });
    return next;
  }

  private async write(tablePath: string, columns: readonly string[], rows: readonly TableRow[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(tablePath), { recursive: true });
      const exists = await fileExists(tablePath);
      const lines = rows.map((row) => formatCsvLine(columns.map((column) => row[column])));
      if (!exists) {
        lines.unshift(formatCsvLine(columns));
      }
      if (lines.length) {
        await fs.appendFile(tablePath, lines.join(""), "utf8");
      }
      log.debug({ tablePath, rows: rows.length, header: !exists }, "rows appended");
    } catch (err) {
      throw new StorageError(tablePath, err);
    }
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
