import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { StoreReadError, StoreWriteError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ApplicationRecord, ApplicationTable } from "../types.js";
import { DEFAULT_STATUS, toApplicationStatus } from "../types.js";

export const COLUMNS = {
  jobId: "Job ID",
  title: "Title",
  company: "Company",
  workLocation: "Work Location",
  status: "Status",
  dateApplied: "Date Applied",
  interviewDate: "Interview Date",
  notes: "Notes",
} as const;

/** Columns every table carries after loading; missing ones are appended empty. */
export const REQUIRED_COLUMNS = [
  COLUMNS.jobId,
  COLUMNS.title,
  COLUMNS.company,
  COLUMNS.status,
  COLUMNS.dateApplied,
  COLUMNS.notes,
  COLUMNS.interviewDate,
];

const LEGACY_LOCATION_COLUMN = "Location";
const CORE_COLUMNS = new Set<string>(Object.values(COLUMNS));

export interface ApplicationStore {
  load(): Promise<ApplicationTable>;
  save(table: ApplicationTable): Promise<void>;
}

const rowsSchema = z.array(z.array(z.string()));

const toRecord = (columns: string[], cells: string[], rowNumber: number): ApplicationRecord => {
  const row = new Map<string, string>(columns.map((column, index) => [column, cells[index] ?? ""]));
  const cell = (column: string): string => row.get(column) ?? "";

  const rawStatus = cell(COLUMNS.status);
  const status = toApplicationStatus(rawStatus);
  if (!status && rawStatus.trim()) {
    logger.warn("Unknown status in tracking file, treating as Applied", { row: rowNumber, status: rawStatus });
  }

  const extra: Record<string, string> = {};
  for (const column of columns) {
    if (!CORE_COLUMNS.has(column)) {
      extra[column] = cell(column);
    }
  }

  const record: ApplicationRecord = {
    jobId: cell(COLUMNS.jobId),
    title: cell(COLUMNS.title),
    company: cell(COLUMNS.company),
    workLocation: row.has(COLUMNS.workLocation) ? cell(COLUMNS.workLocation) : cell(LEGACY_LOCATION_COLUMN),
    status: status ?? DEFAULT_STATUS,
    dateApplied: cell(COLUMNS.dateApplied),
    interviewDate: cell(COLUMNS.interviewDate),
    notes: cell(COLUMNS.notes),
    extra,
  };
  if (!status) {
    record.storedStatus = rawStatus;
  }
  return record;
};

const warnOnDuplicateIds = (records: ApplicationRecord[]): void => {
  const seen = new Set<string>();
  for (const record of records) {
    if (!record.jobId) {
      continue;
    }
    if (seen.has(record.jobId)) {
      logger.warn("Duplicate Job ID in tracking file", { jobId: record.jobId });
    }
    seen.add(record.jobId);
  }
};

export const parseApplicationsCsv = (content: string): ApplicationTable => {
  const decoded: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const rows = rowsSchema.parse(decoded);
  const [header = [], ...body] = rows;

  const columns = header.map((column) => column.trim());
  for (const required of REQUIRED_COLUMNS) {
    if (!columns.includes(required)) {
      columns.push(required);
    }
  }

  const records = body.map((cells, index) => toRecord(columns, cells, index + 2));
  warnOnDuplicateIds(records);
  return { columns, records };
};

const cellValue = (record: ApplicationRecord, column: string): string => {
  switch (column) {
    case COLUMNS.jobId:
      return record.jobId;
    case COLUMNS.title:
      return record.title;
    case COLUMNS.company:
      return record.company;
    case COLUMNS.workLocation:
      return record.workLocation;
    case COLUMNS.status:
      return record.storedStatus !== undefined && record.status === DEFAULT_STATUS ? record.storedStatus : record.status;
    case COLUMNS.dateApplied:
      return record.dateApplied;
    case COLUMNS.interviewDate:
      return record.interviewDate;
    case COLUMNS.notes:
      return record.notes;
    default:
      return record.extra[column] ?? "";
  }
};

export const serializeApplicationsCsv = (table: ApplicationTable): string =>
  stringify([table.columns, ...table.records.map((record) => table.columns.map((column) => cellValue(record, column)))]);

export const cloneTable = (table: ApplicationTable): ApplicationTable => ({
  columns: [...table.columns],
  records: table.records.map((record) => ({ ...record, extra: { ...record.extra } })),
});

/** Tracking file on disk, read and written whole. */
export class CsvApplicationStore implements ApplicationStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<ApplicationTable> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      throw new StoreReadError(`Unable to read tracking file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      return parseApplicationsCsv(content);
    } catch (error) {
      throw new StoreReadError(`Tracking file ${this.filePath} is not valid CSV: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async save(table: ApplicationTable): Promise<void> {
    const temporary = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(temporary, serializeApplicationsCsv(table), "utf8");
      await rename(temporary, this.filePath);
    } catch (error) {
      throw new StoreWriteError(`Unable to write tracking file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export class InMemoryApplicationStore implements ApplicationStore {
  private table: ApplicationTable;
  saves = 0;

  constructor(table: ApplicationTable) {
    this.table = cloneTable(table);
  }

  async load(): Promise<ApplicationTable> {
    return cloneTable(this.table);
  }

  async save(table: ApplicationTable): Promise<void> {
    this.table = cloneTable(table);
    this.saves += 1;
  }

  snapshot(): ApplicationTable {
    return cloneTable(this.table);
  }
}
