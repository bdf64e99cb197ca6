import { InvalidDateError, UnknownApplicationError } from "../lib/errors.js";
import type { ApplicationRecord, ApplicationStatus, ApplicationTable } from "../types.js";
import { APPLICATION_STATUSES } from "../types.js";
import { appendNote, formatNoteTimestamp } from "./recordSelector.js";

const RESPONDED_STATUSES = new Set<ApplicationStatus>([
  "Interview Scheduled",
  "Interviewed",
  "Offered",
  "Accepted",
  "Declined",
]);

export interface ApplicationFilter {
  status?: ApplicationStatus;
  company?: string;
}

export interface ApplicationStats {
  total: number;
  statuses: Record<ApplicationStatus, number>;
  /** Share of applications that reached an interview or beyond, in percent. */
  responseRate: number;
}

export interface StatusCountChange {
  status: ApplicationStatus;
  before: number;
  after: number;
  change: number;
}

const TRACKER_DATE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DATETIME_LOCAL = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})$/;

const pad = (value: number): string => String(value).padStart(2, "0");

/** "YYYY-MM-DD HH:MM:SS" in local time, the form manual date edits are stored in. */
export const formatTrackerDate = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Reads "YYYY-MM-DD HH:MM:SS", or the "YYYY-MM-DDTHH:MM" a datetime-local
 * input sends when `acceptDatetimeLocal` is set, and returns it in tracker form.
 * Impossible dates such as February 30th are refused.
 */
export const parseTrackerDate = (value: string, acceptDatetimeLocal = false): string | null => {
  const match = TRACKER_DATE.exec(value) ?? (acceptDatetimeLocal ? DATETIME_LOCAL.exec(value) : null);
  if (!match) {
    return null;
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map((part) => Number(part ?? "0"));
  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  return formatTrackerDate(date);
};

const findRecord = (table: ApplicationTable, jobId: string): ApplicationRecord => {
  const record = table.records.find((candidate) => candidate.jobId === jobId);
  if (!record) {
    throw new UnknownApplicationError(jobId);
  }
  return record;
};

export const updateApplicationStatus = (
  table: ApplicationTable,
  jobId: string,
  status: ApplicationStatus,
  notes?: string,
  now: Date = new Date(),
): ApplicationRecord => {
  const record = findRecord(table, jobId);

  record.status = status;
  delete record.storedStatus;
  const trimmed = notes?.trim();
  if (trimmed) {
    record.notes = appendNote(record.notes, `[${formatNoteTimestamp(now)}] Status changed to '${status}': ${trimmed}`);
  }
  return record;
};

/**
 * Sets or, given an empty string, clears the interview date. Setting a date on
 * an application still at Applied moves it to Interview Scheduled.
 */
export const updateInterviewDate = (
  table: ApplicationTable,
  jobId: string,
  interviewDate: string,
  now: Date = new Date(),
): ApplicationRecord => {
  const value = interviewDate.trim();
  const parsed = value ? parseTrackerDate(value) : "";
  if (parsed === null) {
    throw new InvalidDateError("Invalid date format. Use 'YYYY-MM-DD HH:MM:SS'");
  }
  const record = findRecord(table, jobId);

  record.interviewDate = parsed;
  let note = `[${formatNoteTimestamp(now)}] Interview date manually updated to '${parsed}'`;
  if (parsed && record.status === "Applied") {
    record.status = "Interview Scheduled";
    note += "\nStatus automatically updated to 'Interview Scheduled'";
  }
  record.notes = appendNote(record.notes, note);
  return record;
};

/** Sets the application date; an empty value means now. */
export const updateDateApplied = (
  table: ApplicationTable,
  jobId: string,
  dateApplied: string,
  notes?: string,
  now: Date = new Date(),
): ApplicationRecord => {
  const value = dateApplied.trim();
  const parsed = value ? parseTrackerDate(value, true) : formatTrackerDate(now);
  if (parsed === null) {
    throw new InvalidDateError("Invalid date format. Use 'YYYY-MM-DD HH:MM:SS'");
  }
  const record = findRecord(table, jobId);

  record.dateApplied = parsed;
  let note = `[${formatNoteTimestamp(now)}] Date Applied manually updated to '${parsed}'`;
  const trimmed = notes?.trim();
  if (trimmed) {
    note += `\nUser notes: ${trimmed}`;
  }
  record.notes = appendNote(record.notes, note);
  return record;
};

export const filterApplications = (records: ApplicationRecord[], filter: ApplicationFilter): ApplicationRecord[] => {
  const company = filter.company?.trim().toLowerCase();
  return records.filter(
    (record) =>
      (!filter.status || record.status === filter.status) &&
      (!company || record.company.toLowerCase().includes(company)),
  );
};

const emptyCounts = (): Record<ApplicationStatus, number> => ({
  Applied: 0,
  Assessment: 0,
  "Follow-up Required": 0,
  "Interview Scheduled": 0,
  Interviewed: 0,
  Rejected: 0,
  Offered: 0,
  Accepted: 0,
  Declined: 0,
});

export const generateApplicationStats = (records: ApplicationRecord[]): ApplicationStats => {
  const statuses = emptyCounts();
  for (const record of records) {
    statuses[record.status] += 1;
  }

  const responded = records.filter((record) => RESPONDED_STATUSES.has(record.status)).length;
  return {
    total: records.length,
    statuses,
    responseRate: records.length > 0 ? (responded / records.length) * 100 : 0,
  };
};

export const diffStatusCounts = (before: ApplicationStats, after: ApplicationStats): StatusCountChange[] =>
  APPLICATION_STATUSES.map((status) => ({
    status,
    before: before.statuses[status],
    after: after.statuses[status],
    change: after.statuses[status] - before.statuses[status],
  }));
