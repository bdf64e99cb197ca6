import type { ApplicationRecord, ApplicationStatus, RawStatusGuess } from "../types.js";
import { toApplicationStatus } from "../types.js";

export const DEFAULT_MIN_CONFIDENCE = 0.6;

const MIN_TITLE_LENGTH = 4;
const MIN_LOCATION_LENGTH = 4;
const TITLE_KEY_WORDS = 3;
const NOTE_SUBJECT_LENGTH = 50;

export const BULK_REJECTION_PHRASES = [
  "all positions",
  "any of our openings",
  "all current openings",
  "future opportunities",
  "all applications",
];

export type NoUpdateReason = "no_company_match" | "unclear_status" | "low_confidence" | "no_records";

export type GateResult =
  | { ok: true; status: ApplicationStatus }
  | { ok: false; reasons: NoUpdateReason[] };

export type SelectionStrategy = "single" | "title" | "location" | "bulk" | "most_recent";

export type SelectionOutcome =
  | { kind: "selected"; status: ApplicationStatus; records: ApplicationRecord[]; strategy: SelectionStrategy }
  | { kind: "no_update"; reasons: NoUpdateReason[] };

export interface SelectionInput {
  companyMatch: string | null;
  rawStatus: RawStatusGuess;
  confidence: number;
  /** Lowercased subject and body. */
  emailText: string;
  /** Every record whose company is `companyMatch`, in store order. */
  records: ApplicationRecord[];
  minConfidence?: number;
}

export const evaluateUpdateGate = (
  companyMatch: string | null,
  rawStatus: RawStatusGuess,
  confidence: number,
  minConfidence = DEFAULT_MIN_CONFIDENCE,
): GateResult => {
  const reasons: NoUpdateReason[] = [];
  const status = toApplicationStatus(rawStatus);

  if (!companyMatch) {
    reasons.push("no_company_match");
  }
  if (!status) {
    reasons.push("unclear_status");
  }
  if (!(confidence >= minConfidence)) {
    reasons.push("low_confidence");
  }

  if (reasons.length > 0 || !status) {
    return { ok: false, reasons };
  }
  return { ok: true, status };
};

export const describeNoUpdateReasons = (
  reasons: NoUpdateReason[],
  context: { company: string | null; rawStatus: RawStatusGuess; confidence: number },
): string[] =>
  reasons.map((reason) => {
    switch (reason) {
      case "no_company_match":
        return `no company match for '${context.company ?? "unknown"}'`;
      case "unclear_status":
        return `unclear status ('${context.rawStatus}')`;
      case "low_confidence":
        return `low confidence (${context.confidence.toFixed(2)})`;
      case "no_records":
        return `no applications recorded for '${context.company ?? "unknown"}'`;
    }
  });

export const recordsForCompany = (records: ApplicationRecord[], company: string): ApplicationRecord[] => {
  const exact = records.filter((record) => record.company === company);
  if (exact.length > 0) {
    return exact;
  }
  const wanted = company.trim().toLowerCase();
  return records.filter((record) => record.company.trim().toLowerCase() === wanted);
};

const mentionsTitle = (emailText: string, title: string): boolean => {
  const normalized = title.trim().toLowerCase();
  if (normalized.length < MIN_TITLE_LENGTH) {
    return false;
  }
  if (emailText.includes(normalized)) {
    return true;
  }
  const keyWords = normalized.split(/\s+/).slice(0, TITLE_KEY_WORDS);
  return keyWords.every((word) => emailText.includes(word));
};

const mentionsLocation = (emailText: string, location: string): boolean => {
  const normalized = location.trim().toLowerCase();
  return normalized.length >= MIN_LOCATION_LENGTH && emailText.includes(normalized);
};

/** Milliseconds since epoch, or null when the stored date cannot be read. */
export const parseAppliedDate = (value: string): number | null => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const isoLike = /^\d{4}-\d{2}-\d{2} \d/.test(trimmed) ? trimmed.replace(" ", "T") : trimmed;
  const time = Date.parse(isoLike);
  return Number.isNaN(time) ? null : time;
};

/** Latest `dateApplied`; ties and unreadable dates resolve to the earliest row. */
export const mostRecentRecord = (records: ApplicationRecord[]): ApplicationRecord | null => {
  let best: ApplicationRecord | null = null;
  let bestTime: number | null = null;

  for (const record of records) {
    const time = parseAppliedDate(record.dateApplied);
    if (best === null) {
      best = record;
      bestTime = time;
      continue;
    }
    if (time !== null && (bestTime === null || time > bestTime)) {
      best = record;
      bestTime = time;
    }
  }

  return best;
};

/**
 * Narrows the company's records to the ones an email is about. With several
 * candidates it tries the job title, then the location, then company-wide
 * rejection wording, and otherwise settles on the most recent application
 * only.
 */
export const selectRecords = (input: SelectionInput): SelectionOutcome => {
  const gate = evaluateUpdateGate(input.companyMatch, input.rawStatus, input.confidence, input.minConfidence);
  if (!gate.ok) {
    return { kind: "no_update", reasons: gate.reasons };
  }

  const { records, emailText } = input;
  if (records.length === 0) {
    return { kind: "no_update", reasons: ["no_records"] };
  }
  if (records.length === 1) {
    return { kind: "selected", status: gate.status, records, strategy: "single" };
  }

  const byTitle = records.find((record) => mentionsTitle(emailText, record.title));
  if (byTitle) {
    return { kind: "selected", status: gate.status, records: [byTitle], strategy: "title" };
  }

  const byLocation = records.find((record) => mentionsLocation(emailText, record.workLocation));
  if (byLocation) {
    return { kind: "selected", status: gate.status, records: [byLocation], strategy: "location" };
  }

  if (BULK_REJECTION_PHRASES.some((bulkPhrase) => emailText.includes(bulkPhrase))) {
    return { kind: "selected", status: gate.status, records, strategy: "bulk" };
  }

  const recent = mostRecentRecord(records);
  return {
    kind: "selected",
    status: gate.status,
    records: recent ? [recent] : [],
    strategy: "most_recent",
  };
};

export interface TransitionContext {
  status: ApplicationStatus;
  subject: string;
  confidence: number;
  interviewDate: string | null;
  /** Records on file for the company, and how many of them this email selected. */
  companyTotal: number;
  selectedCount: number;
  now: Date;
}

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatNoteTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;

export const buildTransitionNote = (previous: ApplicationStatus, context: TransitionContext): string => {
  const snippet =
    context.subject.length > NOTE_SUBJECT_LENGTH
      ? `${context.subject.slice(0, NOTE_SUBJECT_LENGTH)}...`
      : context.subject;
  const partial =
    context.selectedCount < context.companyTotal
      ? ` | Note: ${context.companyTotal} total applications to this company, updated only this one`
      : "";
  return (
    `[${formatNoteTimestamp(context.now)}] Email scan: '${previous}' -> '${context.status}'` +
    ` | Email: "${snippet}" | Confidence: ${context.confidence.toFixed(2)}${partial}`
  );
};

/** Appends one line; existing text, whitespace included, is kept as written. */
export const appendNote = (notes: string, line: string): string => (notes.length > 0 ? `${notes}\n${line}` : line);

/**
 * Moves one record to the new status. Returns false, leaving the record
 * untouched, when it already has that status.
 */
export const applyTransition = (record: ApplicationRecord, context: TransitionContext): boolean => {
  if (record.status === context.status) {
    return false;
  }

  const previous = record.status;
  record.status = context.status;
  record.notes = appendNote(record.notes, buildTransitionNote(previous, context));
  if (context.interviewDate) {
    record.interviewDate = context.interviewDate;
  }
  return true;
};
