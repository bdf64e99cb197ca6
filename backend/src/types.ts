export const APPLICATION_STATUSES = [
  "Applied",
  "Assessment",
  "Follow-up Required",
  "Interview Scheduled",
  "Interviewed",
  "Rejected",
  "Offered",
  "Accepted",
  "Declined",
] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

/** Status text as the classifier produced it; may be "Other" or anything else. */
export type RawStatusGuess = string;

export const DEFAULT_STATUS: ApplicationStatus = "Applied";

export interface ApplicationRecord {
  jobId: string;
  title: string;
  company: string;
  workLocation: string;
  status: ApplicationStatus;
  dateApplied: string;
  interviewDate: string;
  notes: string;
  /**
   * Status cell text that named no known status (blank or unknown), read as
   * Applied. Written back unchanged until the record's status moves.
   */
  storedStatus?: string;
  /** Columns outside the tracker's concern (resume path, job link, ...), kept for write-back. */
  extra: Record<string, string>;
}

export interface ApplicationTable {
  columns: string[];
  records: ApplicationRecord[];
}

export interface EmailEvidence {
  senderName: string;
  senderAddress: string;
  subject: string;
  body: string;
  receivedAt: Date;
}

export interface Judgement {
  isJobRelated: boolean;
  companyExtracted: string | null;
  companyMatch: string | null;
  status: RawStatusGuess;
  confidence: number;
  interviewDate: string | null;
  reasoning: string;
}

export interface MatchResult {
  company: string | null;
  score: number;
}

const STATUS_LOOKUP = new Map<string, ApplicationStatus>(
  APPLICATION_STATUSES.map((status) => [status.toLowerCase(), status]),
);

export const isApplicationStatus = (value: string): value is ApplicationStatus =>
  STATUS_LOOKUP.get(value.toLowerCase()) === value;

export const toApplicationStatus = (raw: RawStatusGuess | null | undefined): ApplicationStatus | null => {
  if (!raw) {
    return null;
  }
  const normalized = raw.trim().replace(/\s+/g, " ").toLowerCase();
  return STATUS_LOOKUP.get(normalized) ?? null;
};
