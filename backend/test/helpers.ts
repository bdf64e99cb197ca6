import type { ApplicationRecord, ApplicationTable, Judgement } from "../src/types.js";
import { REQUIRED_COLUMNS } from "../src/services/applicationStore.js";

export const makeRecord = (overrides: Partial<ApplicationRecord> = {}): ApplicationRecord => ({
  jobId: "J1",
  title: "Software Engineer",
  company: "Acme Corp",
  workLocation: "",
  status: "Applied",
  dateApplied: "2024-03-01 10:00",
  interviewDate: "",
  notes: "",
  extra: {},
  ...overrides,
});

export const makeTable = (records: ApplicationRecord[]): ApplicationTable => ({
  columns: [...REQUIRED_COLUMNS],
  records,
});

export const makeJudgement = (overrides: Partial<Judgement> = {}): Judgement => ({
  isJobRelated: true,
  companyExtracted: "Acme",
  companyMatch: "Acme Corp",
  status: "Rejected",
  confidence: 0.9,
  interviewDate: null,
  reasoning: "Clear outcome",
  ...overrides,
});

export const rawEmail = (options: { from: string; subject: string; body: string; date?: string }): string =>
  [
    `From: ${options.from}`,
    "To: candidate@example.com",
    `Subject: ${options.subject}`,
    `Date: ${options.date ?? "Mon, 06 May 2024 08:00:00 +0000"}`,
    "MIME-Version: 1.0",
    "Content-Type: text/plain; charset=utf-8",
    "",
    options.body,
    "",
  ].join("\r\n");
