import { TransportError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ApplicationRecord, ApplicationTable, EmailEvidence } from "../types.js";
import type { ApplicationStore } from "./applicationStore.js";
import { resolveCompanyMatch } from "./companyMatcher.js";
import { correctJudgement, inferCompanyFromEvidence } from "./consistencyCorrector.js";
import { parseEmail } from "./emailParser.js";
import type { MailAccount, MailSource, MailSourceFactory } from "./mailService.js";
import type { ClassificationOracle, OracleResult } from "./ollamaService.js";
import {
  DEFAULT_MIN_CONFIDENCE,
  applyTransition,
  describeNoUpdateReasons,
  recordsForCompany,
  selectRecords,
  type NoUpdateReason,
} from "./recordSelector.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReconcilerOptions {
  accounts: MailAccount[];
  store: ApplicationStore;
  oracle: ClassificationOracle;
  createMailSource: MailSourceFactory;
  lookbackDays: number;
  minConfidence?: number;
  now?: () => Date;
}

export interface NoUpdateOutcome {
  subject: string;
  company: string | null;
  reasons: NoUpdateReason[];
  details: string[];
}

export interface AccountSummary {
  account: string;
  status: "success" | "error";
  message?: string;
  seen: number;
  processed: number;
  jobRelated: number;
  updated: number;
  /** False when updates were computed but the tracking file could not be written. */
  persisted: boolean;
  oracleSuccesses: number;
  oracleFailures: number;
  fetchErrors: number;
  noUpdates: NoUpdateOutcome[];
}

export interface ReconcileSummary {
  totalUpdates: number;
  accounts: AccountSummary[];
}

interface AccountPass {
  account: MailAccount;
  source: MailSource;
  table: ApplicationTable;
  knownCompanies: string[];
  /** Records already decided by a newer email during this pass. */
  settled: Set<ApplicationRecord>;
  reconnectsLeft: number;
  summary: AccountSummary;
}

const createSummary = (account: string): AccountSummary => ({
  account,
  status: "success",
  seen: 0,
  processed: 0,
  jobRelated: 0,
  updated: 0,
  persisted: true,
  oracleSuccesses: 0,
  oracleFailures: 0,
  fetchErrors: 0,
  noUpdates: [],
});

const distinctCompanies = (records: ApplicationRecord[]): string[] =>
  Array.from(new Set(records.map((record) => record.company.trim()).filter(Boolean)));

const describeSender = (evidence: EmailEvidence): string =>
  evidence.senderName ? `${evidence.senderName} <${evidence.senderAddress}>` : evidence.senderAddress;

const markFailed = (summary: AccountSummary, message: string): void => {
  summary.status = "error";
  summary.message = message.slice(0, 200);
};

/**
 * Scans each configured mailbox over a trailing window and moves tracked
 * applications to the status their emails report. Accounts and messages are
 * handled one at a time against a snapshot of the tracking store that is
 * written back once per account. No cursor is kept between runs: a rerun over
 * the same mail converges because unchanged statuses are left alone.
 */
export class Reconciler {
  private readonly minConfidence: number;
  private readonly now: () => Date;

  constructor(private readonly options: ReconcilerOptions) {
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<ReconcileSummary> {
    const accounts: AccountSummary[] = [];
    let totalUpdates = 0;

    for (const account of this.options.accounts) {
      const summary = await this.reconcileAccount(account);
      accounts.push(summary);
      if (summary.persisted) {
        totalUpdates += summary.updated;
      }
    }

    logger.info("Email scan completed", {
      accounts: accounts.length,
      totalUpdates,
      failedAccounts: accounts.filter((summary) => summary.status === "error").map((summary) => summary.account),
    });
    return { totalUpdates, accounts };
  }

  private async reconcileAccount(account: MailAccount): Promise<AccountSummary> {
    const summary = createSummary(account.username);

    let table: ApplicationTable;
    try {
      table = await this.options.store.load();
    } catch (error) {
      logger.error("Unable to load tracking store", error);
      markFailed(summary, errorMessage(error));
      return summary;
    }

    const pass: AccountPass = {
      account,
      source: this.options.createMailSource(account),
      table,
      knownCompanies: distinctCompanies(table.records),
      settled: new Set(),
      reconnectsLeft: 1,
      summary,
    };

    try {
      await this.scanMailbox(pass);
    } finally {
      await this.closeSource(pass);
    }

    if (summary.updated > 0) {
      try {
        await this.options.store.save(table);
      } catch (error) {
        logger.error("Unable to write tracking store; this account's updates are lost for this run", error);
        summary.persisted = false;
        markFailed(summary, errorMessage(error));
      }
    }

    logger.info("Account scan summary", {
      account: summary.account,
      status: summary.status,
      seen: summary.seen,
      jobRelated: summary.jobRelated,
      updated: summary.updated,
      oracleSuccesses: summary.oracleSuccesses,
      oracleFailures: summary.oracleFailures,
      fetchErrors: summary.fetchErrors,
    });
    return summary;
  }

  private async scanMailbox(pass: AccountPass): Promise<void> {
    const since = new Date(this.now().getTime() - this.options.lookbackDays * DAY_MS);

    let ids: string[];
    try {
      ids = await this.searchWithRetry(pass, since);
    } catch (error) {
      logger.error("Mailbox search failed", { account: pass.account.username, reason: errorMessage(error) });
      markFailed(pass.summary, errorMessage(error));
      return;
    }

    pass.summary.seen = ids.length;
    // Newest first, so the latest email settles a record before older ones are read.
    for (const id of [...ids].reverse()) {
      const raw = await this.fetchWithReconnect(pass, id);
      if (raw === "abort") {
        return;
      }
      if (raw === "skip") {
        continue;
      }

      pass.summary.processed += 1;
      try {
        await this.processMessage(pass, raw);
      } catch (error) {
        pass.summary.fetchErrors += 1;
        logger.warn("Failed to process email during scan", { account: pass.account.username, id, reason: errorMessage(error) });
      }
    }
  }

  private async searchWithRetry(pass: AccountPass, since: Date): Promise<string[]> {
    try {
      await pass.source.connect();
      return await pass.source.search(since);
    } catch (error) {
      if (!(error instanceof TransportError) || pass.reconnectsLeft === 0) {
        throw error;
      }
      pass.reconnectsLeft -= 1;
      logger.warn("Mailbox unavailable, reconnecting once", { account: pass.account.username, reason: error.message });
      await pass.source.connect();
      return pass.source.search(since);
    }
  }

  private async fetchWithReconnect(pass: AccountPass, id: string): Promise<Buffer | "skip" | "abort"> {
    try {
      return await pass.source.fetch(id);
    } catch (error) {
      if (!(error instanceof TransportError)) {
        pass.summary.fetchErrors += 1;
        logger.warn("Failed to fetch email", { account: pass.account.username, id, reason: errorMessage(error) });
        return "skip";
      }
      if (pass.reconnectsLeft === 0) {
        logger.error("Mail connection lost again; abandoning remaining messages", {
          account: pass.account.username,
          reason: error.message,
        });
        markFailed(pass.summary, error.message);
        return "abort";
      }
      pass.reconnectsLeft -= 1;
      logger.warn("Mail connection lost, reconnecting once", { account: pass.account.username, reason: error.message });
    }

    try {
      await pass.source.connect();
    } catch (error) {
      logger.error("Reconnect failed; abandoning remaining messages", {
        account: pass.account.username,
        reason: errorMessage(error),
      });
      markFailed(pass.summary, errorMessage(error));
      return "abort";
    }

    try {
      return await pass.source.fetch(id);
    } catch (error) {
      pass.summary.fetchErrors += 1;
      logger.warn("Failed to fetch email after reconnect", { account: pass.account.username, id, reason: errorMessage(error) });
      return "skip";
    }
  }

  private async classify(pass: AccountPass, evidence: EmailEvidence): Promise<OracleResult> {
    try {
      return await this.options.oracle({
        sender: describeSender(evidence),
        subject: evidence.subject,
        body: evidence.body,
        knownCompanies: pass.knownCompanies,
      });
    } catch (error) {
      return { kind: "provider_error", error: errorMessage(error) };
    }
  }

  private async processMessage(pass: AccountPass, raw: Buffer): Promise<void> {
    const { summary } = pass;
    const evidence = await parseEmail(raw, this.now());

    const result = await this.classify(pass, evidence);
    if (result.kind !== "ok") {
      summary.oracleFailures += 1;
      logger.warn("Classification failed; email left without effect", {
        account: pass.account.username,
        subject: evidence.subject,
        kind: result.kind,
        reason: result.error,
      });
      return;
    }
    summary.oracleSuccesses += 1;

    const judgement = correctJudgement(inferCompanyFromEvidence(result.judgement, evidence), evidence.body, evidence.subject);
    if (!judgement.isJobRelated) {
      return;
    }
    summary.jobRelated += 1;

    const match = resolveCompanyMatch(judgement, pass.knownCompanies);
    const candidates = match.company ? recordsForCompany(pass.table.records, match.company) : [];
    const outcome = selectRecords({
      companyMatch: match.company,
      rawStatus: judgement.status,
      confidence: judgement.confidence,
      emailText: `${evidence.subject} ${evidence.body}`,
      records: candidates,
      minConfidence: this.minConfidence,
    });

    if (outcome.kind === "no_update") {
      const company = match.company ?? judgement.companyExtracted;
      const details = describeNoUpdateReasons(outcome.reasons, {
        company,
        rawStatus: judgement.status,
        confidence: judgement.confidence,
      });
      summary.noUpdates.push({ subject: evidence.subject, company, reasons: outcome.reasons, details });
      logger.info("No update for job-related email", { subject: evidence.subject, reasons: details });
      return;
    }

    for (const record of outcome.records) {
      if (pass.settled.has(record)) {
        logger.debug("Record already settled by a newer email", { jobId: record.jobId, subject: evidence.subject });
        continue;
      }
      pass.settled.add(record);

      const previous = record.status;
      const changed = applyTransition(record, {
        status: outcome.status,
        subject: evidence.subject,
        confidence: judgement.confidence,
        interviewDate: judgement.interviewDate,
        companyTotal: candidates.length,
        selectedCount: outcome.records.length,
        now: this.now(),
      });
      if (changed) {
        summary.updated += 1;
        logger.info("Application status updated", {
          jobId: record.jobId,
          company: record.company,
          from: previous,
          to: outcome.status,
          strategy: outcome.strategy,
          confidence: judgement.confidence,
        });
      }
    }
  }

  private async closeSource(pass: AccountPass): Promise<void> {
    try {
      await pass.source.disconnect();
    } catch (error) {
      logger.warn("Failed to disconnect from mailbox", { account: pass.account.username, reason: errorMessage(error) });
    }
  }
}
