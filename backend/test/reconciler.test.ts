import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { StoreWriteError, TransportError } from "../src/lib/errors.js";
import { InMemoryApplicationStore } from "../src/services/applicationStore.js";
import type { MailAccount, MailSource } from "../src/services/mailService.js";
import type { ClassificationOracle, OracleRequest, OracleResult } from "../src/services/ollamaService.js";
import { Reconciler, type ReconcilerOptions } from "../src/services/reconciler.js";
import { createScanRunner } from "../src/services/scanService.js";
import { loadConfig } from "../src/config.js";
import type { ApplicationTable } from "../src/types.js";
import { makeJudgement, makeRecord, makeTable, rawEmail } from "./helpers.js";

const NOW = new Date(2024, 4, 6, 9, 5);
const ACCOUNT: MailAccount = { username: "me@example.com", password: "test-secret", server: "imap.example.com", port: 993 };

const REJECTION = rawEmail({
  from: "Acme Recruiting <jobs@acme.com>",
  subject: "Update on your application",
  body: "We regret to inform you that we will not continue with your candidacy.",
});

const INVITATION = rawEmail({
  from: "Acme Recruiting <jobs@acme.com>",
  subject: "Interview invitation",
  body: "Please join us for an interview on May 10.",
});

class FakeMailSource implements MailSource {
  connects = 0;
  disconnects = 0;
  searches: Date[] = [];

  constructor(
    private readonly messages: Map<string, string>,
    private readonly fetchFailures: Error[] = [],
    private readonly searchFailures: Error[] = [],
  ) {}

  async connect(): Promise<void> {
    this.connects += 1;
  }

  async search(since: Date): Promise<string[]> {
    this.searches.push(since);
    const failure = this.searchFailures.shift();
    if (failure) {
      throw failure;
    }
    return Array.from(this.messages.keys());
  }

  async fetch(id: string): Promise<Buffer> {
    const failure = this.fetchFailures.shift();
    if (failure) {
      throw failure;
    }
    const message = this.messages.get(id);
    if (message === undefined) {
      throw new Error(`no message ${id}`);
    }
    return Buffer.from(message);
  }

  async disconnect(): Promise<void> {
    this.disconnects += 1;
  }
}

const oracleBySubject =
  (results: Record<string, OracleResult>, calls: OracleRequest[] = []): ClassificationOracle =>
  async (request) => {
    calls.push(request);
    return results[request.subject] ?? { kind: "ok", judgement: makeJudgement({ isJobRelated: false, status: "Other" }) };
  };

const REJECTED: OracleResult = { kind: "ok", judgement: makeJudgement() };
const INTERVIEW: OracleResult = {
  kind: "ok",
  judgement: makeJudgement({ status: "Interview Scheduled", interviewDate: "2024-05-10 14:00" }),
};

const reconciler = (
  source: FakeMailSource,
  store: InMemoryApplicationStore,
  oracle: ClassificationOracle,
  overrides: Partial<ReconcilerOptions> = {},
): Reconciler =>
  new Reconciler({
    accounts: [ACCOUNT],
    store,
    oracle,
    createMailSource: () => source,
    lookbackDays: 3,
    now: () => NOW,
    ...overrides,
  });

const singleRecordStore = (): InMemoryApplicationStore => new InMemoryApplicationStore(makeTable([makeRecord()]));

const firstRecord = (table: ApplicationTable) => {
  const record = table.records[0];
  assert.ok(record);
  return record;
};

describe("Reconciler", () => {
  it("applies a rejection and records it in the notes", async () => {
    const store = singleRecordStore();
    const calls: OracleRequest[] = [];
    const source = new FakeMailSource(new Map([["1", REJECTION]]));

    const summary = await reconciler(source, store, oracleBySubject({ "update on your application": REJECTED }, calls)).run();

    assert.equal(summary.totalUpdates, 1);
    const record = firstRecord(store.snapshot());
    assert.equal(record.status, "Rejected");
    assert.equal(
      record.notes,
      `[2024-05-06 09:05] Email scan: 'Applied' -> 'Rejected' | Email: "update on your application" | Confidence: 0.90`,
    );
    assert.equal(store.saves, 1);
    assert.deepEqual(calls[0]?.knownCompanies, ["Acme Corp"]);
    assert.equal(calls[0]?.sender, "Acme Recruiting <jobs@acme.com>");
    assert.equal(source.searches[0]?.getTime(), NOW.getTime() - 3 * 24 * 60 * 60 * 1000);
    assert.equal(source.disconnects, 1);
  });

  it("changes nothing when the same mail is scanned again", async () => {
    const store = singleRecordStore();
    const oracle = oracleBySubject({ "update on your application": REJECTED });

    await reconciler(new FakeMailSource(new Map([["1", REJECTION]])), store, oracle).run();
    const afterFirst = store.snapshot();
    const second = await reconciler(new FakeMailSource(new Map([["1", REJECTION]])), store, oracle).run();

    assert.equal(second.totalUpdates, 0);
    assert.deepEqual(store.snapshot(), afterFirst);
    assert.equal(store.saves, 1);
  });

  it("leaves records untouched when classification fails", async () => {
    const store = singleRecordStore();
    const oracle: ClassificationOracle = async () => ({ kind: "provider_error", error: "Ollama request aborted after 30000ms" });

    const summary = await reconciler(new FakeMailSource(new Map([["1", REJECTION]])), store, oracle).run();

    assert.equal(summary.totalUpdates, 0);
    assert.equal(summary.accounts[0]?.oracleFailures, 1);
    assert.equal(summary.accounts[0]?.oracleSuccesses, 0);
    assert.deepEqual(store.snapshot(), makeTable([makeRecord()]));
    assert.equal(store.saves, 0);
  });

  it("counts a throwing classifier as a failure", async () => {
    const oracle: ClassificationOracle = async () => {
      throw new Error("boom");
    };

    const summary = await reconciler(new FakeMailSource(new Map([["1", REJECTION]])), singleRecordStore(), oracle).run();

    assert.equal(summary.accounts[0]?.status, "success");
    assert.equal(summary.accounts[0]?.oracleFailures, 1);
  });

  it("lets the newest email settle a record", async () => {
    const store = singleRecordStore();
    const oracle = oracleBySubject({ "update on your application": REJECTED, "interview invitation": INTERVIEW });
    const source = new FakeMailSource(
      new Map([
        ["1", REJECTION],
        ["2", INVITATION],
      ]),
    );

    const summary = await reconciler(source, store, oracle).run();

    assert.equal(summary.totalUpdates, 1);
    const record = firstRecord(store.snapshot());
    assert.equal(record.status, "Interview Scheduled");
    assert.equal(record.interviewDate, "2024-05-10 14:00");
  });

  it("reports job-related emails that could not be applied", async () => {
    const store = singleRecordStore();
    const oracle = oracleBySubject({
      "update on your application": { kind: "ok", judgement: makeJudgement({ status: "Applied", confidence: 0.4 }) },
    });
    const source = new FakeMailSource(
      new Map([
        [
          "1",
          rawEmail({ from: "jobs@acme.com", subject: "Update on your application", body: "We are reviewing your profile." }),
        ],
      ]),
    );

    const summary = await reconciler(source, store, oracle).run();

    assert.equal(summary.accounts[0]?.jobRelated, 1);
    assert.deepEqual(summary.accounts[0]?.noUpdates, [
      {
        subject: "update on your application",
        company: "Acme Corp",
        reasons: ["low_confidence"],
        details: ["low confidence (0.40)"],
      },
    ]);
  });

  it("skips emails that are not about an application", async () => {
    const summary = await reconciler(
      new FakeMailSource(new Map([["1", rawEmail({ from: "news@shop.example", subject: "Big sale", body: "Everything half off." })]])),
      singleRecordStore(),
      oracleBySubject({}),
    ).run();

    assert.equal(summary.accounts[0]?.seen, 1);
    assert.equal(summary.accounts[0]?.processed, 1);
    assert.equal(summary.accounts[0]?.jobRelated, 0);
    assert.equal(summary.accounts[0]?.updated, 0);
  });

  it("reconnects once when the connection drops", async () => {
    const store = singleRecordStore();
    const source = new FakeMailSource(new Map([["1", REJECTION]]), [new TransportError("connection reset")]);

    const summary = await reconciler(source, store, oracleBySubject({ "update on your application": REJECTED })).run();

    assert.equal(source.connects, 2);
    assert.equal(summary.totalUpdates, 1);
    assert.equal(summary.accounts[0]?.status, "success");
  });

  it("abandons the account when the connection drops again", async () => {
    const store = singleRecordStore();
    const source = new FakeMailSource(
      new Map([
        ["1", REJECTION],
        ["2", INVITATION],
      ]),
      [new TransportError("connection reset"), new TransportError("connection reset"), new TransportError("connection reset")],
    );

    const summary = await reconciler(source, store, oracleBySubject({})).run();

    assert.equal(summary.accounts[0]?.status, "error");
    assert.equal(summary.accounts[0]?.message, "connection reset");
    assert.equal(summary.accounts[0]?.fetchErrors, 1);
    assert.equal(summary.accounts[0]?.processed, 0);
    assert.equal(source.disconnects, 1);
  });

  it("counts a failed fetch and moves on", async () => {
    const store = singleRecordStore();
    const source = new FakeMailSource(
      new Map([
        ["1", REJECTION],
        ["2", INVITATION],
      ]),
      [new Error("message vanished")],
    );

    const summary = await reconciler(source, store, oracleBySubject({ "update on your application": REJECTED })).run();

    assert.equal(summary.accounts[0]?.fetchErrors, 1);
    assert.equal(summary.totalUpdates, 1);
    assert.equal(firstRecord(store.snapshot()).status, "Rejected");
  });

  it("retries a failed search once", async () => {
    const source = new FakeMailSource(new Map([["1", REJECTION]]), [], [new TransportError("timeout")]);

    const summary = await reconciler(source, singleRecordStore(), oracleBySubject({ "update on your application": REJECTED })).run();

    assert.equal(source.connects, 2);
    assert.equal(summary.totalUpdates, 1);
  });

  it("does not count updates that could not be written", async () => {
    class FailingStore extends InMemoryApplicationStore {
      async save(): Promise<void> {
        throw new StoreWriteError("disk full");
      }
    }
    const store = new FailingStore(makeTable([makeRecord()]));

    const summary = await reconciler(
      new FakeMailSource(new Map([["1", REJECTION]])),
      store,
      oracleBySubject({ "update on your application": REJECTED }),
    ).run();

    assert.equal(summary.totalUpdates, 0);
    assert.equal(summary.accounts[0]?.status, "error");
    assert.equal(summary.accounts[0]?.persisted, false);
    assert.equal(summary.accounts[0]?.updated, 1);
    assert.equal(summary.accounts[0]?.message, "disk full");
  });

  it("keeps going after a failed account", async () => {
    const store = singleRecordStore();
    const second: MailAccount = { ...ACCOUNT, username: "other@example.com" };
    const sources = new Map<string, FakeMailSource>([
      [ACCOUNT.username, new FakeMailSource(new Map(), [], [new Error("authentication failed")])],
      [second.username, new FakeMailSource(new Map([["7", REJECTION]]))],
    ]);

    const summary = await reconciler(new FakeMailSource(new Map()), store, oracleBySubject({ "update on your application": REJECTED }), {
      accounts: [ACCOUNT, second],
      createMailSource: (account) => sources.get(account.username) ?? new FakeMailSource(new Map()),
    }).run();

    assert.deepEqual(
      summary.accounts.map((account) => [account.account, account.status, account.updated]),
      [
        ["me@example.com", "error", 0],
        ["other@example.com", "success", 1],
      ],
    );
    assert.equal(summary.totalUpdates, 1);
  });
});

describe("createScanRunner", () => {
  it("joins a scan that is already running", async () => {
    const config = loadConfig({ MAIL_USERNAME: "me@example.com", MAIL_PASSWORD: "test-secret" });
    let connects = 0;
    const runScan = createScanRunner(config, {
      store: singleRecordStore(),
      oracle: oracleBySubject({}),
      createMailSource: () => {
        connects += 1;
        return new FakeMailSource(new Map());
      },
      now: () => NOW,
    });

    const [first, second] = await Promise.all([runScan(), runScan()]);

    assert.equal(first, second);
    assert.equal(connects, 1);
  });
});
