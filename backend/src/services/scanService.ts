import type { AppConfig } from "../config.js";
import { logger } from "../lib/logger.js";
import type { ApplicationTable } from "../types.js";
import { CsvApplicationStore, type ApplicationStore } from "./applicationStore.js";
import { createImapMailSource, type MailSourceFactory } from "./mailService.js";
import { createOllamaOracle, type ClassificationOracle } from "./ollamaService.js";
import { Reconciler, type ReconcileSummary } from "./reconciler.js";

export interface ScanDependencies {
  store?: ApplicationStore;
  oracle?: ClassificationOracle;
  createMailSource?: MailSourceFactory;
  now?: () => Date;
  lock?: StoreLock;
}

export type ScanRunner = () => Promise<ReconcileSummary>;

/** Runs tasks one after another; every writer of the tracking file goes through the same lock. */
export type StoreLock = <T>(task: () => Promise<T>) => Promise<T>;

export const createStoreLock = (): StoreLock => {
  let tail: Promise<void> = Promise.resolve();

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task);
    tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };
};

/** Loads the table, applies one change and saves it, all while holding the lock. */
export const mutateStore = <T>(
  store: ApplicationStore,
  lock: StoreLock,
  change: (table: ApplicationTable) => T,
): Promise<T> =>
  lock(async () => {
    const table = await store.load();
    const result = change(table);
    await store.save(table);
    return result;
  });

export const createStore = (appConfig: AppConfig): ApplicationStore => new CsvApplicationStore(appConfig.APPLICATIONS_CSV);

export const createReconciler = (appConfig: AppConfig, deps: ScanDependencies = {}): Reconciler =>
  new Reconciler({
    accounts: appConfig.mailAccounts,
    store: deps.store ?? createStore(appConfig),
    oracle:
      deps.oracle ??
      createOllamaOracle({
        enabled: appConfig.OLLAMA_ENABLED,
        baseUrl: appConfig.OLLAMA_BASE_URL,
        model: appConfig.OLLAMA_MODEL,
        timeoutMs: appConfig.OLLAMA_TIMEOUT_MS,
        bodyLimit: appConfig.ORACLE_BODY_LIMIT,
      }),
    createMailSource: deps.createMailSource ?? createImapMailSource,
    lookbackDays: appConfig.SCAN_LOOKBACK_DAYS,
    minConfidence: appConfig.STATUS_MIN_CONFIDENCE,
    now: deps.now,
  });

/**
 * Returns a runner that lets only one pass run at a time: a call made while a
 * pass is in flight gets that pass's summary. The pass holds the store lock, so
 * manual updates sharing the lock wait for it instead of being overwritten.
 */
export const createScanRunner = (appConfig: AppConfig, deps: ScanDependencies = {}): ScanRunner => {
  const lock = deps.lock ?? createStoreLock();
  let inFlight: Promise<ReconcileSummary> | null = null;

  return () => {
    if (inFlight) {
      logger.info("Email scan already running, joining it");
      return inFlight;
    }

    if (appConfig.mailAccounts.length === 0) {
      logger.warn("No mail accounts configured; set MAIL_ACCOUNTS or MAIL_USERNAME and MAIL_PASSWORD");
    }

    const pass = lock(() => createReconciler(appConfig, deps).run());
    inFlight = pass;
    return pass.finally(() => {
      inFlight = null;
    });
  };
};
