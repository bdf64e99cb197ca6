import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { config } from "./config.js";
import { errorMessage } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { APPLICATION_STATUSES, toApplicationStatus, type ApplicationRecord } from "./types.js";
import type { ApplicationStore } from "./services/applicationStore.js";
import { startSchedulers } from "./scheduler.js";
import {
  createScanRunner,
  createStore,
  createStoreLock,
  mutateStore,
  type ScanRunner,
  type StoreLock,
} from "./services/scanService.js";
import {
  diffStatusCounts,
  filterApplications,
  generateApplicationStats,
  updateApplicationStatus,
  updateDateApplied,
  updateInterviewDate,
  type ApplicationStats,
} from "./services/statusService.js";

export interface CliDependencies {
  store: ApplicationStore;
  lock: StoreLock;
  runScan: ScanRunner;
  schedule: () => Promise<void>;
  print: (line: string) => void;
}

const USAGE = [
  "Usage: cli <command> [options]",
  "  list [--status <status>] [--company <name>]",
  "  update <jobId> <status> [--notes <text>]",
  '  interview-date <jobId> <"YYYY-MM-DD HH:MM:SS" | "">',
  '  date-applied <jobId> ["YYYY-MM-DD HH:MM:SS"] [--notes <text>]',
  "  scan",
  "  stats",
  "  schedule",
].join("\n");

export const formatApplication = (record: ApplicationRecord): string =>
  [record.jobId, record.company, record.title, record.status, record.dateApplied].join(" | ");

export const formatStats = (stats: ApplicationStats): string[] => [
  `Total applications: ${stats.total}`,
  ...APPLICATION_STATUSES.filter((status) => stats.statuses[status] > 0).map(
    (status) => `  ${status}: ${stats.statuses[status]}`,
  ),
  `Response rate: ${stats.responseRate.toFixed(1)}%`,
];

const parseStatus = (raw: string | undefined): ReturnType<typeof toApplicationStatus> => {
  if (raw === undefined) {
    return null;
  }
  const status = toApplicationStatus(raw);
  if (!status) {
    throw new Error(`Unknown status '${raw}'. Valid statuses: ${APPLICATION_STATUSES.join(", ")}`);
  }
  return status;
};

/** Runs one command and returns the process exit code. */
export const runCli = async (argv: string[], deps: CliDependencies): Promise<number> => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      status: { type: "string" },
      company: { type: "string" },
      notes: { type: "string" },
    },
  });
  const [command, ...rest] = positionals;

  switch (command) {
    case "list": {
      const status = parseStatus(values.status);
      const table = await deps.store.load();
      const records = filterApplications(table.records, {
        status: status ?? undefined,
        company: values.company,
      });
      records.forEach((record) => deps.print(formatApplication(record)));
      deps.print(`${records.length} application(s)`);
      return 0;
    }
    case "update": {
      const [jobId, rawStatus] = rest;
      const status = parseStatus(rawStatus);
      if (!jobId || !status) {
        deps.print(USAGE);
        return 1;
      }
      await mutateStore(deps.store, deps.lock, (table) => updateApplicationStatus(table, jobId, status, values.notes));
      deps.print(`Updated ${jobId} to '${status}'`);
      return 0;
    }
    case "interview-date": {
      const [jobId, date] = rest;
      if (!jobId || date === undefined) {
        deps.print(USAGE);
        return 1;
      }
      const record = await mutateStore(deps.store, deps.lock, (table) => updateInterviewDate(table, jobId, date));
      deps.print(
        record.interviewDate
          ? `Interview date for ${jobId} set to '${record.interviewDate}' (status: ${record.status})`
          : `Interview date for ${jobId} cleared`,
      );
      return 0;
    }
    case "date-applied": {
      const [jobId, date = ""] = rest;
      if (!jobId) {
        deps.print(USAGE);
        return 1;
      }
      const record = await mutateStore(deps.store, deps.lock, (table) =>
        updateDateApplied(table, jobId, date, values.notes),
      );
      deps.print(`Date applied for ${jobId} set to '${record.dateApplied}'`);
      return 0;
    }
    case "scan": {
      const before = generateApplicationStats((await deps.store.load()).records);
      const summary = await deps.runScan();
      const after = generateApplicationStats((await deps.store.load()).records);

      for (const account of summary.accounts) {
        const state = account.status === "success" ? "ok" : `error: ${account.message ?? "unknown"}`;
        deps.print(
          `${account.account}: ${state}; ${account.seen} seen, ${account.jobRelated} job-related, ${account.updated} updated`,
        );
      }
      for (const change of diffStatusCounts(before, after).filter((entry) => entry.change !== 0)) {
        const sign = change.change > 0 ? "+" : "";
        deps.print(`  ${change.status}: ${change.before} -> ${change.after} (${sign}${change.change})`);
      }
      deps.print(`Total updates: ${summary.totalUpdates}`);
      return summary.accounts.some((account) => account.status === "error") ? 1 : 0;
    }
    case "stats": {
      const table = await deps.store.load();
      formatStats(generateApplicationStats(table.records)).forEach((line) => deps.print(line));
      return 0;
    }
    case "schedule":
      await deps.schedule();
      return 0;
    default:
      deps.print(USAGE);
      return 1;
  }
};

const main = async (): Promise<void> => {
  const store = createStore(config);
  const lock = createStoreLock();
  const runScan = createScanRunner(config, { store, lock });

  const code = await runCli(process.argv.slice(2), {
    store,
    lock,
    runScan,
    schedule: () =>
      startSchedulers({ cronExpression: config.SCAN_CRON, runOnStart: config.SCAN_ON_START, runScan }),
    print: (line) => console.log(line),
  });
  if (code !== 0) {
    process.exitCode = code;
  }
};

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  main().catch((error: unknown) => {
    logger.error("Command failed", errorMessage(error));
    process.exitCode = 1;
  });
}
