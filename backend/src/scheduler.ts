import cron, { type ScheduledTask } from "node-cron";
import { logger } from "./lib/logger.js";
import type { ScanRunner } from "./services/scanService.js";

let scanTask: ScheduledTask | null = null;

const runSafely = async (runScan: ScanRunner, trigger: string): Promise<void> => {
  try {
    const summary = await runScan();
    logger.info("Scheduled scan finished", { trigger, totalUpdates: summary.totalUpdates });
  } catch (error) {
    logger.error("Scheduled scan failed", error);
  }
};

const stopTask = (task: ScheduledTask | null): void => {
  if (!task) {
    return;
  }
  task.stop();
};

export interface SchedulerOptions {
  cronExpression: string;
  runOnStart: boolean;
  runScan: ScanRunner;
}

export const startSchedulers = async (options: SchedulerOptions): Promise<void> => {
  if (!cron.validate(options.cronExpression)) {
    throw new Error(`Invalid SCAN_CRON expression: ${options.cronExpression}`);
  }

  stopTask(scanTask);
  scanTask = cron.schedule(options.cronExpression, () => runSafely(options.runScan, "cron"));
  logger.info("Schedulers started", { scanCron: options.cronExpression, runOnStart: options.runOnStart });

  if (options.runOnStart) {
    await runSafely(options.runScan, "startup");
  }
};

export const stopSchedulers = (): void => {
  stopTask(scanTask);
  scanTask = null;
  logger.info("Schedulers stopped");
};
