import cors from "cors";
import express from "express";
import { z } from "zod";
import { config } from "./config.js";
import { InvalidDateError, UnknownApplicationError } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { APPLICATION_STATUSES } from "./types.js";
import type { ApplicationStore } from "./services/applicationStore.js";
import {
  createScanRunner,
  createStore,
  createStoreLock,
  mutateStore,
  type ScanRunner,
  type StoreLock,
} from "./services/scanService.js";
import {
  filterApplications,
  generateApplicationStats,
  updateApplicationStatus,
  updateDateApplied,
  updateInterviewDate,
} from "./services/statusService.js";

export interface AppDependencies {
  store: ApplicationStore;
  /** Shared with `runScan` so manual edits never interleave with a scan's load and save. */
  lock: StoreLock;
  runScan: ScanRunner;
  frontendOrigin: string;
}

const asyncHandler =
  <T extends express.RequestHandler>(handler: T): express.RequestHandler =>
    async (req, res, next) => {
      try {
        await handler(req, res, next);
      } catch (error) {
        next(error);
      }
    };

const statusSchema = z.enum(APPLICATION_STATUSES);

const listQuerySchema = z.object({
  status: statusSchema.optional(),
  company: z.string().optional(),
});

const updateStatusSchema = z.object({
  status: statusSchema,
  notes: z.string().optional(),
});

const interviewDateSchema = z.object({
  interviewDate: z.string(),
});

const dateAppliedSchema = z.object({
  dateApplied: z.string().optional(),
  notes: z.string().optional(),
});

const getAllowedFrontendOrigins = (frontendOrigin: string): Set<string> => {
  const allowedOrigins = new Set<string>([
    frontendOrigin,
    "http://localhost:5173",
    "http://127.0.0.1:5173",
  ]);
  const parsed = new URL(frontendOrigin);

  if (parsed.hostname === "127.0.0.1") {
    parsed.hostname = "localhost";
    allowedOrigins.add(parsed.origin);
  } else if (parsed.hostname === "localhost") {
    parsed.hostname = "127.0.0.1";
    allowedOrigins.add(parsed.origin);
  }

  return allowedOrigins;
};

const defaultDependencies = (): AppDependencies => {
  const store = createStore(config);
  const lock = createStoreLock();
  return {
    store,
    lock,
    runScan: createScanRunner(config, { store, lock }),
    frontendOrigin: config.FRONTEND_ORIGIN,
  };
};

export const createApp = (deps: AppDependencies = defaultDependencies()): express.Express => {
  const app = express();
  const allowedFrontendOrigins = getAllowedFrontendOrigins(deps.frontendOrigin);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedFrontendOrigins.has(origin)) {
          callback(null, true);
          return;
        }

        callback(null, false);
      },
      credentials: false,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, service: "application-status-tracker" });
  });

  app.get(
    "/api/applications",
    asyncHandler(async (req, res) => {
      const query = listQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: "Invalid filter", details: query.error.issues });
        return;
      }

      const table = await deps.store.load();
      res.json({ applications: filterApplications(table.records, query.data) });
    }),
  );

  app.patch(
    "/api/applications/:jobId/status",
    asyncHandler(async (req, res) => {
      const body = updateStatusSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: "Invalid status update", details: body.error.issues });
        return;
      }

      const { status, notes } = body.data;
      const record = await mutateStore(deps.store, deps.lock, (table) =>
        updateApplicationStatus(table, req.params.jobId, status, notes),
      );
      logger.info("Application status updated manually", { jobId: record.jobId, status: record.status });
      res.json({ application: record });
    }),
  );

  app.patch(
    "/api/applications/:jobId/interview-date",
    asyncHandler(async (req, res) => {
      const body = interviewDateSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: "Missing interviewDate", details: body.error.issues });
        return;
      }

      const { interviewDate } = body.data;
      const record = await mutateStore(deps.store, deps.lock, (table) =>
        updateInterviewDate(table, req.params.jobId, interviewDate),
      );
      logger.info("Interview date updated manually", { jobId: record.jobId, interviewDate: record.interviewDate });
      res.json({ application: record });
    }),
  );

  app.patch(
    "/api/applications/:jobId/date-applied",
    asyncHandler(async (req, res) => {
      const body = dateAppliedSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: "Invalid date update", details: body.error.issues });
        return;
      }

      const { dateApplied = "", notes } = body.data;
      const record = await mutateStore(deps.store, deps.lock, (table) =>
        updateDateApplied(table, req.params.jobId, dateApplied, notes),
      );
      logger.info("Date applied updated manually", { jobId: record.jobId, dateApplied: record.dateApplied });
      res.json({ application: record });
    }),
  );

  app.get(
    "/api/stats",
    asyncHandler(async (_req, res) => {
      const table = await deps.store.load();
      res.json(generateApplicationStats(table.records));
    }),
  );

  app.post(
    "/api/scan",
    asyncHandler(async (_req, res) => {
      const summary = await deps.runScan();
      res.json(summary);
    }),
  );

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof UnknownApplicationError) {
      res.status(404).json({ error: error.message });
      return;
    }
    if (error instanceof InvalidDateError) {
      res.status(400).json({ error: error.message });
      return;
    }
    logger.error("Request failed", error);
    const message = error instanceof Error ? error.message : "Unexpected server error";
    res.status(500).json({ error: message });
  });

  return app;
};
