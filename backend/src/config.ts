import "dotenv/config";
import path from "path";
import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(process.cwd(), "backend", ".env") }); // Also check subfolder if run from root
import { z } from "zod";

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === "boolean" ? value : !["false", "0", "no", "off", ""].includes(value.trim().toLowerCase())));

const mailAccountSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  server: z.string().min(1).default("imap.gmail.com"),
  port: z.coerce.number().int().positive().default(993),
});

export type MailAccountConfig = z.infer<typeof mailAccountSchema>;

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8787),
  HOST: z.string().default("127.0.0.1"),
  FRONTEND_ORIGIN: z.string().url().default("http://127.0.0.1:5173"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  APPLICATIONS_CSV: z.string().min(1).default("all excels/all_applied_applications_history.csv"),
  MAIL_ACCOUNTS: z.string().default(""),
  MAIL_USERNAME: z.string().default(""),
  MAIL_PASSWORD: z.string().default(""),
  IMAP_HOST: z.string().default("imap.gmail.com"),
  IMAP_PORT: z.coerce.number().int().positive().default(993),
  SCAN_LOOKBACK_DAYS: z.coerce.number().int().min(1).max(365).default(3),
  SCAN_CRON: z.string().default("0 */6 * * *"),
  SCAN_ON_START: booleanFlag.default(true),
  STATUS_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),
  OLLAMA_ENABLED: booleanFlag.default(true),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_MODEL: z.string().default("llama3.1:8b"),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ORACLE_BODY_LIMIT: z.coerce.number().int().positive().default(2000),
});

export type AppConfig = z.infer<typeof envSchema> & {
  mailAccounts: MailAccountConfig[];
};

const formatIssues = (issues: z.ZodIssue[]): string =>
  issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n");

const parseMailAccounts = (env: z.infer<typeof envSchema>): MailAccountConfig[] => {
  const raw = env.MAIL_ACCOUNTS.trim();
  if (!raw) {
    if (!env.MAIL_USERNAME || !env.MAIL_PASSWORD) {
      return [];
    }
    return [
      {
        username: env.MAIL_USERNAME,
        password: env.MAIL_PASSWORD,
        server: env.IMAP_HOST,
        port: env.IMAP_PORT,
      },
    ];
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid environment configuration:\nMAIL_ACCOUNTS: ${reason}`);
  }

  const accounts = z.array(mailAccountSchema).safeParse(decoded);
  if (!accounts.success) {
    const details = accounts.error.issues.map((issue) => `MAIL_ACCOUNTS.${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n${details.join("\n")}`);
  }
  return accounts.data;
};

export const loadConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(`Invalid environment configuration:\n${formatIssues(parsed.error.issues)}`);
  }

  return {
    ...parsed.data,
    mailAccounts: parseMailAccounts(parsed.data),
  };
};

export const config = loadConfig(process.env);
