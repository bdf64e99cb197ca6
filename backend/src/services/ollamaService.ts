import { z } from "zod";
import type { Judgement } from "../types.js";

const MAX_PROMPT_COMPANIES = 100;

export interface OracleRequest {
  sender: string;
  subject: string;
  body: string;
  knownCompanies: string[];
}

export type OracleResult =
  | { kind: "ok"; judgement: Judgement }
  | { kind: "malformed"; error: string }
  | { kind: "provider_error"; error: string };

export type ClassificationOracle = (request: OracleRequest) => Promise<OracleResult>;

export interface OllamaOracleOptions {
  enabled: boolean;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  bodyLimit: number;
}

const nullableText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed && !["none", "null"].includes(trimmed.toLowerCase()) ? trimmed : null;
  });

const judgementSchema = z.object({
  is_job_related: z.boolean(),
  company_extracted: nullableText,
  company_match: nullableText,
  status: z.string(),
  confidence: z.number().min(0).max(1).nullish().transform((value) => value ?? 0.5),
  interview_date: nullableText,
  reasoning: z
    .string()
    .nullish()
    .transform((value) => value?.trim() || "No reasoning provided"),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const extractJsonCandidate = (text: string): string | null => {
  // Strip DeepSeek/Reasoning <think>...</think> blocks if present
  const cleaned = text
    .replace(/<think>[\s\S]*?<\/think>/gi, "")
    .replace(/```(?:json)?/gi, "")
    .trim();

  if (cleaned.startsWith("{") && cleaned.endsWith("}")) {
    return cleaned;
  }

  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) {
    return null;
  }

  return cleaned.slice(start, end + 1);
};

const providerErrorOf = (payload: Record<string, unknown>): string | null => {
  if (payload.action === "error") {
    return typeof payload.type === "string" ? payload.type : "Provider reported an error";
  }
  if (typeof payload.status === "number") {
    return `Provider returned status ${payload.status}`;
  }
  if (payload.error !== undefined && payload.error !== null) {
    if (typeof payload.error === "string") {
      return payload.error;
    }
    if (isRecord(payload.error) && typeof payload.error.message === "string") {
      return payload.error.message;
    }
    return "Provider reported an error";
  }
  return null;
};

const unwrapEnvelope = (payload: Record<string, unknown>): unknown => {
  if (typeof payload.response === "string") {
    return payload.response;
  }

  const choices = payload.choices;
  if (Array.isArray(choices) && choices.length > 0) {
    const first: unknown = choices[0];
    if (isRecord(first) && isRecord(first.message)) {
      return first.message.content;
    }
  }

  return payload;
};

/**
 * Turns whatever the completion provider handed back into a tagged result.
 * Accepts an Ollama `{ response }` envelope, a chat-completion `choices`
 * envelope, a JSON string or an already-decoded object. Error-shaped payloads
 * are never coerced into a judgement.
 */
export const parseOracleResponse = (payload: unknown): OracleResult => {
  let content = payload;

  if (isRecord(content)) {
    const providerError = providerErrorOf(content);
    if (providerError) {
      return { kind: "provider_error", error: providerError };
    }
    content = unwrapEnvelope(content);
  }

  if (typeof content === "string") {
    const candidate = extractJsonCandidate(content);
    if (!candidate) {
      return { kind: "malformed", error: "Response did not contain a JSON object" };
    }
    try {
      const decoded: unknown = JSON.parse(candidate);
      content = decoded;
    } catch (error) {
      return { kind: "malformed", error: error instanceof Error ? error.message : "Invalid JSON" };
    }
  }

  if (!isRecord(content)) {
    return { kind: "malformed", error: "Response is not a JSON object" };
  }

  const providerError = providerErrorOf(content);
  if (providerError) {
    return { kind: "provider_error", error: providerError };
  }

  const validated = judgementSchema.safeParse(content);
  if (!validated.success) {
    return {
      kind: "malformed",
      error: validated.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    };
  }

  const value = validated.data;
  if (value.reasoning === "JSON parsing failed") {
    return { kind: "malformed", error: "Provider reported a JSON parsing failure" };
  }

  return {
    kind: "ok",
    judgement: {
      isJobRelated: value.is_job_related,
      companyExtracted: value.company_extracted,
      companyMatch: value.company_match,
      status: value.status.trim(),
      confidence: value.confidence,
      interviewDate: value.interview_date,
      reasoning: value.reasoning,
    },
  };
};

const formatCompanyList = (companies: string[]): string => {
  const listed = companies.slice(0, MAX_PROMPT_COMPANIES).join(", ");
  const remaining = companies.length - MAX_PROMPT_COMPANIES;
  return remaining > 0 ? `${listed}\n... and ${remaining} more companies` : listed;
};

export const buildPrompt = (request: OracleRequest, bodyLimit: number): string => {
  return [
    "You analyze an email about one of my job applications. Be logical and consistent.",
    "",
    `From: ${request.sender}`,
    `Subject: ${request.subject}`,
    `Content: ${request.body.slice(0, bodyLimit)}`,
    "",
    "Companies I applied to:",
    formatCompanyList(request.knownCompanies),
    "",
    "Rules:",
    "1) An email is job-related when it refers to my application, interest or candidacy,",
    "   including 'thank you for your interest in <company>'.",
    "2) 'unable to employ', 'unable to sponsor', 'pursuing other candidates', 'not moving forward'",
    "   and similar wording mean status 'Rejected'. Do not answer 'Other' for clear rejections.",
    "3) Extract the company name from the email and match it flexibly against the list:",
    "   ignore case, spaces, hyphens, dots and suffixes such as Inc, LLC, Corp, Ltd.",
    "4) Confidence: clear language 0.8-0.9, ambiguous 0.5-0.7, very unclear 0.3-0.4.",
    "",
    "Return ONLY valid JSON:",
    "{",
    '  "is_job_related": boolean,',
    '  "company_extracted": string | null,',
    '  "company_match": string | null,',
    '  "status": "Applied" | "Assessment" | "Follow-up Required" | "Interview Scheduled" | "Interviewed" | "Rejected" | "Offered" | "Accepted" | "Declined" | "Other",',
    '  "confidence": number,',
    '  "interview_date": string | null,',
    '  "reasoning": string',
    "}",
  ].join("\n");
};

const callOllama = async (options: OllamaOracleOptions, prompt: string): Promise<unknown> => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(`${options.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: options.model,
        prompt,
        stream: false,
        format: "json",
        options: {
          temperature: 0.1,
        },
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`Ollama request failed with status ${response.status}`);
    }

    const payload: unknown = await response.json();
    return payload;
  } finally {
    clearTimeout(timeout);
  }
};

/**
 * Classification backed by a local Ollama model. One attempt per email:
 * timeouts, transport failures and non-2xx answers come back as
 * `provider_error` and are not retried within a scan.
 */
export const createOllamaOracle = (options: OllamaOracleOptions): ClassificationOracle => {
  return async (request) => {
    if (!options.enabled) {
      return { kind: "provider_error", error: "Ollama disabled" };
    }

    let payload: unknown;
    try {
      payload = await callOllama(options, buildPrompt(request, options.bodyLimit));
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return { kind: "provider_error", error: `Ollama request aborted after ${options.timeoutMs}ms` };
      }
      return { kind: "provider_error", error: error instanceof Error ? error.message : "Unknown Ollama exception" };
    }

    return parseOracleResponse(payload);
  };
};
