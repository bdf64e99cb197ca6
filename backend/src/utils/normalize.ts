import { TextDecoder } from "node:util";

const FALLBACK_CHARSET = "utf-8";

const HTML_ENTITIES: Record<string, string> = {
  "&nbsp;": " ",
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

const createDecoder = (charset: string | undefined): TextDecoder => {
  const label = charset?.trim().toLowerCase();
  if (label) {
    try {
      return new TextDecoder(label);
    } catch (error) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
      // unknown label, use the fallback charset
    }
  }
  return new TextDecoder(FALLBACK_CHARSET);
};

/**
 * Decodes raw bytes with the declared charset, falling back to UTF-8.
 * Undecodable sequences become U+FFFD instead of raising.
 */
export const decodeText = (bytes: Uint8Array, charset?: string): string => createDecoder(charset).decode(bytes);

export const stripHtml = (html: string): string =>
  html
    .replace(/<style[\s\S]*?<\/style>/gi, " ")
    .replace(/<script[\s\S]*?<\/script>/gi, " ")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(?:nbsp|amp|lt|gt|quot|#39);/gi, (entity) => HTML_ENTITIES[entity.toLowerCase()] ?? entity);

export const normalizeText = (input: string | Uint8Array | null | undefined, charset?: string): string => {
  if (input === null || input === undefined) {
    return "";
  }
  const text = typeof input === "string" ? input : decodeText(input, charset);
  return stripHtml(text).replace(/\s+/g, " ").trim().toLowerCase();
};

export const extractEmailAddress = (raw: string): string => {
  const match = raw.match(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i);
  return match?.[0]?.toLowerCase() ?? raw.trim().toLowerCase();
};
