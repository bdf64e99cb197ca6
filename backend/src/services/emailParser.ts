import { simpleParser, type AddressObject, type ParsedMail } from "mailparser";
import { EmailParseError } from "../lib/errors.js";
import type { EmailEvidence } from "../types.js";
import { extractEmailAddress, normalizeText } from "../utils/normalize.js";

const firstAddress = (from: AddressObject | AddressObject[] | undefined): { name: string; address: string } => {
  const objects = Array.isArray(from) ? from : from ? [from] : [];
  for (const object of objects) {
    const entry = object.value.find((value) => value.address || value.name);
    if (entry) {
      return { name: entry.name ?? "", address: entry.address ?? "" };
    }
    if (object.text) {
      return { name: "", address: extractEmailAddress(object.text) };
    }
  }
  return { name: "", address: "" };
};

const firstUsableBody = (parsed: ParsedMail): string => {
  const plain = normalizeText(parsed.text);
  if (plain) {
    return plain;
  }
  return typeof parsed.html === "string" ? normalizeText(parsed.html) : "";
};

const receivedAt = (parsed: ParsedMail, now: Date): Date =>
  parsed.date && !Number.isNaN(parsed.date.getTime()) ? parsed.date : now;

/**
 * Reads a raw RFC 822 message into the fields the reconciler works on.
 * Subject and body come back lowercased and whitespace-collapsed; the body is
 * the plain-text part when there is one, otherwise the HTML part with markup
 * stripped.
 */
export const parseEmail = async (raw: Buffer | string, now: Date = new Date()): Promise<EmailEvidence> => {
  let parsed: ParsedMail;
  try {
    parsed = await simpleParser(raw);
  } catch (error) {
    throw new EmailParseError("Unable to parse email message", { cause: error });
  }

  const sender = firstAddress(parsed.from);
  return {
    senderName: sender.name.replace(/\s+/g, " ").trim(),
    senderAddress: sender.address.trim().toLowerCase(),
    subject: normalizeText(parsed.subject),
    body: firstUsableBody(parsed),
    receivedAt: receivedAt(parsed, now),
  };
};
