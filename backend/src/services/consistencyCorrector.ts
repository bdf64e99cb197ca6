import type { EmailEvidence, Judgement } from "../types.js";
import { toApplicationStatus } from "../types.js";

interface PhraseRule {
  label: string;
  pattern: RegExp;
}

const phrase = (text: string): PhraseRule => ({ label: text, pattern: new RegExp(text.replace(/\s+/g, "\\s+")) });

export const REJECTION_RULES: PhraseRule[] = [
  phrase("unable to employ"),
  phrase("unable to sponsor"),
  phrase("cannot sponsor"),
  phrase("unable to transfer"),
  phrase("pursuing other candidates"),
  phrase("not moving forward"),
  phrase("decided to move forward with other"),
  phrase("regret to inform"),
  phrase("not selected"),
  { label: "unfortunately ... unable", pattern: /unfortunately.*unable/ },
];

const INTEREST_PHRASE = "thank you for your interest";
const UNRELATED_REASONING = "unrelated to any job application";
const REJECTION_CONFIDENCE_FLOOR = 0.7;
const REJECTION_CONFIDENCE = 0.8;
const INTEREST_CONFIDENCE = 0.7;

const GENERIC_SENDER_NAMES = new Set(["recruiting", "noreply", "no-reply", "no reply", "careers", "jobs"]);

export const findRejectionPhrase = (bodyLower: string, subjectLower: string): string | null => {
  const rule = REJECTION_RULES.find(({ pattern }) => pattern.test(bodyLower) || pattern.test(subjectLower));
  return rule?.label ?? null;
};

/**
 * Deterministic overrides for judgements that contradict strong wording in
 * the email. Inputs are the lowercased body and subject; the judgement passed
 * in is left untouched.
 */
export const correctJudgement = (judgement: Judgement, bodyLower: string, subjectLower: string): Judgement => {
  const corrected: Judgement = { ...judgement };
  const rejection = findRejectionPhrase(bodyLower, subjectLower);

  if (rejection) {
    if (!corrected.isJobRelated) {
      corrected.isJobRelated = true;
    }
    if (toApplicationStatus(corrected.status) === null) {
      corrected.status = "Rejected";
    }
    if (corrected.confidence < REJECTION_CONFIDENCE_FLOOR) {
      corrected.confidence = REJECTION_CONFIDENCE;
    }
  }

  if ((bodyLower.includes(INTEREST_PHRASE) || subjectLower.includes(INTEREST_PHRASE)) && !corrected.isJobRelated) {
    corrected.isJobRelated = true;
    corrected.confidence = Math.max(corrected.confidence, INTEREST_CONFIDENCE);
  }

  if (!rejection && corrected.isJobRelated && corrected.reasoning.toLowerCase().includes(UNRELATED_REASONING)) {
    corrected.isJobRelated = false;
  }

  return corrected;
};

/**
 * Fills in the company when the classifier extracted none: the trailing
 * " - Company" part of the subject, or the display name of applytojob.com
 * senders.
 */
export const inferCompanyFromEvidence = (
  judgement: Judgement,
  evidence: Pick<EmailEvidence, "subject" | "senderName" | "senderAddress">,
): Judgement => {
  if (judgement.companyExtracted) {
    return judgement;
  }

  const parts = evidence.subject.split(" - ");
  if (parts.length >= 2) {
    const company = parts[parts.length - 1]?.trim();
    if (company) {
      return { ...judgement, companyExtracted: company };
    }
  }

  if (evidence.senderAddress.endsWith("applytojob.com")) {
    const name = evidence.senderName.trim();
    if (name && !GENERIC_SENDER_NAMES.has(name.toLowerCase())) {
      return { ...judgement, companyExtracted: name };
    }
  }

  return judgement;
};
