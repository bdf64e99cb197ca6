import type { Judgement, MatchResult } from "../types.js";

const LEGAL_SUFFIXES = [
  "inc",
  "llc",
  "corp",
  "corporation",
  "ltd",
  "limited",
  "company",
  "co",
  "group",
  "services",
  "solutions",
  "technologies",
  "technology",
  "tech",
  "systems",
  "international",
  "global",
];

const SUFFIX_PATTERN = new RegExp(`\\s*\\b(?:${LEGAL_SUFFIXES.join("|")})\\.?$`);
const SEPARATORS = /[\s\-.]/g;
const MIN_CONTAINS_SCORE = 0.6;
const COMPACTED_SCORE = 0.85;

interface NameVariants {
  plain: string[];
  compact: string[];
}

const NO_MATCH: MatchResult = { company: null, score: 0 };

const unique = (values: string[]): string[] => Array.from(new Set(values.filter(Boolean)));

/**
 * Four spellings of a company name: as written, without separators,
 * without a trailing legal suffix, and without both.
 */
export const companyNameVariants = (name: string): NameVariants => {
  const lowered = name.toLowerCase().replace(/\s+/g, " ").trim();
  const base = lowered.replace(SUFFIX_PATTERN, "").replace(/[\s\-.,]+$/, "");
  return {
    plain: unique([lowered, base]),
    compact: unique([lowered.replace(SEPARATORS, ""), base.replace(SEPARATORS, "")]),
  };
};

const alphanumeric = (value: string): string => value.toLowerCase().replace(/[^a-z0-9]/g, "");

const containmentScore = (left: string, right: string): number => {
  if (left === right || !(left.includes(right) || right.includes(left))) {
    return 0;
  }
  return Math.min(left.length, right.length) / Math.max(left.length, right.length);
};

/**
 * Resolves a company name read from an email to one of the names already in
 * the tracking store. Tiers: exact (1.0), containment (min/max length ratio,
 * must exceed 0.6), then compacted equality ignoring punctuation (0.85).
 */
export const matchCompany = (candidate: string | null | undefined, knownCompanies: Iterable<string>): MatchResult => {
  const cleaned = candidate?.trim() ?? "";
  if (!cleaned) {
    return NO_MATCH;
  }

  const known = unique(Array.from(knownCompanies, (company) => company.trim()));
  const candidateVariants = companyNameVariants(cleaned);
  const knownVariants = known.map((company) => ({ company, variants: companyNameVariants(company) }));

  for (const { company, variants } of knownVariants) {
    if (candidateVariants.plain.some((variant) => variants.plain.includes(variant))) {
      return { company, score: 1 };
    }
  }

  let best: MatchResult = NO_MATCH;
  for (const { company, variants } of knownVariants) {
    const candidateAll = [...candidateVariants.plain, ...candidateVariants.compact];
    const knownAll = [...variants.plain, ...variants.compact];
    for (const left of candidateAll) {
      for (const right of knownAll) {
        const score = containmentScore(left, right);
        if (score > MIN_CONTAINS_SCORE && score > best.score) {
          best = { company, score };
        }
      }
    }
  }
  if (best.company) {
    return best;
  }

  const candidateCompact = unique([alphanumeric(cleaned), ...candidateVariants.compact.map(alphanumeric)]);
  for (const { company, variants } of knownVariants) {
    const knownCompact = unique([alphanumeric(company), ...variants.compact.map(alphanumeric)]);
    if (candidateCompact.some((value) => value.length > 2 && knownCompact.includes(value))) {
      return { company, score: COMPACTED_SCORE };
    }
  }

  return NO_MATCH;
};

/**
 * Picks the canonical company for a judgement: the classifier's own match when
 * it names a tracked company verbatim, otherwise the fuzzy matcher on the
 * classifier's match and then on the extracted name.
 */
export const resolveCompanyMatch = (
  judgement: Pick<Judgement, "companyMatch" | "companyExtracted">,
  knownCompanies: string[],
): MatchResult => {
  if (judgement.companyMatch && knownCompanies.includes(judgement.companyMatch)) {
    return { company: judgement.companyMatch, score: 1 };
  }

  for (const candidate of [judgement.companyMatch, judgement.companyExtracted]) {
    const result = matchCompany(candidate, knownCompanies);
    if (result.company) {
      return result;
    }
  }

  return NO_MATCH;
};
