/**
 * Septic / private well detection over listing free text.
 *
 * Detail entries are scanned first (in the order the source returns them, each
 * text line in order), then the description. Every pattern is word-bounded so
 * place names such as "Howell" or "Maxwell" never count as a well.
 */

import type {
  Candidate,
  ClassificationResult,
  EnrichedRecord,
} from "../types";

const DETAIL_SEPTIC_PATTERNS: readonly RegExp[] = [
  /\bseptic\b/i,
  /\bsewer:\s*septic\b/i,
];

const DETAIL_WELL_PATTERNS: readonly RegExp[] = [
  /\bprivate\s+well\b/i,
  /\bwater:\s*well\b/i,
  /\bwell\s+water\b/i,
  /\bdrilled\s+well\b/i,
];

const DESCRIPTION_SEPTIC_PATTERNS: readonly RegExp[] = [
  /\bseptic\s*system\b/i,
  /\bseptic\s*tank\b/i,
  /\bprivate\s+septic\b/i,
];

const DESCRIPTION_WELL_PATTERNS: readonly RegExp[] = [
  /\bprivate\s+well\b/i,
  /\bwell\s+water\b/i,
  /\bwater\s+well\b/i,
  /\bdrilled\s+well\b/i,
];

function isEnriched(
  record: EnrichedRecord | Candidate,
): record is EnrichedRecord {
  return "details" in record;
}

function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}

function descriptionMatches(
  text: string,
  patterns: readonly RegExp[],
): string[] {
  const mentions: string[] = [];
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      mentions.push(`description: ${match[0].toLowerCase()}`);
    }
  }
  return mentions;
}

export function emptyClassification(): ClassificationResult {
  return {
    hasSepticSystem: false,
    hasPrivateWell: false,
    septicMentions: [],
    wellMentions: [],
  };
}

export function classify(
  record: EnrichedRecord | Candidate,
): ClassificationResult {
  if (!isEnriched(record)) {
    return emptyClassification();
  }

  const septicMentions: string[] = [];
  const wellMentions: string[] = [];

  for (const detail of record.details) {
    const category = detail.category.trim().toLowerCase();

    for (const text of detail.texts) {
      if (matchesAny(text, DETAIL_SEPTIC_PATTERNS)) {
        septicMentions.push(`${category}: ${text}`);
      }
      if (matchesAny(text, DETAIL_WELL_PATTERNS)) {
        wellMentions.push(`${category}: ${text}`);
      }
    }
  }

  const description = record.descriptionText ?? "";
  if (description) {
    septicMentions.push(
      ...descriptionMatches(description, DESCRIPTION_SEPTIC_PATTERNS),
    );
    wellMentions.push(
      ...descriptionMatches(description, DESCRIPTION_WELL_PATTERNS),
    );
  }

  return {
    hasSepticSystem: septicMentions.length > 0,
    hasPrivateWell: wellMentions.length > 0,
    septicMentions,
    wellMentions,
  };
}
