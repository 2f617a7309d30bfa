/**
 * Cross-partition deduplication. A listing near a county line shows up in more
 * than one partition search; the first occurrence wins.
 * Candidates without a property id are never treated as duplicates.
 */

import { logger } from "../logger";
import type { Candidate } from "../types";

export function dedupe(candidates: Candidate[]): Candidate[] {
  const seenIds = new Set<string>();
  const unique: Candidate[] = [];

  for (const candidate of candidates) {
    const id = candidate.propertyId;
    if (!id) {
      unique.push(candidate);
      continue;
    }
    if (seenIds.has(id)) continue;

    seenIds.add(id);
    unique.push(candidate);
  }

  const removed = candidates.length - unique.length;
  if (removed > 0) {
    logger.info(`Deduplicated: removed ${removed} duplicate listings`);
  }

  return unique;
}
