/**
 * Decides which freshly inserted listings are worth telling the notifier about.
 * Only new records with a septic or well mention qualify; the policy then
 * narrows by list date.
 */

import type { ListingRecord } from "./types";

export type NewsworthyPolicy =
  | { kind: "all" }
  | { kind: "rolling"; hours: number }
  | { kind: "daily-window"; cutoffHourUtc: number };

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Date-only values ("2025-01-15") are read as midnight UTC. */
export function parseListDate(value: string | null): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  const isoDate = /^\d{4}-\d{2}-\d{2}$/.test(trimmed)
    ? `${trimmed}T00:00:00Z`
    : trimmed;
  const ms = Date.parse(isoDate);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function dailyWindow(
  now: Date,
  cutoffHourUtc: number,
): { start: Date; end: Date } {
  const todayCutoff = new Date(
    Date.UTC(
      now.getUTCFullYear(),
      now.getUTCMonth(),
      now.getUTCDate(),
      cutoffHourUtc,
    ),
  );

  if (now.getTime() < todayCutoff.getTime()) {
    return {
      start: new Date(todayCutoff.getTime() - DAY_MS),
      end: todayCutoff,
    };
  }
  return {
    start: todayCutoff,
    end: new Date(todayCutoff.getTime() + DAY_MS),
  };
}

export function isNewsworthy(
  record: ListingRecord,
  isNew: boolean,
  policy: NewsworthyPolicy,
  now: Date,
): boolean {
  if (!isNew) return false;
  if (!record.hasSepticSystem && !record.hasPrivateWell) return false;

  if (policy.kind === "all") return true;

  const listed = parseListDate(record.listDate);
  // Unknown list dates are kept rather than silently dropped.
  if (!listed) return true;

  if (policy.kind === "rolling") {
    return listed.getTime() >= now.getTime() - policy.hours * HOUR_MS;
  }

  const { start, end } = dailyWindow(now, policy.cutoffHourUtc);
  return (
    listed.getTime() >= start.getTime() && listed.getTime() < end.getTime()
  );
}
