import type { ListingRecord, RunStats } from "../types";
import { runDurationMs } from "../types";

export const TELEGRAM_MESSAGE_LIMIT = 4000;
export const MAX_LISTED_RECORDS = 10;
export const FAILURE_DETAIL_LIMIT = 800;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function formatPrice(price: number | null): string {
  if (price === null) return "price n/a";
  return `$${Math.round(price).toLocaleString("en-US")}`;
}

function formatPhone(phone: string | null): string | null {
  if (!phone) return null;
  if (phone.length !== 10) return phone;
  return `(${phone.slice(0, 3)}) ${phone.slice(3, 6)}-${phone.slice(6)}`;
}

function utilityTags(record: ListingRecord): string {
  const tags: string[] = [];
  if (record.hasSepticSystem) tags.push("🚽 septic");
  if (record.hasPrivateWell) tags.push("💧 well");
  return tags.join(" · ");
}

export function formatListingLine(record: ListingRecord, index: number): string {
  const place = [record.address, record.city].filter(Boolean).join(", ");
  const label = escapeHtml(place || record.listingUrl);
  const lines = [
    `${index}. <a href="${escapeHtml(record.listingUrl)}">${label}</a> | ${formatPrice(record.price)}`,
    `   ${utilityTags(record)}`,
  ];

  const agent = [record.agentName, formatPhone(record.agentPhone)]
    .filter((part): part is string => Boolean(part))
    .join(" ");
  if (agent) {
    lines.push(`   👤 ${escapeHtml(agent)}`);
  }
  return lines.join("\n");
}

export function formatRunSummary(
  stats: RunStats,
  newsworthy: ListingRecord[],
): string {
  const durationMs = runDurationMs(stats);
  const lines = [
    "🏡 <b>Listing scan complete</b>",
    `Processed: ${stats.totalProcessed} | New: ${stats.newListings} | Updated: ${stats.updatedListings}`,
    `🚽 Septic: ${stats.septicMatches} | 💧 Well: ${stats.wellMatches}`,
    `🆕 Newsworthy: ${stats.newsworthyCount}`,
  ];

  if (stats.partitionsFailed > 0) {
    lines.push(
      `⚠️ Searches failed: ${stats.partitionsFailed}/${stats.partitionsSearched}`,
    );
  }
  if (stats.errors.length > 0) {
    lines.push(`⚠️ Errors: ${stats.errors.length}`);
  }
  if (durationMs !== null) {
    lines.push(`⏱ ${(durationMs / 1000).toFixed(1)}s`);
  }

  if (newsworthy.length > 0) {
    lines.push("", "<b>New septic/well listings</b>");
    newsworthy.slice(0, MAX_LISTED_RECORDS).forEach((record, i) => {
      lines.push(formatListingLine(record, i + 1));
    });
    if (newsworthy.length > MAX_LISTED_RECORDS) {
      lines.push(`…and ${newsworthy.length - MAX_LISTED_RECORDS} more`);
    }
  }

  return lines.join("\n");
}

export function formatFailure(detail: string): string {
  const trimmed =
    detail.length > FAILURE_DETAIL_LIMIT
      ? `${detail.slice(0, FAILURE_DETAIL_LIMIT)}…`
      : detail;
  return `❌ <b>Listing scan failed</b>\n<code>${escapeHtml(trimmed)}</code>`;
}

export function splitMessage(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  const lines = text.split("\n");
  let current = "";

  for (const line of lines) {
    // Hard-split any single line over the limit
    if (line.length > maxLength) {
      if (current) {
        chunks.push(current.trim());
        current = "";
      }
      let remaining = line;
      while (remaining.length > maxLength) {
        chunks.push(remaining.substring(0, maxLength));
        remaining = remaining.substring(maxLength);
      }
      if (remaining) current = remaining;
      continue;
    }

    if (current.length + line.length + 1 > maxLength) {
      if (current) chunks.push(current.trim());
      current = line;
    } else {
      current += (current ? "\n" : "") + line;
    }
  }
  if (current) chunks.push(current.trim());

  return chunks;
}
