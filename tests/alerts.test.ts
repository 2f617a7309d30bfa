import { describe, expect, it, vi } from "vitest";
import { createTelegramNotifier } from "../src/alerts";
import {
  escapeHtml,
  formatFailure,
  formatRunSummary,
  splitMessage,
} from "../src/alerts/format";
import { createRunStats, type ListingRecord, type RunStats } from "../src/types";
import { jsonResponse, makeListingInput } from "./helpers";

function record(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    ...makeListingInput({ listingUrl: "https://listings.test/a" }),
    firstSeenAt: "2025-03-01T12:00:00.000Z",
    lastSeenAt: "2025-03-01T12:00:00.000Z",
    timesSeen: 1,
    ...overrides,
  };
}

function stats(): RunStats {
  const result = createRunStats(new Date("2025-03-01T12:00:00.000Z"));
  result.totalProcessed = 5;
  result.newListings = 2;
  result.updatedListings = 3;
  result.septicMatches = 1;
  result.wellMatches = 2;
  result.newsworthyCount = 1;
  result.completedAt = "2025-03-01T12:00:42.000Z";
  return result;
}

describe("formatRunSummary", () => {
  it("lists run totals and newsworthy listings", () => {
    const listing = record({
      hasPrivateWell: true,
      agentName: "Pat & Co",
      agentPhone: "2625550100",
    });

    expect(formatRunSummary(stats(), [listing])).toBe(
      [
        "🏡 <b>Listing scan complete</b>",
        "Processed: 5 | New: 2 | Updated: 3",
        "🚽 Septic: 1 | 💧 Well: 2",
        "🆕 Newsworthy: 1",
        "⏱ 42.0s",
        "",
        "<b>New septic/well listings</b>",
        '1. <a href="https://listings.test/a">100 Main St, Town</a> | $250,000',
        "   💧 well",
        "   👤 Pat &amp; Co (262) 555-0100",
      ].join("\n"),
    );
  });

  it("shows search failures and errors", () => {
    const failed = stats();
    failed.partitionsSearched = 5;
    failed.partitionsFailed = 2;
    failed.errors = ["search/Kenosha: HTTP 500", "search/Racine: HTTP 500"];

    const lines = formatRunSummary(failed, []).split("\n");

    expect(lines).toContain("⚠️ Searches failed: 2/5");
    expect(lines).toContain("⚠️ Errors: 2");
  });

  it("caps the listing section at ten entries", () => {
    const listings = Array.from({ length: 12 }, (_, i) =>
      record({
        listingUrl: `https://listings.test/${i}`,
        hasSepticSystem: true,
        price: null,
      }),
    );

    const lines = formatRunSummary(stats(), listings).split("\n");

    expect(lines.filter((line) => /^\d+\. /.test(line))).toHaveLength(10);
    expect(lines.at(-1)).toBe("…and 2 more");
    expect(lines).toContain(
      '1. <a href="https://listings.test/0">100 Main St, Town</a> | price n/a',
    );
  });
});

describe("formatFailure", () => {
  it("escapes and truncates the detail", () => {
    expect(formatFailure("<boom>")).toBe(
      "❌ <b>Listing scan failed</b>\n<code>&lt;boom&gt;</code>",
    );
    expect(formatFailure("x".repeat(900))).toBe(
      `❌ <b>Listing scan failed</b>\n<code>${"x".repeat(800)}…</code>`,
    );
  });
});

describe("message helpers", () => {
  it("escapes html", () => {
    expect(escapeHtml(`<a href="x">&</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;",
    );
  });

  it("splits on line boundaries and hard-splits long lines", () => {
    expect(splitMessage("aaaa\nbbbb\ncccc", 10)).toEqual(["aaaa\nbbbb", "cccc"]);
    expect(splitMessage("x".repeat(25), 10)).toEqual([
      "x".repeat(10),
      "x".repeat(10),
      "x".repeat(5),
    ]);
    expect(splitMessage("short", 10)).toEqual(["short"]);
  });
});

describe("createTelegramNotifier", () => {
  function stubTelegram(response: () => Response) {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) => response(),
    );
    vi.stubGlobal("fetch", fetchMock);
    return fetchMock;
  }

  it("sends the failure alert to every chat", async () => {
    const fetchMock = stubTelegram(() =>
      jsonResponse({ ok: true, result: { message_id: 7 } }),
    );
    const notifier = createTelegramNotifier({
      botToken: "test-secret",
      chatIds: ["101", "202"],
      dryRun: false,
      apiBaseUrl: "https://telegram.test",
    });

    await notifier.reportFailure("boom");

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe("https://telegram.test/bottest-secret/sendMessage");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "202",
      text: formatFailure("boom"),
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  });

  it("skips sending when not configured", async () => {
    const fetchMock = stubTelegram(() => jsonResponse({ ok: true }));
    const notifier = createTelegramNotifier({
      botToken: "",
      chatIds: ["101"],
      dryRun: false,
    });

    await notifier.reportSuccess(stats(), [], []);

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("only logs in dry-run mode", async () => {
    const fetchMock = stubTelegram(() => jsonResponse({ ok: true }));
    const notifier = createTelegramNotifier({
      botToken: "test-secret",
      chatIds: ["101"],
      dryRun: true,
    });

    await notifier.reportSuccess(stats(), [], []);
    await expect(notifier.sendMessage("101", "hello")).resolves.toEqual({
      success: true,
      messageId: 0,
    });

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("returns Telegram API errors instead of throwing", async () => {
    stubTelegram(() =>
      jsonResponse({ ok: false, description: "Bad Request: chat not found" }, 400),
    );
    const notifier = createTelegramNotifier({
      botToken: "test-secret",
      chatIds: ["101"],
      dryRun: false,
    });

    await expect(notifier.sendMessage("101", "hello")).resolves.toEqual({
      success: false,
      error: "Bad Request: chat not found",
    });
    await expect(notifier.reportFailure("boom")).resolves.toBeUndefined();
  });
});
