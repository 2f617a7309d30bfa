/**
 * Telegram run reports. One summary after each completed run and one alert
 * after a failed run, sent to every configured chat.
 */

import { z } from "zod";
import { errorMessage, logger } from "../logger";
import {
  formatFailure,
  formatRunSummary,
  splitMessage,
  TELEGRAM_MESSAGE_LIMIT,
} from "./format";
import type { ListingRecord, RunStats } from "../types";

export interface Notifier {
  reportSuccess(
    stats: RunStats,
    allRecords: ListingRecord[],
    newsworthy: ListingRecord[],
  ): Promise<void>;
  reportFailure(detail: string): Promise<void>;
}

export interface TelegramNotifierOptions {
  botToken: string;
  chatIds: string[];
  dryRun: boolean;
  apiBaseUrl?: string;
}

export interface SendResult {
  success: boolean;
  messageId?: number;
  error?: string;
}

const telegramSendResultSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).partial().optional(),
  description: z.string().optional(),
});

export function createTelegramNotifier(
  options: TelegramNotifierOptions,
): Notifier & {
  sendMessage(chatId: string, text: string): Promise<SendResult>;
} {
  const apiBaseUrl = options.apiBaseUrl ?? "https://api.telegram.org";

  async function sendMessage(chatId: string, text: string): Promise<SendResult> {
    if (options.dryRun) {
      logger.info(`[DRY RUN] Would send to chat ${chatId}:`);
      logger.info(text.substring(0, 200) + (text.length > 200 ? "..." : ""));
      return { success: true, messageId: 0 };
    }

    try {
      const response = await fetch(
        `${apiBaseUrl}/bot${options.botToken}/sendMessage`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            chat_id: chatId,
            text,
            parse_mode: "HTML",
            disable_web_page_preview: true,
          }),
        },
      );

      const parsed = telegramSendResultSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Unexpected Telegram response (HTTP ${response.status})`);
      }
      if (!parsed.data.ok) {
        throw new Error(parsed.data.description ?? "Telegram API error");
      }

      return { success: true, messageId: parsed.data.result?.message_id };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Telegram send to ${chatId} failed: ${message}`);
      return { success: false, error: message };
    }
  }

  async function broadcast(text: string, kind: string): Promise<void> {
    if (!options.botToken || options.chatIds.length === 0) {
      logger.warn(`Telegram not configured, skipping ${kind}`);
      return;
    }

    const chunks = splitMessage(text, TELEGRAM_MESSAGE_LIMIT);
    let sent = 0;
    let failed = 0;

    for (const chatId of options.chatIds) {
      for (const chunk of chunks) {
        const result = await sendMessage(chatId, chunk);
        if (result.success) {
          sent++;
        } else {
          failed++;
        }
      }
    }

    logger.info(`Telegram ${kind}: ${sent} message(s) sent, ${failed} failed`);
  }

  return {
    sendMessage,

    async reportSuccess(stats, _allRecords, newsworthy) {
      await broadcast(formatRunSummary(stats, newsworthy), "run summary");
    },

    async reportFailure(detail) {
      await broadcast(formatFailure(detail), "failure alert");
    },
  };
}
