import * as cheerio from "cheerio";
import { logger } from "../logger";
import { fetchText } from "./base";
import type { AgentProfile } from "../types";

export interface AgentProfileFetcher {
  fetchProfile(agentUrl: string): Promise<AgentProfile | null>;
}

export interface AgentProfileFetcherOptions {
  userAgent: string;
  timeoutMs: number;
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function parseAgentProfile(html: string): AgentProfile {
  const $ = cheerio.load(html);

  let name = cleanText($('[data-testid="agent-name"]').first().text());
  if (!name) {
    name = cleanText($("h1").first().text());
  }

  const telHref = $('a[href^="tel:"]').first().attr("href") ?? "";
  const phone = telHref.replace(/^tel:/, "").trim();

  return {
    name: name || null,
    phone: phone || null,
  };
}

export function createAgentProfileFetcher(
  options: AgentProfileFetcherOptions,
): AgentProfileFetcher {
  async function fetchProfile(agentUrl: string): Promise<AgentProfile | null> {
    const result = await fetchText({
      url: agentUrl,
      timeoutMs: options.timeoutMs,
      headers: { "User-Agent": options.userAgent },
    });

    if (!result.success || result.data === null) {
      logger.warn(`Agent profile ${agentUrl}: ${result.error ?? "no body"}`);
      return null;
    }

    const profile = parseAgentProfile(result.data);
    logger.debug(
      `Agent profile ${agentUrl}: ${profile.name ?? "?"} - ${profile.phone ?? "?"}`,
    );
    return profile;
  }

  return { fetchProfile };
}
