import { logger } from "../logger";
import { postJson } from "./base";
import {
  describeGraphqlErrors,
  describeSchemaIssues,
  searchResponseSchema,
  toCandidate,
} from "./realtor-schema";
import type { SourceEndpoint } from "../config";
import type { Partition, SearchResult } from "../types";

export interface SearchClient {
  search(
    partition: Partition,
    dateFloor: string | null,
    pageLimit: number,
  ): Promise<SearchResult>;
}

export interface SearchClientOptions {
  graphqlUrl: string;
  origin: string;
  userAgent: string;
  maxPageSize: number;
  endpoint: SourceEndpoint;
  query: string;
}

interface SearchCriteria {
  primary: boolean;
  status: string[];
  search_location?: { location: string };
  state_code?: string;
  list_date?: { min: string };
}

export function buildSearchVariables(
  partition: Partition,
  dateFloor: string | null,
  limit: number,
): {
  query: SearchCriteria;
  limit: number;
  offset: number;
  sort: Array<{ field: string; direction: string }>;
} {
  const criteria: SearchCriteria = {
    primary: true,
    status: ["for_sale", "ready_to_build"],
  };

  if (partition.location) {
    criteria.search_location = { location: partition.location };
  } else {
    criteria.state_code = partition.stateCode;
  }

  if (dateFloor) {
    criteria.list_date = { min: dateFloor };
  }

  return {
    query: criteria,
    limit,
    offset: 0,
    sort: [{ field: "list_date", direction: "desc" }],
  };
}

/** YYYY-MM-DD, `daysOld` days before `now` (UTC). */
export function computeDateFloor(
  daysOld: number | null,
  now: Date,
): string | null {
  if (daysOld === null) return null;
  const floor = new Date(now.getTime() - daysOld * 24 * 60 * 60 * 1000);
  return floor.toISOString().slice(0, 10);
}

export function createSearchClient(options: SearchClientOptions): SearchClient {
  const headers = {
    Origin: options.origin,
    "User-Agent": options.userAgent,
    "rdc-client-name": options.endpoint.clientName,
    "rdc-client-version": options.endpoint.clientVersion,
  };

  async function search(
    partition: Partition,
    dateFloor: string | null,
    pageLimit: number,
  ): Promise<SearchResult> {
    const limit = Math.max(1, Math.min(pageLimit, options.maxPageSize));
    const startTime = Date.now();

    const failure = (error: string, rateLimited = false): SearchResult => {
      logger.warn(`Search/${partition.label}: ${error}`);
      return {
        partition: partition.label,
        candidates: [],
        success: false,
        error,
        total: null,
        rateLimited,
        responseTimeMs: Date.now() - startTime,
      };
    };

    logger.info(
      `Search/${partition.label}: querying ${partition.location ?? partition.stateCode} (limit=${limit}${dateFloor ? `, listed since ${dateFloor}` : ""})`,
    );

    const result = await postJson({
      url: options.graphqlUrl,
      timeoutMs: options.endpoint.timeoutMs,
      headers,
      body: {
        operationName: "ConsumerSearchQuery",
        variables: buildSearchVariables(partition, dateFloor, limit),
        query: options.query,
      },
    });

    if (!result.success) {
      return failure(result.error ?? "Request failed", result.rateLimited);
    }

    const parsed = searchResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      return failure(describeSchemaIssues(parsed.error));
    }

    const { data, errors } = parsed.data;
    if (errors && errors.length > 0) {
      return failure(describeGraphqlErrors(errors));
    }

    const homeSearch = data?.home_search;
    if (!homeSearch) {
      return failure("Malformed payload: missing home_search");
    }

    const candidates = (homeSearch.results ?? []).map(toCandidate);
    const total = homeSearch.total ?? null;

    logger.info(
      `Search/${partition.label}: ${candidates.length} listings (total available: ${total ?? "unknown"}, ${result.responseTimeMs}ms)`,
    );

    return {
      partition: partition.label,
      candidates,
      success: true,
      total,
      rateLimited: false,
      responseTimeMs: result.responseTimeMs,
    };
  }

  return { search };
}
