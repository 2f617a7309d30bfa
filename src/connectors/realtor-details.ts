import { logger } from "../logger";
import { postJson } from "./base";
import {
  describeGraphqlErrors,
  describeSchemaIssues,
  detailResponseSchema,
  toEnrichedRecord,
} from "./realtor-schema";
import type { SourceEndpoint } from "../config";
import type { EnrichedRecord } from "../types";

export interface DetailFetcher {
  /** null means "no detail available"; it is not an error. */
  fetchDetails(propertyId: string): Promise<EnrichedRecord | null>;
}

export interface DetailFetcherOptions {
  graphqlUrl: string;
  origin: string;
  userAgent: string;
  endpoint: SourceEndpoint;
  query: string;
}

export function createDetailFetcher(
  options: DetailFetcherOptions,
): DetailFetcher {
  const headers = {
    Origin: options.origin,
    "User-Agent": options.userAgent,
    "rdc-client-name": options.endpoint.clientName,
    "rdc-client-version": options.endpoint.clientVersion,
  };

  async function fetchDetails(
    propertyId: string,
  ): Promise<EnrichedRecord | null> {
    logger.debug(`Fetching property details for ID: ${propertyId}`);

    const result = await postJson({
      url: options.graphqlUrl,
      timeoutMs: options.endpoint.timeoutMs,
      headers,
      body: {
        operationName: "FullPropertyDetails",
        variables: { propertyId },
        query: options.query,
      },
    });

    if (!result.success) {
      logger.warn(`Details/${propertyId}: ${result.error ?? "request failed"}`);
      return null;
    }

    const parsed = detailResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      logger.warn(`Details/${propertyId}: ${describeSchemaIssues(parsed.error)}`);
      return null;
    }

    const { data, errors } = parsed.data;
    if (errors && errors.length > 0) {
      logger.warn(`Details/${propertyId}: ${describeGraphqlErrors(errors)}`);
      return null;
    }

    const home = data?.home;
    if (!home) {
      logger.debug(`Details/${propertyId}: not found`);
      return null;
    }

    return toEnrichedRecord(home);
  }

  return { fetchDetails };
}
