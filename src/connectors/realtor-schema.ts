/**
 * Wire shapes of the upstream GraphQL API and their mapping into the typed
 * pipeline records. Nothing past this module sees raw payloads.
 */

import { z } from "zod";
import type {
  Address,
  Advertiser,
  AdvertiserPhone,
  Candidate,
  DetailEntry,
  EnrichedRecord,
  SourceAgent,
} from "../types";

const text = z.string().nullish();
const num = z.number().nullish();
const id = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish();

const phoneSchema = z.object({
  number: text,
  type: text,
  primary: z.boolean().nullish(),
});

const namedSchema = z.object({ name: text });

const advertiserSchema = z.object({
  name: text,
  href: text,
  phones: z.array(phoneSchema).nullish(),
  broker: namedSchema.nullish(),
  office: namedSchema.nullish(),
});

const locationSchema = z.object({
  address: z
    .object({
      line: text,
      city: text,
      state_code: text,
      postal_code: text,
    })
    .nullish(),
  county: namedSchema.nullish(),
});

const descriptionSchema = z.object({
  text,
  sqft: num,
  beds: num,
  baths: num,
});

const homeBaseSchema = z.object({
  property_id: id,
  listing_id: id,
  permalink: text,
  list_price: num,
  list_date: text,
  location: locationSchema.nullish(),
  description: descriptionSchema.nullish(),
  advertisers: z.array(advertiserSchema).nullish(),
});

const detailSchema = z.object({
  category: text,
  parent_category: text,
  text: z.union([z.string(), z.array(z.string())]).nullish(),
});

const homeDetailSchema = homeBaseSchema.extend({
  status: text,
  details: z.array(detailSchema).nullish(),
  source: z
    .object({
      agents: z
        .array(
          z.object({
            agent_name: text,
            agent_phone: text,
            office_name: text,
          }),
        )
        .nullish(),
    })
    .nullish(),
});

const graphqlErrorsSchema = z.array(z.object({ message: text }).passthrough());

export const searchResponseSchema = z.object({
  data: z
    .object({
      home_search: z
        .object({
          total: num,
          results: z.array(homeBaseSchema).nullish(),
        })
        .nullish(),
    })
    .nullish(),
  errors: graphqlErrorsSchema.nullish(),
});

export const detailResponseSchema = z.object({
  data: z
    .object({
      home: homeDetailSchema.nullish(),
    })
    .nullish(),
  errors: graphqlErrorsSchema.nullish(),
});

export type RawHome = z.infer<typeof homeBaseSchema>;
export type RawHomeDetail = z.infer<typeof homeDetailSchema>;
type RawAdvertiser = z.infer<typeof advertiserSchema>;

export function describeGraphqlErrors(
  errors: z.infer<typeof graphqlErrorsSchema>,
): string {
  const messages = errors
    .map((e) => e.message)
    .filter((m): m is string => typeof m === "string" && m.length > 0);
  return `GraphQL errors: ${messages.length > 0 ? messages.join("; ") : `${errors.length} error(s)`}`;
}

export function describeSchemaIssues(error: z.ZodError): string {
  const first = error.issues[0];
  const path = first?.path.join(".") || "<root>";
  return `Malformed payload at ${path}: ${first?.message ?? "invalid"}`;
}

function toAdvertiser(raw: RawAdvertiser): Advertiser {
  const phones: AdvertiserPhone[] = (raw.phones ?? [])
    .filter((p) => typeof p.number === "string" && p.number.length > 0)
    .map((p) => ({
      number: p.number ?? "",
      type: p.type ?? null,
      primary: p.primary === true,
    }));

  return {
    name: raw.name ?? null,
    href: raw.href ?? null,
    phones,
    brokerName: raw.broker?.name ?? null,
    officeName: raw.office?.name ?? null,
  };
}

function toAddress(raw: RawHome): Address {
  const address = raw.location?.address;
  return {
    line: address?.line ?? null,
    city: address?.city ?? null,
    county: raw.location?.county?.name ?? null,
    stateCode: address?.state_code ?? null,
    postalCode: address?.postal_code ?? null,
  };
}

export function toCandidate(raw: RawHome): Candidate {
  return {
    propertyId: raw.property_id ?? null,
    listingId: raw.listing_id ?? null,
    permalink: raw.permalink ?? null,
    address: toAddress(raw),
    price: raw.list_price ?? null,
    beds: raw.description?.beds ?? null,
    baths: raw.description?.baths ?? null,
    sqft: raw.description?.sqft ?? null,
    listDate: raw.list_date ?? null,
    advertisers: (raw.advertisers ?? []).map(toAdvertiser),
  };
}

export function toEnrichedRecord(raw: RawHomeDetail): EnrichedRecord {
  const details: DetailEntry[] = (raw.details ?? []).map((d) => ({
    category: d.category ?? "",
    parentCategory: d.parent_category ?? null,
    texts: typeof d.text === "string" ? [d.text] : (d.text ?? []),
  }));

  const sourceAgents: SourceAgent[] = (raw.source?.agents ?? []).map((a) => ({
    name: a.agent_name ?? null,
    phone: a.agent_phone ?? null,
    officeName: a.office_name ?? null,
  }));

  return {
    ...toCandidate(raw),
    status: raw.status ?? null,
    details,
    descriptionText: raw.description?.text ?? null,
    sourceAgents,
  };
}
