/**
 * Turns search/detail records into the row shape the Listing Store writes.
 * Detail data refines the search data: agent, phone and brokerage come from
 * the detail advertisers first, then the source agents, then the search hit.
 */

import type {
  Advertiser,
  AdvertiserPhone,
  Candidate,
  ClassificationResult,
  EnrichedRecord,
  ListingInput,
} from "./types";

/** Digits only, last ten (drops a leading country code). */
export function normalizePhone(phone: string | null | undefined): string {
  if (!phone) return "";
  const digits = phone.replace(/\D/g, "");
  return digits.length >= 10 ? digits.slice(-10) : digits;
}

export function buildListingUrl(
  baseUrl: string,
  permalink: string | null,
): string | null {
  if (!permalink) return null;
  return `${baseUrl.replace(/\/+$/, "")}/realestateandhomes-detail/${permalink}`;
}

export function resolveAgentUrl(
  baseUrl: string,
  href: string | null,
): string | null {
  if (!href) return null;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function pickPhone(
  phones: AdvertiserPhone[],
  acceptMobile: boolean,
): string | null {
  const preferred = phones.find(
    (p) => p.primary || (acceptMobile && p.type === "mobile"),
  );
  return (preferred ?? phones[0])?.number ?? null;
}

interface AgentFields {
  agentUrl: string | null;
  agentName: string | null;
  agentPhone: string | null;
  brokerageName: string | null;
}

function agentFromSearch(advertiser: Advertiser | undefined): AgentFields {
  return {
    agentUrl: advertiser?.href ?? null,
    agentName: advertiser?.name ?? null,
    agentPhone: advertiser ? pickPhone(advertiser.phones, false) : null,
    brokerageName: null,
  };
}

function refineAgentFromDetails(
  base: AgentFields,
  record: EnrichedRecord,
): AgentFields {
  const result = { ...base };
  const advertiser = record.advertisers[0];

  if (advertiser) {
    result.agentName = advertiser.name ?? result.agentName;
    result.agentPhone = pickPhone(advertiser.phones, true) ?? result.agentPhone;
    result.agentUrl = advertiser.href ?? result.agentUrl;
    result.brokerageName = advertiser.brokerName ?? advertiser.officeName;
  }

  const sourceAgent = record.sourceAgents[0];
  if (sourceAgent && !result.agentName) {
    result.agentName = sourceAgent.name;
    result.agentPhone = sourceAgent.phone ?? result.agentPhone;
    result.brokerageName = result.brokerageName ?? sourceAgent.officeName;
  }

  return result;
}

export function toListingInput(
  candidate: Candidate,
  details: EnrichedRecord | null,
  classification: ClassificationResult,
  baseUrl: string,
): ListingInput | null {
  const listingUrl = buildListingUrl(
    baseUrl,
    candidate.permalink ?? details?.permalink ?? null,
  );
  if (!listingUrl) return null;

  let agent = agentFromSearch(candidate.advertisers[0]);
  if (details) {
    agent = refineAgentFromDetails(agent, details);
  }

  const address = candidate.address;
  const phone = normalizePhone(agent.agentPhone);

  return {
    listingUrl,
    propertyId: candidate.propertyId,
    address: address.line,
    city: address.city,
    county: address.county ?? details?.address.county ?? null,
    stateCode: address.stateCode,
    postalCode: address.postalCode,
    price: candidate.price ?? details?.price ?? null,
    beds: candidate.beds ?? details?.beds ?? null,
    baths: candidate.baths ?? details?.baths ?? null,
    sqft: candidate.sqft ?? details?.sqft ?? null,
    listDate: candidate.listDate ?? details?.listDate ?? null,
    hasSepticSystem: classification.hasSepticSystem,
    hasPrivateWell: classification.hasPrivateWell,
    septicMentions: [...classification.septicMentions],
    wellMentions: [...classification.wellMentions],
    agentUrl: resolveAgentUrl(baseUrl, agent.agentUrl),
    agentName: agent.agentName,
    agentPhone: phone || null,
    brokerageName: agent.brokerageName,
  };
}
