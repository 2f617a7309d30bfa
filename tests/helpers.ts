import type {
  Advertiser,
  Candidate,
  EnrichedRecord,
  ListingInput,
} from "../src/types";

export const BASE_URL = "https://listings.test";

export function makeAdvertiser(overrides: Partial<Advertiser> = {}): Advertiser {
  return {
    name: null,
    href: null,
    phones: [],
    brokerName: null,
    officeName: null,
    ...overrides,
  };
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  const id = overrides.propertyId ?? "1001";
  return {
    propertyId: id,
    listingId: null,
    permalink: `100-Main-St_Town_WI_53000_M${id}`,
    address: {
      line: "100 Main St",
      city: "Town",
      county: "Waukesha",
      stateCode: "WI",
      postalCode: "53000",
    },
    price: 250000,
    beds: 3,
    baths: 2,
    sqft: 1500,
    listDate: "2025-03-01",
    advertisers: [],
    ...overrides,
  };
}

export function makeEnriched(
  candidate: Candidate,
  overrides: Partial<EnrichedRecord> = {},
): EnrichedRecord {
  return {
    ...candidate,
    status: "for_sale",
    details: [],
    descriptionText: null,
    sourceAgents: [],
    ...overrides,
  };
}

export function makeListingInput(
  overrides: Partial<ListingInput> = {},
): ListingInput {
  return {
    listingUrl: `${BASE_URL}/realestateandhomes-detail/100-Main-St`,
    propertyId: "1001",
    address: "100 Main St",
    city: "Town",
    county: "Waukesha",
    stateCode: "WI",
    postalCode: "53000",
    price: 250000,
    beds: 3,
    baths: 2,
    sqft: 1500,
    listDate: "2025-03-01",
    hasSepticSystem: false,
    hasPrivateWell: false,
    septicMentions: [],
    wellMentions: [],
    agentUrl: null,
    agentName: null,
    agentPhone: null,
    brokerageName: null,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
