import { describe, expect, it, vi } from "vitest";
import { postJson } from "../src/connectors/base";
import { createDetailFetcher } from "../src/connectors/realtor-details";
import {
  buildSearchVariables,
  computeDateFloor,
  createSearchClient,
} from "../src/connectors/realtor-search";
import type { Partition } from "../src/types";
import { jsonResponse } from "./helpers";

const GRAPHQL_URL = "https://listings.test/graphql";

const RACINE: Partition = {
  label: "Racine",
  location: "Racine County, WI",
  stateCode: "WI",
};

const SEARCH_HOME = {
  property_id: 123,
  listing_id: "L1",
  permalink: "1-Oak-Rd_Burlington_WI_53105_M123",
  list_price: 325000,
  list_date: "2025-03-01T10:00:00Z",
  location: {
    address: {
      line: "1 Oak Rd",
      city: "Burlington",
      state_code: "WI",
      postal_code: "53105",
    },
    county: { name: "Racine" },
  },
  description: { beds: 3, baths: 2, sqft: 1800, text: null },
  advertisers: [
    {
      name: "Pat Agent",
      href: "/realestateagents/pat",
      phones: [
        { number: "262-555-0100", type: "Office", primary: true },
        { number: null, type: "Mobile" },
      ],
      broker: null,
      office: { name: "Lakeside Realty" },
    },
  ],
};

function stubFetch(response: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) => response(),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function searchClient() {
  return createSearchClient({
    graphqlUrl: GRAPHQL_URL,
    origin: "https://listings.test",
    userAgent: "test-agent",
    maxPageSize: 200,
    endpoint: {
      clientName: "RDC_WEB_SRP_FS_PAGE",
      clientVersion: "3.0.2449",
      timeoutMs: 1000,
    },
    query: "query ConsumerSearchQuery { home_search { total } }",
  });
}

describe("buildSearchVariables", () => {
  it("searches a location with a list-date floor", () => {
    expect(buildSearchVariables(RACINE, "2025-02-28", 50)).toEqual({
      query: {
        primary: true,
        status: ["for_sale", "ready_to_build"],
        search_location: { location: "Racine County, WI" },
        list_date: { min: "2025-02-28" },
      },
      limit: 50,
      offset: 0,
      sort: [{ field: "list_date", direction: "desc" }],
    });
  });

  it("falls back to the state code and drops the floor when absent", () => {
    const variables = buildSearchVariables(
      { label: "Statewide", location: null, stateCode: "WI" },
      null,
      10,
    );

    expect(variables.query).toEqual({
      primary: true,
      status: ["for_sale", "ready_to_build"],
      state_code: "WI",
    });
  });
});

describe("computeDateFloor", () => {
  it("subtracts whole days in UTC", () => {
    expect(computeDateFloor(1, new Date("2025-03-01T05:00:00Z"))).toBe("2025-02-28");
    expect(computeDateFloor(7, new Date("2025-03-01T23:59:00Z"))).toBe("2025-02-22");
    expect(computeDateFloor(null, new Date("2025-03-01T05:00:00Z"))).toBeNull();
  });
});

describe("search client", () => {
  it("posts the search query and maps results to candidates", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ data: { home_search: { total: 41, results: [SEARCH_HOME] } } }),
    );

    const result = await searchClient().search(RACINE, "2025-02-28", 500);

    expect(result.success).toBe(true);
    expect(result.total).toBe(41);
    expect(result.candidates).toEqual([
      {
        propertyId: "123",
        listingId: "L1",
        permalink: "1-Oak-Rd_Burlington_WI_53105_M123",
        address: {
          line: "1 Oak Rd",
          city: "Burlington",
          county: "Racine",
          stateCode: "WI",
          postalCode: "53105",
        },
        price: 325000,
        beds: 3,
        baths: 2,
        sqft: 1800,
        listDate: "2025-03-01T10:00:00Z",
        advertisers: [
          {
            name: "Pat Agent",
            href: "/realestateagents/pat",
            phones: [{ number: "262-555-0100", type: "Office", primary: true }],
            brokerName: null,
            officeName: "Lakeside Realty",
          },
        ],
      },
    ]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(GRAPHQL_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({
      "rdc-client-name": "RDC_WEB_SRP_FS_PAGE",
      "rdc-client-version": "3.0.2449",
      "User-Agent": "test-agent",
    });

    const body = JSON.parse(String(init?.body));
    expect(body.operationName).toBe("ConsumerSearchQuery");
    expect(body.variables.limit).toBe(200);
    expect(body.variables.query.search_location).toEqual({
      location: "Racine County, WI",
    });
  });

  it("flags rate limiting", async () => {
    stubFetch(() => new Response("slow down", { status: 429 }));

    const result = await searchClient().search(RACINE, null, 10);

    expect(result).toMatchObject({
      success: false,
      rateLimited: true,
      error: "Rate limited (429)",
      candidates: [],
    });
  });

  it("reports GraphQL errors as a failed search", async () => {
    stubFetch(() => jsonResponse({ data: null, errors: [{ message: "bad query" }] }));

    const result = await searchClient().search(RACINE, null, 10);

    expect(result.success).toBe(false);
    expect(result.error).toBe("GraphQL errors: bad query");
  });

  it("reports malformed payloads without throwing", async () => {
    stubFetch(() => jsonResponse({ data: { home_search: { results: "nope" } } }));

    const result = await searchClient().search(RACINE, null, 10);

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Malformed payload at data\.home_search\.results: /);
  });

  it("treats an empty result page as a successful search", async () => {
    stubFetch(() => jsonResponse({ data: { home_search: { total: 0, results: [] } } }));

    const result = await searchClient().search(RACINE, null, 10);

    expect(result.success).toBe(true);
    expect(result.candidates).toEqual([]);
    expect(result.error).toBeUndefined();
    expect(result.total).toBe(0);
  });

  it("reports a missing home_search", async () => {
    stubFetch(() => jsonResponse({ data: {} }));

    const result = await searchClient().search(RACINE, null, 10);

    expect(result.error).toBe("Malformed payload: missing home_search");
  });

  it("reports network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const result = await searchClient().search(RACINE, null, 10);

    expect(result.success).toBe(false);
    expect(result.error).toBe("TypeError: fetch failed");
  });
});

describe("detail fetcher", () => {
  const fetcher = () =>
    createDetailFetcher({
      graphqlUrl: GRAPHQL_URL,
      origin: "https://listings.test",
      userAgent: "test-agent",
      endpoint: {
        clientName: "RDC_WEB_DETAILS_PAGE",
        clientVersion: "2.161.0",
        timeoutMs: 1000,
      },
      query: "query FullPropertyDetails { home { status } }",
    });

  it("maps detail entries, description and source agents", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        data: {
          home: {
            ...SEARCH_HOME,
            status: "for_sale",
            description: { ...SEARCH_HOME.description, text: "Quiet lot with well water." },
            details: [
              { category: "Utilities", parent_category: "Features", text: ["Water Source: Well", "Sewer: Septic"] },
              { category: "Heating", text: "Forced Air" },
            ],
            source: {
              agents: [{ agent_name: "Sam Lister", agent_phone: "262-555-0111", office_name: "County Homes" }],
            },
          },
        },
      }),
    );

    const record = await fetcher().fetchDetails("123");

    expect(record).toMatchObject({
      propertyId: "123",
      status: "for_sale",
      descriptionText: "Quiet lot with well water.",
      details: [
        {
          category: "Utilities",
          parentCategory: "Features",
          texts: ["Water Source: Well", "Sewer: Septic"],
        },
        { category: "Heating", parentCategory: null, texts: ["Forced Air"] },
      ],
      sourceAgents: [
        { name: "Sam Lister", phone: "262-555-0111", officeName: "County Homes" },
      ],
    });

    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toMatchObject({
      operationName: "FullPropertyDetails",
      variables: { propertyId: "123" },
    });
  });

  it("returns null when the listing is gone", async () => {
    stubFetch(() => jsonResponse({ data: { home: null } }));
    await expect(fetcher().fetchDetails("404")).resolves.toBeNull();
  });

  it("returns null on HTTP errors", async () => {
    stubFetch(() => new Response("oops", { status: 500 }));
    await expect(fetcher().fetchDetails("500")).resolves.toBeNull();
  });
});

describe("postJson", () => {
  it("times out a stalled request", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
            });
          }),
      ),
    );

    const result = await postJson({ url: GRAPHQL_URL, timeoutMs: 5, body: {} });

    expect(result).toMatchObject({
      success: false,
      data: null,
      error: "Timeout after 5ms",
      rateLimited: false,
    });
  });
});
