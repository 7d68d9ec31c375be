import { describe, it, expect } from "vitest";
import type { InternalAxiosRequestConfig } from "axios";
import { fakeHttpClient, httpFailure, type FakeHandler } from "../../__tests__/helpers";
import { TerminologyAuthError, TerminologyRequestError } from "../../types";
import { IcdClient } from "../icd";

const TOKEN_URL = "https://token.test/connect/token";

function icdClient(handler: FakeHandler): { client: IcdClient; requests: InternalAxiosRequestConfig[] } {
  const { http, requests } = fakeHttpClient(handler);
  const client = new IcdClient({
    http,
    tokenUrl: TOKEN_URL,
    clientId: "test-client",
    clientSecret: "test-secret",
    release: "2024-01",
  });
  return { client, requests };
}

const searchBody = {
  error: false,
  destinationEntities: [
    { theCode: "5A11", title: "<em class='found'>Type 2</em> diabetes mellitus", score: 0.92 },
    { title: "Diabetes mellitus, chapter heading", score: 0.5 },
  ],
};

describe("IcdClient.search", () => {
  it("returns coded entities with highlight markup removed", async () => {
    const { client, requests } = icdClient((request) =>
      request.method === "post" ? { access_token: "test-token", expires_in: 3600 } : searchBody
    );

    const candidates = await client.search({ term: "Type 2 diabetes mellitus", flexible: false });
    expect(candidates).toEqual([{ id: "5A11", score: 0.92, label: "Type 2 diabetes mellitus" }]);

    const search = requests[1];
    expect(search.url).toBe("icd/release/11/2024-01/mms/search");
    expect(search.params).toEqual({ q: "Type 2 diabetes mellitus", useFlexisearch: "false", flatResults: "true" });
    expect(search.headers.get("Authorization")).toBe("Bearer test-token");
    expect(search.headers.get("API-Version")).toBe("v2");
  });

  it("requests a token with client credentials once and reuses it", async () => {
    const { client, requests } = icdClient((request) =>
      request.method === "post" ? { access_token: "test-token", expires_in: 3600 } : searchBody
    );

    await client.search({ term: "diabetes", flexible: false });
    await client.search({ term: "diabetes", flexible: true });

    const tokenRequests = requests.filter((request) => request.method === "post");
    expect(tokenRequests).toHaveLength(1);
    expect(tokenRequests[0].url).toBe(TOKEN_URL);
    expect(new URLSearchParams(String(tokenRequests[0].data)).get("grant_type")).toBe("client_credentials");
    expect(new URLSearchParams(String(tokenRequests[0].data)).get("scope")).toBe("icdapi_access");
    expect(requests[2].params.useFlexisearch).toBe("true");
  });

  it("raises TerminologyAuthError when the token request fails and never searches", async () => {
    const { client, requests } = icdClient((request) => {
      throw httpFailure(request, 401);
    });

    await expect(client.search({ term: "diabetes", flexible: false })).rejects.toBeInstanceOf(TerminologyAuthError);
    expect(requests.map((request) => request.method)).toEqual(["post"]);
  });

  it("raises TerminologyRequestError when the token endpoint fails on its side", async () => {
    const { client, requests } = icdClient((request) => {
      throw httpFailure(request, 503);
    });

    const error = await client.search({ term: "diabetes", flexible: false }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TerminologyRequestError);
    expect(error).not.toBeInstanceOf(TerminologyAuthError);
    expect(requests.map((request) => request.method)).toEqual(["post"]);
  });

  it("raises TerminologyAuthError when the token response carries no token", async () => {
    const { client } = icdClient(() => ({ error: "invalid_client" }));
    await expect(client.search({ term: "diabetes", flexible: false })).rejects.toThrow(
      "icd11 authentication failed: token endpoint returned no access token"
    );
  });

  it("raises TerminologyRequestError when the search itself fails", async () => {
    const { client } = icdClient((request) => {
      if (request.method === "post") return { access_token: "test-token" };
      throw httpFailure(request, 500);
    });
    await expect(client.search({ term: "diabetes", flexible: false })).rejects.toBeInstanceOf(TerminologyRequestError);
  });
});
