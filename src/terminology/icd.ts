import { AxiosError } from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { parseBody, toTerminologyError } from "../http_client";
import { createChildLogger } from "../logger";
import type { TerminologySource } from "../matcher";
import { stripMarkup } from "../text";
import { TerminologyAuthError } from "../types";
import type { Candidate } from "../types";

export type IcdQuery = { term: string; flexible: boolean };

export interface IcdClientOptions {
  http: AxiosInstance;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  release: string;
  scope?: string;
}

const TokenResponse = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

const SearchResponse = z.object({
  error: z.boolean().nullish(),
  errorMessage: z.string().nullish(),
  destinationEntities: z
    .array(
      z.object({
        theCode: z.string().nullish(),
        title: z.string().nullish(),
        score: z.number().nullish(),
      })
    )
    .nullish(),
});

/** Token endpoint answers that mean the credentials were rejected. Anything else is a transport failure. */
const REJECTED_CREDENTIAL_STATUSES = new Set([400, 401, 403]);

/** Tokens are refreshed this long before the server says they expire. */
const TOKEN_EXPIRY_MARGIN_MS = 60000;

const log = createChildLogger({ component: "icd" });

/**
 * Client for the WHO ICD-11 API. Authenticates with OAuth2 client credentials.
 * Rejected credentials raise TerminologyAuthError; an unreachable or failing
 * token endpoint raises TerminologyRequestError like any other lookup.
 */
export class IcdClient implements TerminologySource<IcdQuery> {
  public readonly service = "icd11";
  private readonly options: IcdClientOptions;
  private token?: { value: string; expiresAt: number };

  public constructor(options: IcdClientOptions) {
    this.options = options;
  }

  public async search(query: IcdQuery): Promise<Candidate[]> {
    if (!query.term) return [];
    const token = await this.accessToken();

    let body: unknown;
    try {
      const response = await this.options.http.get<unknown>(`icd/release/11/${this.options.release}/mms/search`, {
        params: {
          q: query.term,
          useFlexisearch: String(query.flexible),
          flatResults: "true",
        },
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json",
          "Accept-Language": "en",
          "API-Version": "v2",
        },
      });
      body = response.data;
    } catch (err) {
      throw toTerminologyError(this.service, err);
    }

    const parsed = parseBody(this.service, SearchResponse, body);
    if (parsed.error) {
      log.warn({ term: query.term, message: parsed.errorMessage }, "ICD search reported an error");
    }
    return (parsed.destinationEntities ?? []).flatMap((entity) => {
      if (!entity.theCode) return [];
      return [{ id: entity.theCode, score: entity.score ?? 0, label: stripMarkup(entity.title ?? "") }];
    });
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      scope: this.options.scope ?? "icdapi_access",
    });

    let body: unknown;
    try {
      const response = await this.options.http.post<unknown>(this.options.tokenUrl, form.toString(), {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
      });
      body = response.data;
    } catch (err) {
      const cause = toTerminologyError(this.service, err);
      if (err instanceof AxiosError && REJECTED_CREDENTIAL_STATUSES.has(err.response?.status ?? 0)) {
        throw new TerminologyAuthError(this.service, cause.message, cause.context);
      }
      throw cause;
    }

    const parsed = TokenResponse.safeParse(body);
    if (!parsed.success) {
      throw new TerminologyAuthError(this.service, "token endpoint returned no access token");
    }

    const lifetimeMs = (parsed.data.expires_in ?? 3600) * 1000;
    this.token = {
      value: parsed.data.access_token,
      expiresAt: Date.now() + Math.max(lifetimeMs - TOKEN_EXPIRY_MARGIN_MS, 0),
    };
    return this.token.value;
  }
}
