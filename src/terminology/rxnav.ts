import type { AxiosInstance } from "axios";
import { z } from "zod";
import { parseBody, toTerminologyError } from "../http_client";
import type { TerminologySource } from "../matcher";
import type { Candidate } from "../types";

export type RxNavQuery = { kind: "exact" | "approximate"; term: string };

/** RxNav lookups used by the medication enricher: name search plus per-concept codes. */
export interface RxNavSource extends TerminologySource<RxNavQuery> {
  codes(rxcui: string, propName: string): Promise<string[]>;
}

const RxcuiResponse = z.object({
  idGroup: z
    .object({
      rxnormId: z.array(z.string()).nullish(),
    })
    .nullish(),
});

const ApproximateTermResponse = z.object({
  approximateGroup: z
    .object({
      candidate: z
        .array(
          z.object({
            rxcui: z.string(),
            rank: z.union([z.string(), z.number()]),
            name: z.string().nullish(),
            source: z.string().nullish(),
          })
        )
        .nullish(),
    })
    .nullish(),
});

const PropertiesResponse = z.object({
  properties: z
    .object({
      name: z.string().nullish(),
    })
    .nullish(),
});

const AllPropertiesResponse = z.object({
  propConceptGroup: z
    .object({
      propConcept: z
        .array(
          z.object({
            propName: z.string(),
            propValue: z.string(),
          })
        )
        .nullish(),
    })
    .nullish(),
});

/** Client for the NLM RxNav REST API. */
export class RxNavClient implements RxNavSource {
  public readonly service = "rxnav";
  private readonly http: AxiosInstance;

  public constructor(http: AxiosInstance) {
    this.http = http;
  }

  public async search(query: RxNavQuery): Promise<Candidate[]> {
    if (!query.term) return [];
    return query.kind === "exact" ? this.exact(query.term) : this.approximate(query.term);
  }

  /** Property values of one concept, e.g. its ATC codes for propName "ATC". Order kept, duplicates dropped. */
  public async codes(rxcui: string, propName: string): Promise<string[]> {
    const body = await this.get(`rxcui/${encodeURIComponent(rxcui)}/allProperties.json`, { prop: "codes" });
    const parsed = parseBody(this.service, AllPropertiesResponse, body);
    const wanted = propName.toLowerCase();
    const values = (parsed.propConceptGroup?.propConcept ?? [])
      .filter((concept) => concept.propName.toLowerCase() === wanted)
      .map((concept) => concept.propValue);
    return Array.from(new Set(values));
  }

  private async exact(term: string): Promise<Candidate[]> {
    const body = await this.get("rxcui.json", { name: term });
    const parsed = parseBody(this.service, RxcuiResponse, body);
    const ids = parsed.idGroup?.rxnormId ?? [];
    if (ids.length <= 1) {
      return ids.map((id) => ({ id, score: 1, label: term }));
    }
    // Several concepts share the name: label each with its own.
    const candidates: Candidate[] = [];
    for (const id of ids) {
      candidates.push({ id, score: 1, label: (await this.conceptName(id)) || term });
    }
    return candidates;
  }

  private async conceptName(rxcui: string): Promise<string> {
    const body = await this.get(`rxcui/${encodeURIComponent(rxcui)}/properties.json`, {});
    return parseBody(this.service, PropertiesResponse, body).properties?.name ?? "";
  }

  private async approximate(term: string): Promise<Candidate[]> {
    const body = await this.get("approximateTerm.json", { term, maxEntries: 20 });
    const parsed = parseBody(this.service, ApproximateTermResponse, body);
    return (parsed.approximateGroup?.candidate ?? []).flatMap((candidate) => {
      const rank = Number(candidate.rank);
      if (!Number.isFinite(rank) || rank < 1) return [];
      return [{ id: candidate.rxcui, score: 1 / rank, label: candidate.name ?? "" }];
    });
  }

  private async get(url: string, params: Record<string, string | number>): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, { params });
      return response.data;
    } catch (err) {
      throw toTerminologyError(this.service, err);
    }
  }
}
