import type { AxiosInstance } from "axios";
import { z } from "zod";
import { parseBody, toTerminologyError } from "../http_client";
import type { TerminologySource } from "../matcher";
import { combinations, splitWords } from "../text";
import type { Candidate } from "../types";

/** One ECL query plus the search term the results are scored against. */
export type SnomedQuery = { ecl: string; searchTerm: string };

export const PROCEDURE_ECL = "< 71388002|Procedure|";

const ConceptsResponse = z.object({
  items: z
    .array(
      z.object({
        conceptId: z.string(),
        definitionStatus: z.string().nullish(),
        fsn: z
          .object({
            term: z.string(),
          })
          .nullish(),
      })
    )
    .nullish(),
});

const DEFINITION_STATUSES = new Set(["FULLY_DEFINED", "PRIMITIVE"]);

/**
 * Lowest score of a returned concept. The term filter also matches synonyms,
 * so a hit whose FSN shares no word with the search term is still a hit.
 */
export const MATCHED_CONCEPT_MIN_SCORE = 0.01;

/**
 * Term sets from most to least specific: the whole term, then every combination
 * of n-1 words down to pairs, then the single words.
 */
export function relaxTerm(term: string): string[][] {
  const words = splitWords(term);
  if (!words.length) return [];

  const levels: string[][] = [[words.join(" ")]];
  for (let size = words.length - 1; size >= 2; size--) {
    levels.push(combinations(words, size).map((combo) => combo.join(" ")));
  }
  if (words.length > 1) {
    levels.push(words);
  }
  return levels;
}

export function buildEcl(focus: string, terms: readonly string[]): string {
  if (terms.length === 1) {
    return `${focus} {{ term = "${terms[0]}" }}`;
  }
  return `${focus} {{ term = (${terms.map((term) => `"${term}"`).join(" ")}) }}`;
}

/** Share of the search words that start a word of the label. */
export function wordCoverage(searchTerm: string, label: string): number {
  const wanted = splitWords(searchTerm.toLowerCase());
  if (!wanted.length) return 0;
  const words = splitWords(label.toLowerCase());
  const hits = wanted.filter((word) => words.some((candidate) => candidate.startsWith(word)));
  return hits.length / wanted.length;
}

/** Client for a SNOMED CT Snowstorm terminology server. */
export class SnowstormClient implements TerminologySource<SnomedQuery> {
  public readonly service = "snowstorm";
  private readonly http: AxiosInstance;
  private readonly branch: string;

  public constructor(http: AxiosInstance, branch = "MAIN") {
    this.http = http;
    this.branch = branch;
  }

  public async search(query: SnomedQuery): Promise<Candidate[]> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(`${this.branch}/concepts`, {
        params: {
          ecl: query.ecl,
          activeFilter: "true",
          termActive: "true",
          limit: 50,
        },
        headers: { Accept: "application/json" },
      });
      body = response.data;
    } catch (err) {
      throw toTerminologyError(this.service, err);
    }

    const parsed = parseBody(this.service, ConceptsResponse, body);
    return (parsed.items ?? [])
      .filter((item) => DEFINITION_STATUSES.has(item.definitionStatus ?? ""))
      .map((item) => {
        const label = item.fsn?.term ?? "";
        const score = Math.max(wordCoverage(query.searchTerm, label), MATCHED_CONCEPT_MIN_SCORE);
        return { id: item.conceptId, score, label };
      })
      .sort((a, b) => a.label.length - b.label.length);
  }
}
