import { z } from "zod";
import type { ModelClient } from "./llm";
import { createChildLogger, type Logger } from "./logger";
import { TerminologyRequestError } from "./types";
import type { Candidate } from "./types";

/**
 * One terminology service seen through a single query type. Transport and HTTP
 * failures must surface as TerminologyRequestError so the matcher can degrade.
 */
export interface TerminologySource<Q> {
  readonly service: string;
  search(query: Q): Promise<Candidate[]>;
}

/** What the disambiguation prompt tells the model about the item being coded. */
export interface MatchSubject {
  reference: string;
  name: string;
  translatedName: string;
  searchTerm?: string;
}

export interface MatchStrategy<E, Q> {
  /** Coding system named in the disambiguation prompt, e.g. "ICD-11". */
  readonly codingSystem: string;
  /** Highest score the source can give; a lone candidate at this score is taken as is. */
  readonly maxScore: number;
  /** Queries in the order they are tried: exact first, then approximate or relaxed ones. */
  queries(item: E): Iterable<Q>;
  accept(candidate: Candidate): boolean;
  subject(item: E): MatchSubject;
}

export const SelectionSchema = z
  .object({
    id: z.string().describe("The identifier of the single best matching candidate."),
  })
  .strict();

const DISAMBIGUATION_SYSTEM_PROMPT =
  "You are a medical coding expert. You map clinical terms to the most appropriate concept of a standard terminology. Always return valid JSON only.";

/** Sorts by score, highest first, keeping source order among equal scores; repeated ids keep their best entry. */
export function rankCandidates(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return [...candidates]
    .sort((a, b) => b.score - a.score)
    .filter((candidate) => {
      if (seen.has(candidate.id)) return false;
      seen.add(candidate.id);
      return true;
    });
}

export function buildDisambiguationPrompt(
  codingSystem: string,
  subject: MatchSubject,
  candidates: readonly Candidate[]
): string {
  const lines = [
    `Select the most appropriate ${codingSystem} concept for the following clinical term.`,
    "",
    "Term information:",
    `- Original reference: ${subject.reference}`,
    `- Name: ${subject.name}`,
    `- Translated name: ${subject.translatedName}`,
  ];
  if (subject.searchTerm) {
    lines.push(`- Search term: ${subject.searchTerm}`);
  }
  lines.push(
    "",
    `Available ${codingSystem} matches (sorted by relevance score):`,
    ...candidates.map((c, idx) => `${idx + 1}. ID: ${c.id}, Label: ${c.label}, Score: ${c.score.toFixed(2)}`),
    "",
    "Consider:",
    "1. Specificity: prefer more specific concepts over general ones",
    "2. Accuracy: the concept must represent the term",
    "3. Clinical relevance: the concept should be clinically meaningful",
    "4. Score: higher scores indicate better matches, but use your medical expertise",
    "",
    'Return the ID of the best match in the "id" field, exactly as listed.'
  );
  return lines.join("\n");
}

export class TerminologyMatcher<E, Q> {
  private readonly source: TerminologySource<Q>;
  private readonly strategy: MatchStrategy<E, Q>;
  private readonly model: ModelClient;
  private readonly log: Logger;

  public constructor(source: TerminologySource<Q>, strategy: MatchStrategy<E, Q>, model: ModelClient) {
    this.source = source;
    this.strategy = strategy;
    this.model = model;
    this.log = createChildLogger({ component: "matcher", service: source.service });
  }

  /**
   * Resolves one item to a single candidate, or undefined when no stage yields
   * anything. Model failures during disambiguation propagate.
   */
  public async match(item: E): Promise<Candidate | undefined> {
    const candidates = await this.findCandidates(item);
    if (!candidates.length) {
      this.log.debug({ subject: this.strategy.subject(item).name }, "no candidates");
      return undefined;
    }
    return this.select(item, candidates);
  }

  /** Tries each query in turn and returns the ranked candidates of the first one that yields any. */
  public async findCandidates(item: E): Promise<Candidate[]> {
    for (const query of this.strategy.queries(item)) {
      let found: Candidate[];
      try {
        found = await this.source.search(query);
      } catch (err) {
        if (!(err instanceof TerminologyRequestError)) throw err;
        this.log.warn({ query, err: err.message, context: err.context }, "terminology lookup failed, continuing");
        continue;
      }
      const ranked = rankCandidates(found.filter((candidate) => this.strategy.accept(candidate)));
      if (ranked.length) {
        this.log.debug({ query, candidates: ranked.length }, "candidates found");
        return ranked;
      }
    }
    return [];
  }

  private async select(item: E, ranked: Candidate[]): Promise<Candidate> {
    if (ranked.length === 1) return ranked[0];

    const top = ranked.filter((candidate) => candidate.score >= this.strategy.maxScore);
    if (top.length === 1) return top[0];

    return this.disambiguate(item, ranked);
  }

  private async disambiguate(item: E, ranked: Candidate[]): Promise<Candidate> {
    const userPrompt = buildDisambiguationPrompt(this.strategy.codingSystem, this.strategy.subject(item), ranked);
    const selection = await this.model.invoke(DISAMBIGUATION_SYSTEM_PROMPT, userPrompt, SelectionSchema);
    const chosen = ranked.find((candidate) => candidate.id === selection.id.trim());
    if (!chosen) {
      this.log.warn({ selected: selection.id, fallback: ranked[0].id }, "model picked an unknown id, using best ranked");
      return ranked[0];
    }
    return chosen;
  }
}
