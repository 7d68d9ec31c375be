import { z } from "zod";
import { createChildLogger } from "../logger";
import { TerminologyMatcher, type MatchStrategy } from "../matcher";
import { DataStorage, InformationExtractor, TerminologyEnricher } from "../nodes";
import { buildExtractionPipeline } from "../pipeline";
import { columnsOf, responseFormat } from "../schema";
import type { SnomedQuery } from "../terminology";
import { PROCEDURE_ECL, buildEcl, relaxTerm } from "../terminology/snowstorm";
import { stripQualifiers } from "../text";
import { ExtractionWorkflow, type WorkflowDefinition } from "./base";

export const ExtractedProcedureSchema = z
  .object({
    reference: z.string().describe("The procedure as it appears in the text."),
    name: z.string().describe("The name of the procedure."),
    name_translated: z.string().describe("The name of the procedure translated to English."),
    search_term: z.string().describe("A short English search term to find the procedure in SNOMED CT."),
    year: z.number().int().describe("The year the procedure was performed; -1 if not given."),
    month: z.number().int().describe("The month the procedure was performed; -1 if not given."),
    day: z.number().int().describe("The day the procedure was performed; -1 if not given."),
  })
  .strict();

export const ProcedureSchema = ExtractedProcedureSchema.extend({
  snomed_id: z.string(),
  snomed_fsn: z.string(),
}).strict();

export type ExtractedProcedure = z.infer<typeof ExtractedProcedureSchema>;
export type Procedure = z.infer<typeof ProcedureSchema>;

export const PROCEDURE_PROMPT = `
Given a doctor's letter containing none or multiple procedures, extract all procedures and their relevant information.

Values to extract:
- reference: The procedure as it appears in the text.
- name: The name of the procedure.
- name_translated: The name of the procedure translated to English.
- search_term: A search term that can be used to find the procedure in SNOMED CT.
- year: The year the procedure was performed. If no year is given, return -1.
- month: The month the procedure was performed. If no month is given, return -1.
- day: The day the procedure was performed. If no day is given, return -1.
`.trim();

export function procedureSearchTerm(item: ExtractedProcedure): string {
  return stripQualifiers(item.search_term) || stripQualifiers(item.name_translated);
}

/**
 * The full search term first, then ever smaller word combinations, so a long
 * term that matches nothing still finds its closest broader concept.
 */
export const procedureMatchStrategy: MatchStrategy<ExtractedProcedure, SnomedQuery> = {
  codingSystem: "SNOMED CT",
  maxScore: 1,
  *queries(item) {
    const searchTerm = procedureSearchTerm(item);
    for (const terms of relaxTerm(searchTerm)) {
      yield { ecl: buildEcl(PROCEDURE_ECL, terms), searchTerm };
    }
  },
  accept: (candidate) => candidate.score > 0,
  subject: (item) => ({
    reference: item.reference,
    name: item.name,
    translatedName: item.name_translated,
    searchTerm: procedureSearchTerm(item),
  }),
};

const log = createChildLogger({ component: "procedure" });

export function createProcedureEnricher(
  matcher: TerminologyMatcher<ExtractedProcedure, SnomedQuery> | undefined
): TerminologyEnricher<ExtractedProcedure, Procedure> {
  if (!matcher) {
    log.warn("SNOWSTORM_BASE_URL is not configured, procedures are stored without codes");
  }
  return new TerminologyEnricher("snomed_procedure_lookup", async (item): Promise<Procedure> => {
    const match = matcher ? await matcher.match(item) : undefined;
    return { ...item, snomed_id: match?.id ?? "", snomed_fsn: match?.label ?? "" };
  });
}

export const procedureWorkflow: WorkflowDefinition = {
  identifier: "ProcedureExtractionWorkflow",
  description: "Procedures with SNOMED CT concepts (Snowstorm).",
  domain: true,
  create(name, context) {
    const { model, store, settings, terminology } = context;
    const matcher = terminology.snowstorm
      ? new TerminologyMatcher(terminology.snowstorm, procedureMatchStrategy, model)
      : undefined;
    const pipeline = buildExtractionPipeline<ExtractedProcedure, Procedure>({
      extractor: new InformationExtractor(model, PROCEDURE_PROMPT, responseFormat(ExtractedProcedureSchema)),
      processor: createProcedureEnricher(matcher),
      storage: new DataStorage<Procedure>({
        store,
        table: name,
        columns: columnsOf(ProcedureSchema),
        outputDir: settings.outputDir,
        splitPatient: settings.splitPatient,
      }),
    });
    return new ExtractionWorkflow(name, pipeline);
  },
};
