import { z } from "zod";
import { createChildLogger } from "../logger";
import { TerminologyMatcher, type MatchStrategy } from "../matcher";
import { DataStorage, InformationExtractor, TerminologyEnricher } from "../nodes";
import { buildExtractionPipeline } from "../pipeline";
import { columnsOf, responseFormat } from "../schema";
import type { IcdQuery } from "../terminology";
import { stripQualifiers } from "../text";
import { ExtractionWorkflow, type WorkflowDefinition } from "./base";

export const ExtractedDiagnosisSchema = z
  .object({
    reference: z.string().describe("The diagnosis as it appears in the text."),
    name: z.string().describe("The name of the diagnosis."),
    name_translated: z.string().describe("The name of the diagnosis translated to English."),
    year: z.number().int().describe("The year the diagnosis was made; -1 if not given."),
    month: z.number().int().describe("The month the diagnosis was made; -1 if not given."),
    day: z.number().int().describe("The day the diagnosis was made; -1 if not given."),
  })
  .strict();

export const DiagnosisSchema = ExtractedDiagnosisSchema.extend({
  icd11_code: z.string(),
  icd11_title: z.string(),
}).strict();

export type ExtractedDiagnosis = z.infer<typeof ExtractedDiagnosisSchema>;
export type Diagnosis = z.infer<typeof DiagnosisSchema>;

export const DIAGNOSIS_PROMPT = `
Given a doctor's letter containing none or multiple diagnoses, extract all diagnoses and their relevant information.

Values to extract:
- reference: The diagnosis as it appears in the text.
- name: The name of the diagnosis.
- name_translated: The name of the diagnosis translated to English.
- year: The year the diagnosis was made. If no year is given, return -1.
- month: The month the diagnosis was made. If no month is given, return -1.
- day: The day the diagnosis was made. If no day is given, return -1.
`.trim();

/** ICD-11 search scores run from 0 to 1; anything at or below 0.3 is noise. */
export const ICD_MIN_SCORE = 0.3;

export const diagnosisMatchStrategy: MatchStrategy<ExtractedDiagnosis, IcdQuery> = {
  codingSystem: "ICD-11",
  maxScore: 1,
  *queries(item) {
    const term = stripQualifiers(item.name_translated) || stripQualifiers(item.name);
    yield { term, flexible: false };
    yield { term, flexible: true };
  },
  accept: (candidate) => candidate.score > ICD_MIN_SCORE,
  subject: (item) => ({ reference: item.reference, name: item.name, translatedName: item.name_translated }),
};

const log = createChildLogger({ component: "diagnosis" });

export function createDiagnosisEnricher(
  matcher: TerminologyMatcher<ExtractedDiagnosis, IcdQuery> | undefined
): TerminologyEnricher<ExtractedDiagnosis, Diagnosis> {
  if (!matcher) {
    log.warn("ICD-11 credentials are not configured, diagnoses are stored without codes");
  }
  return new TerminologyEnricher("icd_diagnosis_lookup", async (item): Promise<Diagnosis> => {
    const match = matcher ? await matcher.match(item) : undefined;
    return { ...item, icd11_code: match?.id ?? "", icd11_title: match?.label ?? "" };
  });
}

export const diagnosisWorkflow: WorkflowDefinition = {
  identifier: "DiagnosisExtractionWorkflow",
  description: "Diagnoses with ICD-11 codes (WHO ICD API).",
  domain: true,
  create(name, context) {
    const { model, store, settings, terminology } = context;
    const matcher = terminology.icd ? new TerminologyMatcher(terminology.icd, diagnosisMatchStrategy, model) : undefined;
    const pipeline = buildExtractionPipeline<ExtractedDiagnosis, Diagnosis>({
      extractor: new InformationExtractor(model, DIAGNOSIS_PROMPT, responseFormat(ExtractedDiagnosisSchema)),
      processor: createDiagnosisEnricher(matcher),
      storage: new DataStorage<Diagnosis>({
        store,
        table: name,
        columns: columnsOf(DiagnosisSchema),
        outputDir: settings.outputDir,
        splitPatient: settings.splitPatient,
      }),
    });
    return new ExtractionWorkflow(name, pipeline);
  },
};
