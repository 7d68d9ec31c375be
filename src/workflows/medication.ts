import { z } from "zod";
import { createChildLogger } from "../logger";
import { TerminologyMatcher, type MatchStrategy } from "../matcher";
import { DataStorage, InformationExtractor, TerminologyEnricher } from "../nodes";
import { buildExtractionPipeline } from "../pipeline";
import { columnsOf, responseFormat } from "../schema";
import type { RxNavQuery, RxNavSource } from "../terminology";
import { mergeTerms, stripQualifiers } from "../text";
import { TerminologyRequestError } from "../types";
import { ExtractionWorkflow, type WorkflowDefinition } from "./base";

export const ExtractedMedicationSchema = z
  .object({
    reference: z.string().describe("The medication as it appears in the text with all details (dose, unit, frequency)."),
    name: z.string().describe("The name of the medication (brand name or generic name)."),
    name_translated: z
      .string()
      .describe(
        'The medication name in English as "Brand or medication name (active ingredient)", spelling corrected, without dose or other details.'
      ),
    active_ingredient: z.string().describe("The active ingredient of the medication."),
    dose: z.number().describe("The numeric value of the dose; -1 if no dose is given."),
    unit: z.string().describe("The unit of the dose (e.g. mg, ml); empty string if not given."),
    route: z.string().describe("The route of administration (e.g. oral, intravenous); empty string if not given."),
    frequency: z.string().describe("The frequency as written (e.g. 1-0-1-0, as needed); empty string if not given."),
    frequency_code: z.string().describe("The standardized frequency code, see the list of codes."),
  })
  .strict();

export const MedicationSchema = ExtractedMedicationSchema.extend({
  rxcui: z.string(),
  atc_codes: z.array(z.string()),
}).strict();

export type ExtractedMedication = z.infer<typeof ExtractedMedicationSchema>;
export type Medication = z.infer<typeof MedicationSchema>;

export const MEDICATION_PROMPT = `
Given a doctor's letter containing none or multiple medications, extract all medications and their relevant information.

Values to extract:
- reference: The medication as it appears in the text with all details (e.g. dosage, unit, frequency).
- name: The name of the medication (brand name or generic name).
- name_translated: The name of the medication translated to English without any additional details, formatted as "Name (active ingredient)".
- active_ingredient: The active ingredient of the medication.
- dose: The numeric value of the dose. If no dose is given, return -1.
- unit: The unit of the dose (e.g. mg, ml). If no unit is given, return an empty string.
- route: The route of administration (e.g. oral, intravenous). If no route is given, return an empty string.
- frequency: The frequency of the medication (e.g. 1-0-1-0, as needed). If no frequency is given, return an empty string.
- frequency_code: The frequency code of the medication. Use the following codes:
    * Q<hours>H: Every <hours> hours (e.g. Q8H)
    * Q<days>D: Every <days> days (e.g. Q1D)
    * Q<weeks>W: Every <weeks> weeks (e.g. Q1W)
    * BID: Twice a day (e.g. 1-0-1-0)
    * TID: Three times a day (e.g. 1-1-1-0)
    * QID: Four times a day (e.g. 1-1-1-1)
    * QD: Once a day, when it does not fit AM or PM (e.g. 0-1-0)
    * AM: In the morning (1-0-0-0)
    * PM: In the evening (0-0-1-0)
    * PRN: As needed
    * NaF: Not a frequency (e.g. medication that is not taken regularly)
`.trim();

/** Exact lookup on the bare name, then an approximate one on name plus active ingredient. Only rank 1 counts. */
export const medicationMatchStrategy: MatchStrategy<ExtractedMedication, RxNavQuery> = {
  codingSystem: "RxNorm",
  maxScore: 1,
  *queries(item) {
    yield { kind: "exact", term: stripQualifiers(item.name_translated) || stripQualifiers(item.name) };
    yield { kind: "approximate", term: mergeTerms(item.name_translated, item.active_ingredient) };
  },
  accept: (candidate) => candidate.score >= 1,
  subject: (item) => ({ reference: item.reference, name: item.name, translatedName: item.name_translated }),
};

const log = createChildLogger({ component: "medication" });

export function createMedicationEnricher(
  rxnav: RxNavSource,
  matcher: TerminologyMatcher<ExtractedMedication, RxNavQuery>
): TerminologyEnricher<ExtractedMedication, Medication> {
  return new TerminologyEnricher("rxnav_lookup", async (item): Promise<Medication> => {
    const match = await matcher.match(item);
    if (!match) {
      return { ...item, rxcui: "", atc_codes: [] };
    }

    let atcCodes: string[] = [];
    try {
      atcCodes = await rxnav.codes(match.id, "ATC");
    } catch (err) {
      if (!(err instanceof TerminologyRequestError)) throw err;
      log.warn({ rxcui: match.id, err: err.message }, "ATC lookup failed, leaving codes empty");
    }
    return { ...item, rxcui: match.id, atc_codes: atcCodes };
  });
}

export const medicationWorkflow: WorkflowDefinition = {
  identifier: "MedicationExtractionWorkflow",
  description: "Medications with RxNorm identifiers and ATC codes (RxNav).",
  domain: true,
  create(name, context) {
    const { model, store, settings, terminology } = context;
    const matcher = new TerminologyMatcher(terminology.rxnav, medicationMatchStrategy, model);
    const pipeline = buildExtractionPipeline<ExtractedMedication, Medication>({
      extractor: new InformationExtractor(model, MEDICATION_PROMPT, responseFormat(ExtractedMedicationSchema)),
      processor: createMedicationEnricher(terminology.rxnav, matcher),
      storage: new DataStorage<Medication>({
        store,
        table: name,
        columns: columnsOf(MedicationSchema),
        outputDir: settings.outputDir,
        splitPatient: settings.splitPatient,
      }),
    });
    return new ExtractionWorkflow(name, pipeline);
  },
};
