import { z } from "zod";
import { DataStorage, InformationExtractor, NoProcessing } from "../nodes";
import { buildExtractionPipeline } from "../pipeline";
import { columnsOf, responseFormat } from "../schema";
import { ConfigurationError } from "../types";
import { ExtractionWorkflow, type WorkflowDefinition } from "./base";

export const ExtractedStatementSchema = z
  .object({
    filter: z.boolean().describe("Whether the statement is true for the patient."),
    information: z.string().describe("The information from the letter that supports the decision."),
    reference: z.string().describe("The exact text snippet the decision is based on."),
  })
  .strict();

export type ExtractedStatement = z.infer<typeof ExtractedStatementSchema>;

export const STATEMENT_PROMPT = `
Given the medical information of a patient in the form of a doctor's letter, label the patient according to the following statement.

Values to extract:
- filter: A boolean value indicating whether the statement is true (filter=true) or false (filter=false).
- information: The extracted information from the document that supports the filter decision.
- reference: The exact text snippet from the document that was used to make the decision.
`.trim();

export function statementPrompt(statement: string): string {
  return `${STATEMENT_PROMPT}\n\nStatement: ${statement.trim()}\n`;
}

/** Labels letters against a yes/no criterion. Needs a statement, so the aggregate leaves it out. */
export const statementWorkflow: WorkflowDefinition = {
  identifier: "BooleanStatementWorkflow",
  description: "Yes/no label for a free-form statement (requires --statement).",
  domain: false,
  create(name, context) {
    const statement = context.statement?.trim();
    if (!statement) {
      throw new ConfigurationError(`Workflow "${name}" needs a statement (--statement).`);
    }
    const { model, store, settings } = context;
    const pipeline = buildExtractionPipeline<ExtractedStatement, ExtractedStatement>({
      extractor: new InformationExtractor(model, statementPrompt(statement), responseFormat(ExtractedStatementSchema)),
      processor: new NoProcessing<ExtractedStatement>(),
      storage: new DataStorage<ExtractedStatement>({
        store,
        table: name,
        columns: columnsOf(ExtractedStatementSchema),
        outputDir: settings.outputDir,
        splitPatient: settings.splitPatient,
      }),
    });
    return new ExtractionWorkflow(name, pipeline);
  },
};
