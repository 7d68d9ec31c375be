import type { ModelClient } from "./llm";
import { createChildLogger } from "./logger";
import type { PipelineNode } from "./pipeline";
import type { StructuredSchema } from "./schema";
import { resolveTablePath, type TableRow, type TableStore } from "./storage";
import type { ExtractionState } from "./types";

const log = createChildLogger({ component: "nodes" });

/**
 * Asks the model for every item of one domain in the letter. The result must
 * match the `{ data: [...] }` schema exactly (see `responseFormat`); anything
 * else aborts the run.
 */
export class InformationExtractor<E> implements PipelineNode<ExtractionState<E, unknown>> {
  public readonly name = "information_extractor";
  public readonly kind = "extractor";
  private readonly model: ModelClient;
  private readonly prompt: string;
  private readonly format: StructuredSchema<{ data: E[] }>;

  public constructor(model: ModelClient, prompt: string, format: StructuredSchema<{ data: E[] }>) {
    this.model = model;
    this.prompt = prompt;
    this.format = format;
  }

  public async run(state: Readonly<ExtractionState<E, unknown>>): Promise<{ extractedItems: E[] }> {
    const response = await this.model.invoke(this.prompt, state.letter, this.format);
    log.debug({ patientId: state.patientId, items: response.data.length }, "items extracted");
    return { extractedItems: response.data };
  }
}

/** Processing stage for domains without enrichment: extracted items are stored as they are. */
export class NoProcessing<E> implements PipelineNode<ExtractionState<E, unknown>> {
  public readonly name = "no_processing";
  public readonly kind = "processor";

  public async run(state: Readonly<ExtractionState<E, unknown>>): Promise<{ processedItems: E[] }> {
    return { processedItems: [...state.extractedItems] };
  }
}

/**
 * Enriches extracted items one at a time, in order. Per-item degradation is the
 * enrich function's job; whatever it throws aborts the run.
 */
export class TerminologyEnricher<E, P> implements PipelineNode<ExtractionState<E, P>> {
  public readonly name: string;
  public readonly kind = "processor";
  private readonly enrich: (item: E) => Promise<P>;

  public constructor(name: string, enrich: (item: E) => Promise<P>) {
    this.name = name;
    this.enrich = enrich;
  }

  public async run(state: Readonly<ExtractionState<E, P>>): Promise<{ processedItems: P[] }> {
    const processedItems: P[] = [];
    for (const item of state.extractedItems) {
      processedItems.push(await this.enrich(item));
    }
    return { processedItems };
  }
}

export interface DataStorageOptions {
  store: TableStore;
  table: string;
  columns: readonly string[];
  outputDir: string;
  splitPatient: boolean;
}

export const PATIENT_ID_COLUMN = "patient_id";

/**
 * Appends processed items to the domain table, one row per item, each stamped
 * with the patient id. A letter without items still leaves a header-only table.
 */
export class DataStorage<P extends object> implements PipelineNode<ExtractionState<unknown, P>> {
  public readonly name = "data_storage";
  public readonly kind = "storage";
  private readonly options: DataStorageOptions;
  private readonly columns: string[];

  public constructor(options: DataStorageOptions) {
    this.options = options;
    this.columns = options.columns.includes(PATIENT_ID_COLUMN)
      ? [...options.columns]
      : [...options.columns, PATIENT_ID_COLUMN];
  }

  public async run(state: Readonly<ExtractionState<unknown, P>>): Promise<{ outputPath: string }> {
    const outputPath = resolveTablePath({
      outputDir: this.options.outputDir,
      table: this.options.table,
      patientId: state.patientId,
      splitPatient: this.options.splitPatient,
    });
    const rows = state.processedItems.map((item) => toRow(item, state.patientId));
    await this.options.store.append(outputPath, this.columns, rows);
    return { outputPath };
  }
}

function toRow(item: object, patientId: string): TableRow {
  return { ...Object.fromEntries(Object.entries(item)), [PATIENT_ID_COLUMN]: patientId };
}
