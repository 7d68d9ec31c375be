import type { Settings } from "../config";
import type { ModelClient } from "../llm";
import { createChildLogger } from "../logger";
import { initialExtractionState, type Pipeline } from "../pipeline";
import type { WorkflowRegistry } from "../registry";
import type { TableStore } from "../storage";
import type { TerminologyClients } from "../terminology";
import type { ExtractionState, Letter, LetterState } from "../types";

export interface Workflow<R extends LetterState = LetterState> {
  readonly name: string;
  run(letter: Letter): Promise<R>;
}

/** Everything a definition may wire into the nodes it builds. */
export interface WorkflowContext {
  settings: Readonly<Settings>;
  model: ModelClient;
  store: TableStore;
  terminology: TerminologyClients;
  registry: WorkflowRegistry;
  /** Criterion for the boolean statement workflow. */
  statement?: string;
}

/**
 * A registered workflow: how to build it, plus whether it is an entity-domain
 * workflow the aggregate should fan out to.
 */
export interface WorkflowDefinition {
  readonly identifier: string;
  readonly description: string;
  readonly domain: boolean;
  create(name: string, context: WorkflowContext): Workflow;
}

const log = createChildLogger({ component: "workflow" });

export class ExtractionWorkflow<E, P> implements Workflow<ExtractionState<E, P>> {
  public readonly name: string;
  private readonly pipeline: Pipeline<ExtractionState<E, P>>;

  public constructor(name: string, pipeline: Pipeline<ExtractionState<E, P>>) {
    this.name = name;
    this.pipeline = pipeline;
  }

  public async run(letter: Letter): Promise<ExtractionState<E, P>> {
    const state = await this.pipeline.run(initialExtractionState<E, P>(letter));
    log.info(
      {
        workflow: this.name,
        patientId: letter.patientId,
        extracted: state.extractedItems.length,
        outputPath: state.outputPath,
      },
      "letter processed"
    );
    return state;
  }
}

export type LetterOutcome<R> =
  | { patientId: string; status: "fulfilled"; result: R }
  | { patientId: string; status: "rejected"; error: Error };

/**
 * Runs letters one after another. A letter that aborts is reported in its
 * outcome and does not stop the remaining letters.
 */
export async function runMany<R extends LetterState>(
  workflow: Workflow<R>,
  letters: readonly Letter[]
): Promise<Array<LetterOutcome<R>>> {
  const outcomes: Array<LetterOutcome<R>> = [];
  for (const letter of letters) {
    try {
      outcomes.push({ patientId: letter.patientId, status: "fulfilled", result: await workflow.run(letter) });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error({ workflow: workflow.name, patientId: letter.patientId, err: error }, "letter aborted");
      outcomes.push({ patientId: letter.patientId, status: "rejected", error });
    }
  }
  return outcomes;
}
