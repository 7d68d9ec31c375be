import { createChildLogger } from "./logger";
import { ConfigurationError, PipelineError } from "./types";
import type { ExtractionState, Letter, LetterState } from "./types";

export type NodeKind = "extractor" | "processor" | "storage";

/**
 * One step of a pipeline. A node reads the merged state and returns only the
 * fields it sets; the engine merges that update on top of the previous state.
 */
export interface PipelineNode<S> {
  readonly name: string;
  readonly kind: NodeKind;
  run(state: Readonly<S>): Promise<Partial<S>>;
}

const log = createChildLogger({ component: "pipeline" });

export class Pipeline<S extends LetterState> {
  private readonly nodes: ReadonlyArray<PipelineNode<S>>;

  public constructor(nodes: ReadonlyArray<PipelineNode<S>>) {
    this.nodes = nodes;
  }

  public get nodeNames(): string[] {
    return this.nodes.map((node) => node.name);
  }

  /**
   * Runs every node once, in order. The first failure aborts the run and no
   * partial state is returned.
   */
  public async run(initial: S): Promise<S> {
    let state: S = { ...initial };
    for (const node of this.nodes) {
      log.debug({ node: node.name, patientId: state.patientId }, "running node");
      let update: Partial<S>;
      try {
        update = await node.run(state);
      } catch (err) {
        throw new PipelineError(node.name, err);
      }
      state = { ...state, ...update };
    }
    return state;
  }
}

export function buildPipeline<S extends LetterState>(nodes: ReadonlyArray<PipelineNode<S>>): Pipeline<S> {
  if (!nodes.length) {
    throw new ConfigurationError("A pipeline needs at least one node.");
  }
  return new Pipeline(nodes);
}

export interface ExtractionStages<E, P> {
  extractor: PipelineNode<ExtractionState<E, P>>;
  processor: PipelineNode<ExtractionState<E, P>>;
  storage: PipelineNode<ExtractionState<E, P>>;
}

/** Linear extract, process, store chain used by every entity-domain workflow. */
export function buildExtractionPipeline<E, P>(stages: ExtractionStages<E, P>): Pipeline<ExtractionState<E, P>> {
  const expected: Array<[keyof ExtractionStages<E, P>, NodeKind]> = [
    ["extractor", "extractor"],
    ["processor", "processor"],
    ["storage", "storage"],
  ];
  for (const [slot, kind] of expected) {
    if (stages[slot].kind !== kind) {
      throw new ConfigurationError(`Node "${stages[slot].name}" cannot be used as the ${slot} stage.`, {
        node: stages[slot].name,
        kind: stages[slot].kind,
      });
    }
  }
  return buildPipeline([stages.extractor, stages.processor, stages.storage]);
}

export function initialExtractionState<E, P>(letter: Letter): ExtractionState<E, P> {
  return {
    patientId: letter.patientId,
    letter: letter.text,
    extractedItems: [],
    processedItems: [],
    outputPath: "",
  };
}

export interface Branch<R> {
  readonly name: string;
  run(letter: Letter): Promise<R>;
}

export type BranchOutcome<R> =
  | { name: string; status: "fulfilled"; state: R }
  | { name: string; status: "rejected"; error: Error };

/**
 * Independent chains started from the same letter. Each branch builds its own
 * state, so nothing is shared between them and no result is merged back.
 * Branches run concurrently; a failing branch does not stop the others.
 */
export class FanOut<R> {
  private readonly branches: ReadonlyArray<Branch<R>>;

  public constructor(branches: ReadonlyArray<Branch<R>>) {
    this.branches = branches;
  }

  public get branchNames(): string[] {
    return this.branches.map((branch) => branch.name);
  }

  public async run(letter: Letter): Promise<Array<BranchOutcome<R>>> {
    const settled = await Promise.allSettled(this.branches.map((branch) => branch.run(letter)));
    return settled.map((result, idx): BranchOutcome<R> => {
      const name = this.branches[idx].name;
      if (result.status === "fulfilled") {
        return { name, status: "fulfilled", state: result.value };
      }
      const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      log.error({ branch: name, patientId: letter.patientId, err: error }, "branch failed");
      return { name, status: "rejected", error };
    });
  }
}

export function fanOut<R>(branches: ReadonlyArray<Branch<R>>): FanOut<R> {
  return new FanOut(branches);
}
