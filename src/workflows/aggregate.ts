import { fanOut, type BranchOutcome, type FanOut } from "../pipeline";
import type { Letter, LetterState } from "../types";
import type { Workflow, WorkflowContext, WorkflowDefinition } from "./base";

export interface AggregateState extends LetterState {
  outcomes: Array<BranchOutcome<LetterState>>;
}

/** Every entity-domain workflow against the same letter, each into its own table. */
export class AggregateWorkflow implements Workflow<AggregateState> {
  public readonly name: string;
  private readonly branches: FanOut<LetterState>;

  public constructor(name: string, workflows: ReadonlyArray<Workflow>) {
    this.name = name;
    this.branches = fanOut(workflows);
  }

  public get workflowNames(): string[] {
    return this.branches.branchNames;
  }

  public async run(letter: Letter): Promise<AggregateState> {
    const outcomes = await this.branches.run(letter);
    return { patientId: letter.patientId, letter: letter.text, outputPath: "", outcomes };
  }
}

export function isAggregateState(state: LetterState): state is AggregateState {
  return "outcomes" in state && Array.isArray(state.outcomes);
}

export function failedBranches(state: AggregateState): Array<{ name: string; error: Error }> {
  const failed: Array<{ name: string; error: Error }> = [];
  for (const outcome of state.outcomes) {
    if (outcome.status === "rejected") failed.push({ name: outcome.name, error: outcome.error });
  }
  return failed;
}

function domainWorkflows(context: WorkflowContext): Workflow[] {
  const workflows: Workflow[] = [];
  for (const [name, definition] of context.registry.entries()) {
    if (definition.domain) workflows.push(definition.create(name, context));
  }
  return workflows;
}

export const aggregateWorkflow: WorkflowDefinition = {
  identifier: "AllDomainsWorkflow",
  description: "Runs every entity-domain workflow against each letter.",
  domain: false,
  create(name, context) {
    return new AggregateWorkflow(name, domainWorkflows(context));
  },
};
