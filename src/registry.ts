import { deriveName } from "./name";
import { aggregateWorkflow } from "./workflows/aggregate";
import type { WorkflowDefinition } from "./workflows/base";
import { diagnosisWorkflow } from "./workflows/diagnosis";
import { medicationWorkflow } from "./workflows/medication";
import { procedureWorkflow } from "./workflows/procedure";
import { statementWorkflow } from "./workflows/statement";

/**
 * Name to workflow definition. Registering a name that already exists
 * replaces the earlier definition.
 */
export class WorkflowRegistry {
  private readonly definitions = new Map<string, WorkflowDefinition>();

  public register(name: string, definition: WorkflowDefinition): void {
    this.definitions.set(name, definition);
  }

  public get(name: string): WorkflowDefinition | undefined {
    return this.definitions.get(name);
  }

  public has(name: string): boolean {
    return this.definitions.has(name);
  }

  public unregister(name: string): boolean {
    return this.definitions.delete(name);
  }

  public clear(): void {
    this.definitions.clear();
  }

  public keys(): string[] {
    return [...this.definitions.keys()];
  }

  public entries(): Array<[string, WorkflowDefinition]> {
    return [...this.definitions.entries()];
  }

  public get size(): number {
    return this.definitions.size;
  }
}

/** Registers under the snake_case form of the identifier and returns that name. */
export function registerWorkflow(registry: WorkflowRegistry, definition: WorkflowDefinition): string {
  const name = deriveName(definition.identifier);
  registry.register(name, definition);
  return name;
}

export const BUILTIN_WORKFLOWS: readonly WorkflowDefinition[] = [
  medicationWorkflow,
  diagnosisWorkflow,
  procedureWorkflow,
  statementWorkflow,
  aggregateWorkflow,
];

export function createDefaultRegistry(): WorkflowRegistry {
  const registry = new WorkflowRegistry();
  for (const definition of BUILTIN_WORKFLOWS) {
    registerWorkflow(registry, definition);
  }
  return registry;
}
