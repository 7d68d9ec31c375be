#!/usr/bin/env node
import { parseArgs } from "util";
import { loadSettings, requireModelSettings, type ModelSettings, type Settings } from "./config";
import { loadLetters } from "./letters";
import { OpenAIModelClient, type ModelClient } from "./llm";
import { createDefaultRegistry, type WorkflowRegistry } from "./registry";
import { CsvTableStore, type TableStore } from "./storage";
import { createTerminologyClients, type TerminologyClients } from "./terminology";
import { MinerError, type LetterState } from "./types";
import { failedBranches, isAggregateState } from "./workflows/aggregate";
import { runMany, type LetterOutcome, type Workflow } from "./workflows/base";

const USAGE = `Usage:
  letter-miner list
  letter-miner extract <workflow> <letter file or directory> [options]

Options:
  --model <name>              Model name (OPENAI_MODEL)
  --api-key <key>             Model API key (OPENAI_API_KEY)
  --base-url <url>            Model endpoint (OPENAI_BASE_URL)
  --output-dir <dir>          Where tables are written (OUTPUT_DIR)
  --split-patient             One directory per patient
  --snomed-base-url <url>     Snowstorm server (SNOWSTORM_BASE_URL)
  --icd-client-id <id>        WHO ICD API client id (ICD_CLIENT_ID)
  --icd-client-secret <key>   WHO ICD API client secret (ICD_CLIENT_SECRET)
  --statement <text>          Statement for boolean_statement_workflow
  -h, --help                  Show this help`;

const OPTIONS = {
  model: { type: "string" },
  "api-key": { type: "string" },
  "base-url": { type: "string" },
  "output-dir": { type: "string" },
  "split-patient": { type: "boolean" },
  "snomed-base-url": { type: "string" },
  "icd-client-id": { type: "string" },
  "icd-client-secret": { type: "string" },
  statement: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

/** Collaborators the CLI builds by default; tests swap in stand-ins. */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  registry?: WorkflowRegistry;
  store?: TableStore;
  createModel?: (settings: Required<ModelSettings>) => ModelClient;
  createTerminology?: (settings: Readonly<Settings>) => TerminologyClients;
}

function createOpenAIModel(settings: Required<ModelSettings>): ModelClient {
  return new OpenAIModelClient({
    apiKey: settings.apiKey,
    model: settings.model,
    baseUrl: settings.baseUrl || undefined,
  });
}

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
}

export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 1;
  }
  const { values, positionals } = parsed;
  const [command, workflowName, inputPath] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const registry = deps.registry ?? createDefaultRegistry();

  if (command === "list") {
    for (const [name, definition] of registry.entries()) {
      console.log(`${name}\t${definition.description}`);
    }
    return 0;
  }

  if (command !== "extract" || !workflowName || !inputPath) {
    console.error(USAGE);
    return 1;
  }

  const definition = registry.get(workflowName);
  if (!definition) {
    console.error(`Unknown workflow "${workflowName}". Available: ${registry.keys().join(", ")}`);
    return 1;
  }

  let workflow: Workflow;
  let letters: Awaited<ReturnType<typeof loadLetters>>;
  try {
    const settings = loadSettings(
      {
        model: { model: values.model, apiKey: values["api-key"], baseUrl: values["base-url"] },
        outputDir: values["output-dir"],
        splitPatient: values["split-patient"],
        snowstormBaseUrl: values["snomed-base-url"],
        icdClientId: values["icd-client-id"],
        icdClientSecret: values["icd-client-secret"],
      },
      deps.env ?? process.env
    );
    const model = (deps.createModel ?? createOpenAIModel)(requireModelSettings(settings));
    letters = await loadLetters(inputPath);
    workflow = definition.create(workflowName, {
      settings,
      model,
      store: deps.store ?? new CsvTableStore(),
      terminology: (deps.createTerminology ?? createTerminologyClients)(settings),
      registry,
      statement: values.statement,
    });
  } catch (err) {
    if (!(err instanceof MinerError)) throw err;
    console.error(`Initialization failed: ${err.message}`);
    return 1;
  }

  console.log(`Running ${workflow.name} on ${letters.length} letter(s)...`);
  const outcomes = await runMany(workflow, letters);
  let failures = 0;
  for (const outcome of outcomes) {
    if (reportOutcome(outcome)) failures++;
  }

  console.log(`Done. ${outcomes.length - failures} of ${outcomes.length} letter(s) completed.`);
  return failures ? 1 : 0;
}

/** Prints one letter's result and returns true when anything in it failed. */
function reportOutcome(outcome: LetterOutcome<LetterState>): boolean {
  if (outcome.status === "rejected") {
    console.error(`  -> ${outcome.patientId}: failed (${outcome.error.message})`);
    return true;
  }

  const state = outcome.result;
  if (!isAggregateState(state)) {
    console.log(`  -> ${outcome.patientId}: ${state.outputPath}`);
    return false;
  }

  for (const branch of state.outcomes) {
    if (branch.status === "fulfilled") {
      console.log(`  -> ${outcome.patientId} [${branch.name}]: ${branch.state.outputPath}`);
    } else {
      console.error(`  -> ${outcome.patientId} [${branch.name}]: failed (${branch.error.message})`);
    }
  }
  return failedBranches(state).length > 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
