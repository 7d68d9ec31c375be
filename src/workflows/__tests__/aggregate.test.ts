import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  StubModel,
  fakeHttpClient,
  makeTempDir,
  readTable,
  removeDir,
  testContext,
  type ModelCall,
} from "../../__tests__/helpers";
import type { TerminologySource } from "../../matcher";
import { WorkflowRegistry, registerWorkflow } from "../../registry";
import { RxNavClient, type IcdQuery } from "../../terminology";
import { TerminologyAuthError, type Candidate } from "../../types";
import { AggregateWorkflow, aggregateWorkflow, failedBranches, isAggregateState } from "../aggregate";
import { DIAGNOSIS_PROMPT, diagnosisWorkflow } from "../diagnosis";
import { MEDICATION_PROMPT, medicationWorkflow } from "../medication";
import { statementWorkflow } from "../statement";

const medication = {
  reference: "ASS 100 1-0-0",
  name: "ASS",
  name_translated: "Aspirin (acetylsalicylic acid)",
  active_ingredient: "acetylsalicylic acid",
  dose: 100,
  unit: "mg",
  route: "oral",
  frequency: "1-0-0",
  frequency_code: "AM",
};

const diagnosis = {
  reference: "arterielle Hypertonie",
  name: "Arterielle Hypertonie",
  name_translated: "Essential hypertension",
  year: -1,
  month: -1,
  day: -1,
};

function answer(call: ModelCall): unknown {
  if (call.systemPrompt === MEDICATION_PROMPT) return { data: [medication] };
  if (call.systemPrompt === DIAGNOSIS_PROMPT) return { data: [diagnosis] };
  throw new Error(`unexpected prompt: ${call.systemPrompt.slice(0, 40)}`);
}

function icdSource(search: (query: IcdQuery) => Promise<Candidate[]>): TerminologySource<IcdQuery> {
  return { service: "icd11", search };
}

function rxnav(): RxNavClient {
  const { http } = fakeHttpClient((request) => {
    if (request.url === "rxcui.json") return { idGroup: { rxnormId: ["1191"] } };
    return { propConceptGroup: { propConcept: [{ propName: "ATC", propValue: "B01AC06" }] } };
  });
  return new RxNavClient(http);
}

function domainRegistry(): WorkflowRegistry {
  const registry = new WorkflowRegistry();
  registerWorkflow(registry, medicationWorkflow);
  registerWorkflow(registry, diagnosisWorkflow);
  registerWorkflow(registry, statementWorkflow);
  registerWorkflow(registry, aggregateWorkflow);
  return registry;
}

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

describe("all_domains_workflow", () => {
  it("builds one branch per domain workflow and skips the others", () => {
    const workflow = aggregateWorkflow.create(
      "all_domains_workflow",
      testContext({ outputDir: dir, model: new StubModel(answer), registry: domainRegistry() })
    );
    expect(workflow).toBeInstanceOf(AggregateWorkflow);
    if (!(workflow instanceof AggregateWorkflow)) return;
    expect(workflow.workflowNames).toEqual(["medication_extraction_workflow", "diagnosis_extraction_workflow"]);
  });

  it("writes each domain into its own table", async () => {
    const icd = icdSource(async () => [{ id: "BA00", score: 0.9, label: "Essential hypertension" }]);
    const context = testContext({
      outputDir: dir,
      model: new StubModel(answer),
      registry: domainRegistry(),
      terminology: { rxnav: rxnav(), icd },
    });

    const state = await aggregateWorkflow.create("all_domains_workflow", context).run({
      patientId: "p030",
      text: "ASS 100 1-0-0. Arterielle Hypertonie.",
    });

    expect(isAggregateState(state)).toBe(true);
    if (!isAggregateState(state)) return;
    expect(state.outcomes.map((outcome) => outcome.status)).toEqual(["fulfilled", "fulfilled"]);
    expect(failedBranches(state)).toEqual([]);

    expect(await readTable(path.join(dir, "medication_extraction_workflow.csv"))).toBe(
      "reference,name,name_translated,active_ingredient,dose,unit,route,frequency,frequency_code,rxcui,atc_codes,patient_id\n" +
        'ASS 100 1-0-0,ASS,Aspirin (acetylsalicylic acid),acetylsalicylic acid,100,mg,oral,1-0-0,AM,1191,"[""B01AC06""]",p030\n'
    );
    expect(await readTable(path.join(dir, "diagnosis_extraction_workflow.csv"))).toBe(
      "reference,name,name_translated,year,month,day,icd11_code,icd11_title,patient_id\n" +
        "arterielle Hypertonie,Arterielle Hypertonie,Essential hypertension,-1,-1,-1,BA00,Essential hypertension,p030\n"
    );
  });

  it("reports a failed domain and still completes the others", async () => {
    const icd = icdSource(async () => {
      throw new TerminologyAuthError("icd11", "invalid_client");
    });
    const context = testContext({
      outputDir: dir,
      model: new StubModel(answer),
      registry: domainRegistry(),
      terminology: { rxnav: rxnav(), icd },
    });

    const state = await aggregateWorkflow.create("all_domains_workflow", context).run({
      patientId: "p031",
      text: "ASS 100 1-0-0. Arterielle Hypertonie.",
    });

    if (!isAggregateState(state)) throw new Error("expected an aggregate state");
    const failed = failedBranches(state);
    expect(failed.map((branch) => branch.name)).toEqual(["diagnosis_extraction_workflow"]);
    expect(failed[0].error.message).toBe(
      'Node "icd_diagnosis_lookup" failed: icd11 authentication failed: invalid_client'
    );
    expect((await readTable(path.join(dir, "medication_extraction_workflow.csv"))).split("\n")).toHaveLength(3);
  });

  it("partitions tables per patient when asked", async () => {
    const icd = icdSource(async () => []);
    const context = testContext({
      outputDir: dir,
      model: new StubModel(answer),
      registry: domainRegistry(),
      terminology: { rxnav: rxnav(), icd },
      splitPatient: true,
    });

    await aggregateWorkflow.create("all_domains_workflow", context).run({ patientId: "p1", text: "ASS" });

    expect(await readTable(path.join(dir, "cDE", "diagnosis_extraction_workflow.csv"))).toBe(
      "reference,name,name_translated,year,month,day,icd11_code,icd11_title,patient_id\n" +
        "arterielle Hypertonie,Arterielle Hypertonie,Essential hypertension,-1,-1,-1,,,p1\n"
    );
  });
});
