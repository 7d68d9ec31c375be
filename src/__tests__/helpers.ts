import fs from "fs/promises";
import os from "os";
import path from "path";
import { AxiosError } from "axios";
import type { AxiosAdapter, AxiosInstance, InternalAxiosRequestConfig } from "axios";
import { loadSettings } from "../config";
import { createHttpClient } from "../http_client";
import { parseStructured, type ModelClient } from "../llm";
import { WorkflowRegistry } from "../registry";
import type { StructuredSchema } from "../schema";
import { CsvTableStore } from "../storage";
import type { RxNavSource, TerminologyClients } from "../terminology";
import type { WorkflowContext } from "../workflows/base";

export interface ModelCall {
  systemPrompt: string;
  userPrompt: string;
}

/** In-process model: answers are produced by `respond` and validated like real model output. */
export class StubModel implements ModelClient {
  public readonly calls: ModelCall[] = [];
  private readonly respond: (call: ModelCall) => unknown;

  public constructor(respond: (call: ModelCall) => unknown) {
    this.respond = respond;
  }

  public async invoke<T>(systemPrompt: string, userPrompt: string, schema: StructuredSchema<T>): Promise<T> {
    const call = { systemPrompt, userPrompt };
    this.calls.push(call);
    return parseStructured(JSON.stringify(this.respond(call)), schema);
  }
}

export function failingModel(): StubModel {
  return new StubModel(() => {
    throw new Error("model must not be called");
  });
}

export type FakeHandler = (request: InternalAxiosRequestConfig) => unknown;

/** Axios instance whose requests never leave the process; `handler` returns the body or throws. */
export function fakeHttpClient(handler: FakeHandler): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const data = handler(config);
    return { data, status: 200, statusText: "OK", headers: {}, config };
  };
  return { http: createHttpClient({ baseURL: "http://terminology.test/", adapter }), requests };
}

export function httpFailure(config: InternalAxiosRequestConfig, status: number): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, {
    data: {},
    status,
    statusText: "Error",
    headers: {},
    config,
  });
}

export const unusedRxNav: RxNavSource = {
  service: "rxnav",
  search: async () => {
    throw new Error("rxnav must not be called");
  },
  codes: async () => {
    throw new Error("rxnav must not be called");
  },
};

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "letter-miner-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface TestContextOptions {
  outputDir: string;
  model: ModelClient;
  terminology?: Partial<TerminologyClients>;
  registry?: WorkflowRegistry;
  statement?: string;
  splitPatient?: boolean;
}

export function testContext(options: TestContextOptions): WorkflowContext {
  return {
    settings: loadSettings(
      { outputDir: options.outputDir, splitPatient: options.splitPatient ?? false },
      { OPENAI_API_KEY: "test-secret" }
    ),
    model: options.model,
    store: new CsvTableStore(),
    terminology: {
      rxnav: options.terminology?.rxnav ?? unusedRxNav,
      icd: options.terminology?.icd,
      snowstorm: options.terminology?.snowstorm,
    },
    registry: options.registry ?? new WorkflowRegistry(),
    statement: options.statement,
  };
}

export async function readTable(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}
