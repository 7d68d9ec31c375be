import path from "path";
import { describe, it, expect } from "vitest";
import { DEFAULT_TERMINOLOGY_TIMEOUT_MS, loadSettings, requireModelSettings } from "../config";
import { ConfigurationError } from "../types";

/* ============= Defaults ============= */

describe("loadSettings: defaults", () => {
  it("fills every setting from defaults when the environment is empty", () => {
    const settings = loadSettings({}, {});
    expect(settings.model).toEqual({ apiKey: undefined, model: "gpt-4o-mini", baseUrl: undefined });
    expect(settings.outputDir).toBe(path.resolve(process.cwd()));
    expect(settings.splitPatient).toBe(false);
    expect(settings.rxnavBaseUrl).toBe("https://rxnav.nlm.nih.gov/REST/");
    expect(settings.snowstormBaseUrl).toBe("");
    expect(settings.snowstormBranch).toBe("MAIN");
    expect(settings.icdRelease).toBe("2024-01");
    expect(settings.terminologyTimeoutMs).toBe(DEFAULT_TERMINOLOGY_TIMEOUT_MS);
  });

  it("returns a frozen value", () => {
    const settings = loadSettings({}, {});
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.model)).toBe(true);
  });
});

/* ============= Environment parsing ============= */

describe("loadSettings: environment", () => {
  it("parses numbers and booleans", () => {
    const settings = loadSettings({}, { TERMINOLOGY_TIMEOUT_MS: "5000", SPLIT_PATIENT: "yes" });
    expect(settings.terminologyTimeoutMs).toBe(5000);
    expect(settings.splitPatient).toBe(true);
  });

  it("falls back to the default on garbage numbers", () => {
    expect(loadSettings({}, { TERMINOLOGY_TIMEOUT_MS: "soon" }).terminologyTimeoutMs).toBe(30000);
    expect(loadSettings({}, { TERMINOLOGY_TIMEOUT_MS: "-1" }).terminologyTimeoutMs).toBe(30000);
  });
});

/* ============= Overrides ============= */

describe("loadSettings: overrides", () => {
  it("prefers a defined override over the environment", () => {
    const settings = loadSettings(
      { splitPatient: false, model: { model: "gpt-cli" } },
      { SPLIT_PATIENT: "true", OPENAI_MODEL: "gpt-env" }
    );
    expect(settings.splitPatient).toBe(false);
    expect(settings.model.model).toBe("gpt-cli");
  });

  it("keeps the environment value when an override is undefined", () => {
    const settings = loadSettings({ model: { model: undefined }, icdClientId: undefined }, {
      OPENAI_MODEL: "gpt-env",
      ICD_CLIENT_ID: "client",
    });
    expect(settings.model.model).toBe("gpt-env");
    expect(settings.icdClientId).toBe("client");
  });
});

/* ============= Model settings ============= */

describe("requireModelSettings", () => {
  it("throws ConfigurationError without an API key", () => {
    expect(() => requireModelSettings(loadSettings({}, {}))).toThrow(ConfigurationError);
    expect(() => requireModelSettings(loadSettings({}, {}))).toThrow("OPENAI_API_KEY is missing in environment.");
  });

  it("returns the model settings with an empty base URL by default", () => {
    const settings = loadSettings({}, { OPENAI_API_KEY: "test-secret" });
    expect(requireModelSettings(settings)).toEqual({ apiKey: "test-secret", model: "gpt-4o-mini", baseUrl: "" });
  });
});
