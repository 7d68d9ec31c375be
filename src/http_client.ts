import axios, { AxiosError } from "axios";
import type { AxiosInstance, CreateAxiosDefaults } from "axios";
import type { z } from "zod";
import { DEFAULT_TERMINOLOGY_TIMEOUT_MS } from "./config";
import { createChildLogger } from "./logger";
import { TerminologyRequestError } from "./types";

const log = createChildLogger({ component: "http" });

/**
 * Axios instance with a bounded timeout. Every terminology client goes through one.
 */
export function createHttpClient(config: CreateAxiosDefaults = {}): AxiosInstance {
  const client = axios.create({
    timeout: DEFAULT_TERMINOLOGY_TIMEOUT_MS,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    log.debug(
      { method: requestConfig.method, url: requestConfig.url, params: requestConfig.params },
      "HTTP request"
    );
    return requestConfig;
  });

  return client;
}

/** Maps transport, timeout and non-2xx failures onto the degradable terminology error. */
export function toTerminologyError(service: string, err: unknown): TerminologyRequestError {
  if (err instanceof TerminologyRequestError) return err;
  if (err instanceof AxiosError) {
    return new TerminologyRequestError(service, err.message, {
      status: err.response?.status,
      code: err.code,
      url: err.config?.url,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TerminologyRequestError(service, message);
}

/** Validates a response body. A body of the wrong shape counts as a failed request. */
export function parseBody<T>(service: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new TerminologyRequestError(service, "unexpected response body", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}
