import type { Settings } from "../config";
import { createHttpClient } from "../http_client";
import { IcdClient } from "./icd";
import { RxNavClient, type RxNavSource } from "./rxnav";
import { SnowstormClient } from "./snowstorm";
import type { TerminologySource } from "../matcher";
import type { IcdQuery } from "./icd";
import type { SnomedQuery } from "./snowstorm";

/**
 * The terminology collaborators of the enrichers. ICD-11 and Snowstorm are
 * optional: without credentials or a base URL their enrichers leave codes empty.
 */
export interface TerminologyClients {
  rxnav: RxNavSource;
  icd?: TerminologySource<IcdQuery>;
  snowstorm?: TerminologySource<SnomedQuery>;
}

export function createTerminologyClients(settings: Readonly<Settings>): TerminologyClients {
  const timeout = settings.terminologyTimeoutMs;

  const rxnav = new RxNavClient(createHttpClient({ baseURL: settings.rxnavBaseUrl, timeout }));

  const icd =
    settings.icdClientId && settings.icdClientSecret
      ? new IcdClient({
          http: createHttpClient({ baseURL: settings.icdBaseUrl, timeout }),
          tokenUrl: settings.icdTokenUrl,
          clientId: settings.icdClientId,
          clientSecret: settings.icdClientSecret,
          release: settings.icdRelease,
        })
      : undefined;

  const snowstorm = settings.snowstormBaseUrl
    ? new SnowstormClient(createHttpClient({ baseURL: settings.snowstormBaseUrl, timeout }), settings.snowstormBranch)
    : undefined;

  return { rxnav, icd, snowstorm };
}

export { IcdClient, RxNavClient, SnowstormClient };
export type { IcdQuery, RxNavSource, SnomedQuery };
export type { RxNavQuery } from "./rxnav";
