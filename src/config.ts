import { ConfigurationError } from "./errors.js";

export const DEFAULT_TESTER_NAME = "Antony Daniel Gutierrez Salgado";

export interface AzureDevOpsConfig {
  readonly organization: string;
  readonly personalAccessToken: string;
  /** Display name of the account stamped into `Custom.Tester` on every bug */
  readonly testerDisplayName: string;
  readonly timeoutMs: number;
  readonly apiBaseUrl: string;
  readonly entitlementsBaseUrl: string;
}

export interface ServerConfig {
  readonly port: number;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string, fallback = ""): string {
  return env[key] || fallback;
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`Invalid value for ${key}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Reads the Azure DevOps settings once. Both the organization and the
 * personal access token are required; every missing key is reported together.
 */
export function loadAzureConfig(env: Env = process.env): AzureDevOpsConfig {
  const missing = ["AZURE_DEVOPS_ORG", "AZURE_DEVOPS_PAT"].filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Server is missing required configuration (${missing.join(", ")}).`,
      missing
    );
  }

  return Object.freeze({
    organization: optional(env, "AZURE_DEVOPS_ORG"),
    personalAccessToken: optional(env, "AZURE_DEVOPS_PAT"),
    testerDisplayName: optional(env, "AZURE_DEVOPS_TESTER_NAME", DEFAULT_TESTER_NAME),
    timeoutMs: positiveInt(env, "AZURE_DEVOPS_TIMEOUT_MS", 30_000),
    apiBaseUrl: "https://dev.azure.com",
    entitlementsBaseUrl: "https://vsaex.dev.azure.com",
  });
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return Object.freeze({ port: positiveInt(env, "PORT", 8000) });
}
