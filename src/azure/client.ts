import { z } from "zod";
import type { AzureDevOpsConfig } from "../config.js";
import { UpstreamConnectionError, UpstreamResponseError } from "../errors.js";
import type { UpstreamResponse, WorkItemPatchOperation } from "./types.js";

export type FetchLike = typeof fetch;

interface RequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
}

const PROJECTS_API_VERSION = "7.1-preview";
const WORK_ITEMS_API_VERSION = "7.1-preview";
const ENTITLEMENTS_API_VERSION = "6.0-preview.3";

const userEntitlementSchema = z.object({
  name: z.string().nullish(),
  user: z
    .object({
      displayName: z.string().nullish(),
      principalName: z.string().nullish(),
      mailAddress: z.string().nullish(),
    })
    .nullish(),
});

const userEntitlementListSchema = z.object({
  members: z.array(userEntitlementSchema).nullish(),
  value: z.array(userEntitlementSchema).nullish(),
});

export function buildAuthHeader(personalAccessToken: string): string {
  return `Basic ${Buffer.from(`:${personalAccessToken}`, "utf-8").toString("base64")}`;
}

/** Parses a response body as JSON, falling back to `{ raw_text }`. */
export function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return { raw_text: text };
  }
}

export class AzureDevOpsClient {
  private readonly config: AzureDevOpsConfig;
  private readonly fetchFn: FetchLike;
  private readonly authorization: string;

  constructor(config: AzureDevOpsConfig, fetchFn: FetchLike = fetch) {
    this.config = config;
    this.fetchFn = fetchFn;
    this.authorization = buildAuthHeader(config.personalAccessToken);
  }

  private get orgUrl(): string {
    return `${this.config.apiBaseUrl}/${this.config.organization}`;
  }

  private async request(url: string, init: RequestOptions = {}): Promise<UpstreamResponse> {
    let status: number;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method: init.method ?? "GET",
        body: init.body,
        headers: {
          Authorization: this.authorization,
          Accept: "application/json",
          ...init.headers,
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[azure] ${init.method ?? "GET"} ${url} failed: ${reason}`);
      throw new UpstreamConnectionError(reason);
    }

    return { status, ok: status < 400, body: parseBody(text) };
  }

  async listProjects(): Promise<UpstreamResponse> {
    return this.request(`${this.orgUrl}/_apis/projects?api-version=${PROJECTS_API_VERSION}`);
  }

  /**
   * Resolves an account identifier by display name. Matching is exact after
   * trimming and lower-casing; the principal name wins over the mail address.
   */
  async findUserPrincipalName(displayName: string): Promise<string | null> {
    const url =
      `${this.config.entitlementsBaseUrl}/${this.config.organization}/_apis/userentitlements` +
      `?api-version=${ENTITLEMENTS_API_VERSION}&$filter=${encodeURIComponent(`name eq '${displayName}'`)}`;

    const res = await this.request(url);
    if (!res.ok) {
      console.error(`[azure] User entitlement lookup failed with ${res.status}`);
      throw new UpstreamResponseError("Azure DevOps API error looking up tester", res.status, res.body);
    }

    const parsed = userEntitlementListSchema.safeParse(res.body);
    const candidates = parsed.success ? parsed.data.members || parsed.data.value || [] : [];
    const wanted = displayName.trim().toLowerCase();

    for (const candidate of candidates) {
      const name = candidate.user?.displayName || candidate.name || "";
      if (name.trim().toLowerCase() !== wanted) continue;

      const principal = candidate.user?.principalName || candidate.user?.mailAddress;
      if (principal) return principal;
    }

    return null;
  }

  async createWorkItem(
    project: string,
    workItemType: string,
    operations: WorkItemPatchOperation[]
  ): Promise<UpstreamResponse> {
    const url =
      `${this.orgUrl}/${encodeURIComponent(project)}/_apis/wit/workitems/` +
      `$${encodeURIComponent(workItemType)}?api-version=${WORK_ITEMS_API_VERSION}`;

    return this.request(url, {
      method: "POST",
      headers: { "Content-Type": "application/json-patch+json" },
      body: JSON.stringify(operations),
    });
  }

  /** API url of a work item, as used in relation links. */
  workItemUrl(project: string, workItemId: number): string {
    return `${this.orgUrl}/${project}/_apis/wit/workItems/${workItemId}`;
  }
}
