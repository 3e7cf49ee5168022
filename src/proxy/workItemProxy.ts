import type { AzureDevOpsClient } from "../azure/client.js";
import type { AzureDevOpsConfig } from "../config.js";
import { TesterNotFoundError, UpstreamResponseError } from "../errors.js";
import { buildBugPatch } from "../bugs/patch.js";
import type { BugCreateRequest } from "../bugs/schema.js";

/**
 * Pass-through operations against Azure DevOps. Holds nothing between
 * requests besides the client and the configuration it was built with.
 */
export class WorkItemProxy {
  private readonly client: AzureDevOpsClient;
  private readonly config: AzureDevOpsConfig;

  constructor(client: AzureDevOpsClient, config: AzureDevOpsConfig) {
    this.client = client;
    this.config = config;
  }

  async listProjects(): Promise<unknown> {
    const res = await this.client.listProjects();
    if (!res.ok) {
      console.error(`[proxy] Listing projects failed with ${res.status}`);
      throw new UpstreamResponseError("Azure DevOps API error fetching projects", res.status, res.body);
    }
    return res.body;
  }

  /**
   * Resolves the tester, then creates the bug in a single write. Nothing is
   * written when the tester cannot be resolved.
   */
  async createBug(req: BugCreateRequest): Promise<unknown> {
    const testerName = this.config.testerDisplayName;
    const testerPrincipal = await this.client.findUserPrincipalName(testerName);
    if (!testerPrincipal) {
      console.warn(`[proxy] Tester "${testerName}" not found, bug not created`);
      throw new TesterNotFoundError(testerName);
    }

    const operations = buildBugPatch(req, {
      testerPrincipal,
      parentUrl: this.client.workItemUrl(req.project, req.userStoryId),
    });

    const res = await this.client.createWorkItem(req.project, "Bug", operations);
    if (!res.ok) {
      console.error(`[proxy] Creating bug in ${req.project} failed with ${res.status}`);
      throw new UpstreamResponseError("Azure DevOps API error creating bug", res.status, res.body);
    }

    console.log(`[proxy] Created bug in ${req.project} under work item ${req.userStoryId}`);
    return res.body;
  }
}
