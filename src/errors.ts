export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export interface UpstreamErrorDetail {
  message: string;
  azure_status: number;
  azure_response: unknown;
}

/**
 * Base class for every failure the proxy reports to its caller.
 * `status` is the HTTP status of the response, `detail` its body payload.
 */
export class ProxyError extends Error {
  public readonly status: number;
  public readonly detail: unknown;

  constructor(status: number, message: string, detail: unknown = message) {
    super(message);
    this.name = "ProxyError";
    this.status = status;
    this.detail = detail;

    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ConfigurationError extends ProxyError {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(500, message);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}

export class RequestValidationError extends ProxyError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(422, issues.map((i) => `${i.loc.join(".")}: ${i.msg}`).join("; "), issues);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

export class UpstreamResponseError extends ProxyError {
  public readonly upstreamStatus: number;

  constructor(message: string, upstreamStatus: number, upstreamBody: unknown) {
    const detail: UpstreamErrorDetail = {
      message,
      azure_status: upstreamStatus,
      azure_response: upstreamBody,
    };
    super(502, message, detail);
    this.name = "UpstreamResponseError";
    this.upstreamStatus = upstreamStatus;
  }
}

export class UpstreamConnectionError extends ProxyError {
  constructor(reason: string) {
    super(502, `Error communicating with Azure DevOps: ${reason}`);
    this.name = "UpstreamConnectionError";
  }
}

export class TesterNotFoundError extends ProxyError {
  public readonly displayName: string;

  constructor(displayName: string) {
    super(404, `Tester user '${displayName}' could not be found in the Azure DevOps organization.`);
    this.name = "TesterNotFoundError";
    this.displayName = displayName;
  }
}
