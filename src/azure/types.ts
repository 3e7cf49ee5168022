export interface WorkItemRelation {
  rel: string;
  url: string;
  attributes?: Record<string, string>;
}

export interface FieldPatchOperation {
  op: "add";
  path: `/fields/${string}`;
  value: string | number;
}

export interface RelationPatchOperation {
  op: "add";
  path: "/relations/-";
  value: WorkItemRelation;
}

export type WorkItemPatchOperation = FieldPatchOperation | RelationPatchOperation;

export interface UpstreamResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON, or `{ raw_text }` when the body is not JSON */
  body: unknown;
}
