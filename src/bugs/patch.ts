import type { FieldPatchOperation, RelationPatchOperation, WorkItemPatchOperation } from "../azure/types.js";
import type { BugCreateRequest } from "./schema.js";

export const PLANNED_START_UTC_OFFSET = "-05:00";
export const PARENT_LINK_TYPE = "System.LinkTypes.Hierarchy-Reverse";

export interface BugPatchContext {
  testerPrincipal: string;
  /** API url of the parent work item, see AzureDevOpsClient.workItemUrl */
  parentUrl: string;
}

type FieldValue = (req: BugCreateRequest, ctx: BugPatchContext) => string | number;

/** Work item fields written on every bug, in the order they are sent. */
export const BUG_FIELDS: ReadonlyArray<readonly [string, FieldValue]> = [
  ["System.Title", (req) => req.title],
  ["System.AssignedTo", (req) => req.assignedTo],
  ["Microsoft.VSTS.TCM.ReproSteps", (req) => req.reproSteps],
  ["Microsoft.VSTS.Scheduling.Effort", (req) => req.effort],
  ["Microsoft.VSTS.Common.Priority", (req) => req.priority],
  ["Microsoft.VSTS.Common.Severity", (req) => req.severity],
  ["Microsoft.VSTS.Common.Activity", (req) => req.activity],
  ["Microsoft.VSTS.Common.ValueArea", () => "Business"],
  ["Custom.Tester", (_req, ctx) => ctx.testerPrincipal],
  ["Custom.Cliente", (req) => req.cliente],
  ["Custom.Tipodeerror", (req) => req.tipoDeError],
  ["Custom.FechaInicioPlaneada", (req) => `${req.fechaInicioPlaneada}T00:00:00${PLANNED_START_UTC_OFFSET}`],
  ["Custom.ResponsableBug", (req) => req.responsableBug],
  // Aplicación
  ["Custom.33ece249-f3ca-4b23-a86a-0c605534caa3", (req) => req.aplicacion],
  ["Custom.Tareaasociada", (req) => String(req.tareaAsociada)],
  // Versión aplicación
  ["Custom.f82dc49a-eb67-44c3-ac65-de18fee91f0b", (req) => req.versionAplicacion],
  ["Custom.Funcionalidadquepresentaelerror", (req) => req.funcionalidad],
];

export function buildBugPatch(req: BugCreateRequest, ctx: BugPatchContext): WorkItemPatchOperation[] {
  const fields = BUG_FIELDS.map(
    ([field, value]): FieldPatchOperation => ({
      op: "add",
      path: `/fields/${field}`,
      value: value(req, ctx),
    })
  );

  const parentLink: RelationPatchOperation = {
    op: "add",
    path: "/relations/-",
    value: {
      rel: PARENT_LINK_TYPE,
      url: ctx.parentUrl,
      attributes: { comment: "Parent User Story" },
    },
  };

  return [...fields, parentLink];
}
