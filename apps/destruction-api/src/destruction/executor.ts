import type { Warehouse } from "@destruction/warehouse";

import type { ProtocolConfig, TargetRegistry } from "./protocols.js";
import type { DeletionRequest } from "./validation.js";
import { ExecutionError, ProtocolNotSupportedError } from "./errors.js";

export type QualifiedTable = {
  project: string;
  dataset: string;
  table: string;
};

export type DeletionOutcome =
  | { kind: "skipped"; protocol: ProtocolConfig; deletedIds: []; notFound: [] }
  | { kind: "executed"; protocol: ProtocolConfig; table: QualifiedTable; deletedIds: string[]; notFound: string[] };

export type DeletionContext = {
  registry: TargetRegistry;
  warehouse: Pick<Warehouse, "projectId" | "selectExistingKeys" | "deleteByKeys">;
};

export async function executeDeletion(ctx: DeletionContext, request: DeletionRequest): Promise<DeletionOutcome> {
  const protocol = ctx.registry.resolve(request.protocol);
  if (!protocol) throw new ProtocolNotSupportedError(request.protocol, ctx.registry.names());

  // Set keeps first-seen order, so partitions list ids in the order they were requested.
  const requested = [...new Set(request.connectIds)];
  if (!requested.length) return { kind: "skipped", protocol, deletedIds: [], notFound: [] };

  switch (protocol.action) {
    case "delete_rows":
      return deleteRows(ctx, protocol, requested);
  }
}

async function deleteRows(ctx: DeletionContext, protocol: ProtocolConfig, requested: string[]): Promise<DeletionOutcome> {
  let project: string;
  let existing: Set<string>;
  try {
    project = await ctx.warehouse.projectId();
    // The lookup and the delete are separate statements with no transaction around them.
    // A concurrent request may delete the same ids between the two; the second delete is
    // then a no-op and both callers may report the ids as deleted.
    existing = await ctx.warehouse.selectExistingKeys(project, protocol, requested);
    // Scoped to everything requested, not just `existing`: deleting an absent key changes nothing.
    await ctx.warehouse.deleteByKeys(project, protocol, requested);
  } catch (err) {
    throw new ExecutionError(err);
  }

  return {
    kind: "executed",
    protocol,
    table: { project, dataset: protocol.dataset, table: protocol.table },
    deletedIds: requested.filter((id) => existing.has(id)),
    notFound: requested.filter((id) => !existing.has(id))
  };
}
