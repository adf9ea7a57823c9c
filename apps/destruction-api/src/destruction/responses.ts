import type { DestructionSuccessResponse } from "@destruction/types";

import type { DeletionOutcome } from "./executor.js";

export const NO_MATCHES_MESSAGE = "No matching Connect_IDs found";

export function buildDeletionResponse(outcome: DeletionOutcome): DestructionSuccessResponse {
  if (outcome.kind === "skipped" || !outcome.deletedIds.length) {
    return { message: NO_MATCHES_MESSAGE, not_found: [...outcome.notFound] };
  }
  const { project, dataset, table } = outcome.table;
  return {
    message: `Deleted ${outcome.deletedIds.length} records from ${project}.${dataset}.${table}`,
    deleted_ids: [...outcome.deletedIds],
    not_found: [...outcome.notFound]
  };
}
