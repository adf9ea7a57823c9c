export type ErrorResponse = {
  error: string;
};

export type OkStatusResponse = { status: "ok" };

export type DestructionSuccessResponse = {
  message: string;
  // Present only when at least one row was deleted.
  deleted_ids?: string[];
  not_found: string[];
};
