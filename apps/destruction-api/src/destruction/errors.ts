import { badRequest, HttpError } from "@destruction/http";

export const CONNECT_IDS_MESSAGE = "connect_ids must be a list of strings";
export const PROTOCOL_MESSAGE = "Missing or invalid parameter: protocol (str)";

export function invalidProtocolParameter() {
  return badRequest("invalid_protocol", PROTOCOL_MESSAGE);
}

export function invalidConnectIds() {
  return badRequest("invalid_connect_ids", CONNECT_IDS_MESSAGE);
}

export class ProtocolNotSupportedError extends HttpError {
  public readonly protocol: string;
  public readonly allowed: readonly string[];
  constructor(protocol: string, allowed: readonly string[]) {
    super(400, "protocol_not_supported", `'${protocol}' is not a supported protocol. Allowed: [${allowed.map((a) => `'${a}'`).join(", ")}]`);
    this.name = "ProtocolNotSupportedError";
    this.protocol = protocol;
    this.allowed = allowed;
  }
}

/** A warehouse read or delete failed; nothing about the request's outcome is known. */
export class ExecutionError extends HttpError {
  constructor(cause: unknown) {
    super(500, "execution_failed", cause instanceof Error ? cause.message : String(cause));
    this.name = "ExecutionError";
    this.cause = cause;
  }
}
