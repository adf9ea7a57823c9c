import { z } from "zod";

import type { TargetRegistry } from "./protocols.js";
import { invalidConnectIds, invalidProtocolParameter, ProtocolNotSupportedError } from "./errors.js";

export type DeletionRequest = {
  protocol: string;
  connectIds: string[];
};

const bodySchema = z.record(z.unknown());
const protocolSchema = z.string().min(1);
const connectIdsSchema = z.array(z.string());

/**
 * Checks an inbound body in a fixed order: protocol shape, protocol support,
 * then connect_ids. An empty connect_ids list is accepted. Identifiers are
 * passed through exactly as sent.
 */
export function validateDeletionRequest(body: unknown, registry: TargetRegistry): DeletionRequest {
  const parsedBody = bodySchema.safeParse(body);
  const fields: Record<string, unknown> = parsedBody.success ? parsedBody.data : {};

  const protocol = protocolSchema.safeParse(fields.protocol);
  if (!protocol.success) throw invalidProtocolParameter();
  if (!registry.resolve(protocol.data)) throw new ProtocolNotSupportedError(protocol.data, registry.names());

  const connectIds = connectIdsSchema.safeParse(fields.connect_ids);
  if (!connectIds.success) throw invalidConnectIds();

  return { protocol: protocol.data, connectIds: connectIds.data };
}
