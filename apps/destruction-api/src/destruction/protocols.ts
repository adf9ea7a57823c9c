import { z } from "zod";

import { isSqlIdentifier } from "@destruction/warehouse";

/**
 * A named deletion target. Callers pick a protocol by name and never supply
 * dataset or table coordinates themselves.
 *
 * `action` tags what the protocol does to a participant's rows; only whole-row
 * deletion exists today.
 */
export type ProtocolConfig = {
  readonly name: string;
  readonly action: "delete_rows";
  readonly dataset: string;
  readonly table: string;
  readonly keyColumn: string;
};

export const BUILTIN_PROTOCOLS = [
  {
    name: "roi_physical_activity",
    action: "delete_rows",
    dataset: "ForTestingOnly",
    table: "physical_activity",
    keyColumn: "Connect_ID"
  }
] as const satisfies readonly ProtocolConfig[];

const identifier = z.string().refine(isSqlIdentifier, { message: "must be a plain SQL identifier" });

const protocolConfigSchema = z.object({
  name: z.string().min(1),
  action: z.literal("delete_rows"),
  dataset: identifier,
  table: identifier,
  keyColumn: identifier
});

export type TargetRegistry = ReturnType<typeof createTargetRegistry>;

export function createTargetRegistry(protocols: readonly ProtocolConfig[] = BUILTIN_PROTOCOLS) {
  const byName = new Map<string, ProtocolConfig>();
  for (const p of protocols) {
    const parsed = protocolConfigSchema.parse(p);
    if (byName.has(parsed.name)) throw new Error(`Duplicate protocol: ${parsed.name}`);
    byName.set(parsed.name, Object.freeze(parsed));
  }
  const names = Object.freeze([...byName.keys()].sort());

  return {
    resolve: (protocol: string): ProtocolConfig | undefined => byName.get(protocol),
    names: (): readonly string[] => names
  };
}
