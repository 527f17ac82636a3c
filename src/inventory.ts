/**
 * Inventory input boundary.
 *
 * The discovery collaborator hands over a JSON document, either
 * `{ scopes, resources }` or a bare array of resource records. Everything is
 * validated against a TypeBox schema before the builder sees it.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { compareIds } from "./core/builder.js";
import { InventoryValidationError } from "./errors.js";
import type { ResourceRecord, ScopeInfo } from "./types.js";

const ResourceKindSchema = Type.Union([
  Type.Literal("network"),
  Type.Literal("subnet"),
  Type.Literal("virtual-machine"),
  Type.Literal("load-balancer"),
  Type.Literal("gateway"),
  Type.Literal("firewall"),
  Type.Literal("peering-link"),
]);

export const ResourceRecordSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  kind: ResourceKindSchema,
  name: Type.String(),
  scopeId: Type.String({ minLength: 1 }),
  addressSpace: Type.Optional(Type.String()),
  parentRef: Type.Optional(Type.String()),
  attachmentRef: Type.Optional(Type.String()),
  attributes: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

const ScopeSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
});

export const InventorySchema = Type.Union([
  Type.Object({
    scopes: Type.Optional(Type.Array(ScopeSchema)),
    resources: Type.Array(ResourceRecordSchema),
  }),
  Type.Array(ResourceRecordSchema),
]);

export type InventoryDocument = Static<typeof InventorySchema>;

export type Inventory = {
  /** Every scope named in the document or referenced by a record, ascending by ID. */
  scopes: ScopeInfo[];
  records: ResourceRecord[];
};

/**
 * Validate and normalize a parsed inventory document.
 *
 * @throws InventoryValidationError listing every schema violation.
 */
export function parseInventory(value: unknown, source = "inventory"): Inventory {
  if (!Check(InventorySchema, value)) {
    const issues: string[] = [];
    for (const error of Errors(InventorySchema, value)) {
      issues.push(`${error.path || "(root)"}: ${error.message}`);
    }
    throw new InventoryValidationError(source, issues.length > 0 ? issues : ["Inventory does not match schema"]);
  }

  const resources = Array.isArray(value) ? value : value.resources;
  const declared = Array.isArray(value) ? [] : (value.scopes ?? []);

  const records: ResourceRecord[] = resources.map((r) => ({
    id: r.id,
    kind: r.kind,
    name: r.name,
    scopeId: r.scopeId,
    ...(r.addressSpace !== undefined ? { addressSpace: r.addressSpace } : {}),
    ...(r.parentRef !== undefined ? { parentRef: r.parentRef } : {}),
    ...(r.attachmentRef !== undefined ? { attachmentRef: r.attachmentRef } : {}),
    attributes: { ...(r.attributes ?? {}) },
  }));

  const names = new Map<string, string>();
  for (const scope of declared) {
    if (!names.has(scope.id)) names.set(scope.id, scope.name?.trim() || scope.id);
  }
  for (const record of records) {
    if (!names.has(record.scopeId)) names.set(record.scopeId, record.scopeId);
  }

  const scopes = [...names.entries()]
    .map(([id, name]) => ({ id, name }))
    .sort((a, b) => compareIds(a.id, b.id));

  return { scopes, records };
}

/** Read, parse and validate an inventory JSON file. */
export async function loadInventory(path: string): Promise<Inventory> {
  const raw = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new InventoryValidationError(path, [`(root): ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseInventory(parsed, path);
}
