// worldcore/protocol/EntityCodec.ts

// Versioned binary encoding for entities and whole registries.
//
// Blobs are msgpack maps shaped like:
//   { format: "entity", version: 1, entity: EntityRecord }
//   { format: "entity-manager", version: 1, manager: ManagerRecord }
//
// Every decoded blob is checked against the zod schemas below before any
// entity is rebuilt from it, so a corrupt or foreign blob surfaces as a
// DecodeError rather than a half-built object.

import { Packr } from "msgpackr";
import { z } from "zod";

import { EntityAction, EntityType } from "../shared/Entity";
import { DecodeError } from "../shared/errors";

export const ENTITY_FORMAT = "entity";
export const MANAGER_FORMAT = "entity-manager";
export const CODEC_VERSION = 1;

// Plain maps only (no record extension), so a blob decodes on its own.
const packr = new Packr({ useRecords: false, mapsAsObjects: true });

const finite = z.number().finite();
const registryId = z.number().int().nonnegative();

const attributeValueSchema = z.union([finite, z.boolean(), z.string()]);

const kindSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("generic") }),
  z.object({
    kind: z.literal("monster"),
    health: finite,
    damage: finite,
    defeated: z.boolean(),
  }),
  z.object({
    kind: z.literal("player"),
    lastAction: z.nativeEnum(EntityAction),
  }),
]);

export const entityRecordSchema = z.object({
  id: registryId.nullable(),
  managerId: registryId.nullable(),
  type: z.nativeEnum(EntityType),
  kind: kindSchema,
  position: z.tuple([finite, finite, finite]),
  orientation: z.tuple([finite, finite]),
  level: z.number().int().min(1),
  attributes: z.record(z.string(), attributeValueSchema),
});

export const managerRecordSchema = z.object({
  id: registryId,
  nextId: registryId,
  entities: z.array(entityRecordSchema),
});

const entityEnvelopeSchema = z.object({
  format: z.literal(ENTITY_FORMAT),
  version: z.literal(CODEC_VERSION),
  entity: entityRecordSchema,
});

const managerEnvelopeSchema = z.object({
  format: z.literal(MANAGER_FORMAT),
  version: z.literal(CODEC_VERSION),
  manager: managerRecordSchema,
});

export type EntityRecord = z.infer<typeof entityRecordSchema>;
export type ManagerRecord = z.infer<typeof managerRecordSchema>;

function unpackOrThrow(bytes: Uint8Array, what: string): unknown {
  try {
    return packr.unpack(bytes);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeError(`Malformed ${what} blob: ${reason}`);
  }
}

function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  what: string
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "<root>"}: ${i.message}`
    );
    throw new DecodeError(`Unrecognized ${what} blob`, issues);
  }
  return parsed.data;
}

export function encodeEntity(record: EntityRecord): Uint8Array {
  return packr.pack({
    format: ENTITY_FORMAT,
    version: CODEC_VERSION,
    entity: record,
  });
}

export function decodeEntity(bytes: Uint8Array): EntityRecord {
  const raw = unpackOrThrow(bytes, ENTITY_FORMAT);
  return parseOrThrow(entityEnvelopeSchema, raw, ENTITY_FORMAT).entity;
}

export function encodeManager(record: ManagerRecord): Uint8Array {
  return packr.pack({
    format: MANAGER_FORMAT,
    version: CODEC_VERSION,
    manager: record,
  });
}

export function decodeManager(bytes: Uint8Array): ManagerRecord {
  const raw = unpackOrThrow(bytes, MANAGER_FORMAT);
  return parseOrThrow(managerEnvelopeSchema, raw, MANAGER_FORMAT).manager;
}
