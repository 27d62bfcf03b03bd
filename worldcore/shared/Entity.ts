// worldcore/shared/Entity.ts

export enum EntityType {
  NPC = "npc",
  PLAYER = "player",
}

/**
 * Directional input actions. The numeric value is the wire code carried
 * as the payload of an "action" user event.
 */
export enum EntityAction {
  NONE = 0,
  WEST = 1,
  NORTH = 2,
  EAST = 3,
  SOUTH = 4,
}

export function isEntityAction(code: unknown): code is EntityAction {
  return (
    typeof code === "number" &&
    Number.isInteger(code) &&
    code >= EntityAction.NONE &&
    code <= EntityAction.SOUTH
  );
}

// World position, float32 components
export type Vec3 = readonly [number, number, number];

// Facing on the XZ plane, float32 components
export type Vec2 = readonly [number, number];

export type AttributeValue = number | boolean | string;

export type AttributeBag = Record<string, AttributeValue>;

export function isAttributeValue(value: unknown): value is AttributeValue {
  return (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "string"
  );
}

export interface MonsterKind {
  kind: "monster";
  health: number;
  damage: number;
  defeated: boolean;
}

export interface PlayerKind {
  kind: "player";
  lastAction: EntityAction;
}

export interface GenericKind {
  kind: "generic";
}

export type EntityKind = GenericKind | MonsterKind | PlayerKind;

/**
 * Read-only copy of everything an entity holds.
 * The manager hands these out instead of the live entity.
 */
export interface EntitySnapshot {
  readonly id: number | null;
  readonly managerId: number | null;
  readonly type: EntityType;
  readonly kind: Readonly<EntityKind>;
  readonly position: Vec3;
  readonly orientation: Vec2;
  readonly level: number;
  readonly attributes: Readonly<AttributeBag>;
}
