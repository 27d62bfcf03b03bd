// worldcore/shared/events.ts

// World/lifecycle events, delivered through Entity.event / EntityManager.broadcast
export const WorldEvents = {
  Tick: "tick",
  Damage: "damage",
  Heal: "heal",
} as const;

// Input events, only ever routed to player entities
export const UserEvents = {
  Action: "action",
} as const;

export type WorldEventName = (typeof WorldEvents)[keyof typeof WorldEvents];
export type UserEventName = (typeof UserEvents)[keyof typeof UserEvents];

/**
 * Event names stay open: hosts may invent their own, and entities that
 * don't understand a name ignore it.
 */
export type EventName = WorldEventName | UserEventName | (string & {});

export type EventValue = number | boolean | string | null;
