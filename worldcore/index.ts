// worldcore/index.ts

// Config
export * from "./config/config";
export * from "./config/logconfig";

// Shared types, events, errors
export * from "./shared/Entity";
export * from "./shared/events";
export * from "./shared/errors";

// Entities
export { GameEntity } from "./entities/GameEntity";
export type { GameEntityOptions, MonsterOptions } from "./entities/GameEntity";
export type { EntityBehavior } from "./entities/EntityBehavior";
export * from "./combat/monsterCombat";

// Registry
export * from "./core/EntityManager";
export * from "./core/PlayerRegistry";

// Wire format
export * from "./protocol/EntityCodec";

// Logging
export { Logger, setLogSink } from "./utils/logger";
export type { LogSink } from "./utils/logger";
