// worldcore/config/config.ts

import dotenv from "dotenv";

// Note: dotenv only fills process.env; parsing/validation happens below.
dotenv.config();

export interface EntityConfig {
  debugEntity: boolean;
  maxAttributeKeyLength: number;
}

const DEFAULT_MAX_ATTRIBUTE_KEY_LENGTH = 64;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export const Config: EntityConfig = {
  // Gate chatty per-lookup logs so the registry doesn't spam
  debugEntity: process.env.WC_DEBUG_ENTITY === "1",

  maxAttributeKeyLength: parsePositiveInt(
    process.env.WC_MAX_ATTRIBUTE_KEY_LENGTH,
    DEFAULT_MAX_ATTRIBUTE_KEY_LENGTH
  ),
};
