// worldcore/shared/errors.ts

export type EntityErrorCode =
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "ALREADY_REGISTERED"
  | "DECODE_ERROR";

export class EntityRegistryError extends Error {
  constructor(readonly code: EntityErrorCode, message: string) {
    super(message);
    this.name = "EntityRegistryError";
  }
}

export class NotFoundError extends EntityRegistryError {
  constructor(readonly entityId: number) {
    super("NOT_FOUND", `Entity with ID ${entityId} does not exist.`);
    this.name = "NotFoundError";
  }
}

export class InvalidArgumentError extends EntityRegistryError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class AlreadyRegisteredError extends EntityRegistryError {
  constructor(
    readonly entityId: number,
    readonly managerId: number
  ) {
    super(
      "ALREADY_REGISTERED",
      `Entity is already registered as ${entityId} in manager ${managerId}.`
    );
    this.name = "AlreadyRegisteredError";
  }
}

export class DecodeError extends EntityRegistryError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super("DECODE_ERROR", message);
    this.name = "DecodeError";
  }
}
