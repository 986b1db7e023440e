/**
 * Failure taxonomy shared by every entry point.
 *
 * A BotError carries the text shown to the user who triggered it; anything
 * else reaching the interaction boundary is reported with GENERIC_FAILURE.
 */

export type BotErrorCode =
  | "duplicate_active_room"
  | "room_not_found"
  | "not_authorized"
  | "invalid_request"
  | "external_api_failure"
  | "persistence_failure";

export const GENERIC_FAILURE = "Something went wrong. Please try again later.";

export abstract class BotError extends Error {
  abstract readonly code: BotErrorCode;

  constructor(
    message: string,
    readonly userMessage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DuplicateActiveRoomError extends BotError {
  readonly code = "duplicate_active_room";

  constructor(readonly creatorId: string) {
    super(
      `Creator ${creatorId} already owns an active room`,
      "You already have a room. Delete it before creating a new one."
    );
  }
}

export class RoomNotFoundError extends BotError {
  readonly code = "room_not_found";

  constructor(readonly channelId: string) {
    super(`No room is bound to channel ${channelId}`, "This command can only be used inside a meetup room.");
  }
}

export class NotAuthorizedError extends BotError {
  readonly code = "not_authorized";

  constructor(
    readonly actorId: string,
    action: string,
    userMessage = "Only the room creator or an administrator can do that."
  ) {
    super(`User ${actorId} is not allowed to ${action}`, userMessage);
  }
}

export class InvalidRequestError extends BotError {
  readonly code = "invalid_request";

  constructor(message: string, userMessage = "That request is not valid.") {
    super(message, userMessage);
  }
}

export class ExternalApiFailureError extends BotError {
  readonly code = "external_api_failure";

  constructor(readonly operation: string, cause: unknown) {
    super(`Platform call failed (${operation}): ${describeError(cause)}`, GENERIC_FAILURE, { cause });
  }
}

export class PersistenceFailureError extends BotError {
  readonly code = "persistence_failure";

  constructor(readonly operation: string, cause: unknown) {
    super(`Store operation failed (${operation}): ${describeError(cause)}`, GENERIC_FAILURE, { cause });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toUserMessage(err: unknown): string {
  return err instanceof BotError ? err.userMessage : GENERIC_FAILURE;
}

/**
 * Run a synchronous store operation, reporting any failure as PersistenceFailureError.
 * BotErrors raised inside fn pass through unchanged.
 */
export function withStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof BotError) throw err;
    throw new PersistenceFailureError(operation, err);
  }
}
