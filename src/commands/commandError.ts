export enum CommandErrorCode {
  PERSON_NOT_FOUND = "PERSON_NOT_FOUND",
  GROUP_NOT_FOUND = "GROUP_NOT_FOUND",
  NOT_A_MEMBER = "NOT_A_MEMBER",
  INVALID_INDEX = "INVALID_INDEX",
  DUPLICATE_PERSON = "DUPLICATE_PERSON",
  DUPLICATE_GROUP = "DUPLICATE_GROUP",
  DUPLICATE_MEMBER = "DUPLICATE_MEMBER",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  UNKNOWN_COMMAND = "UNKNOWN_COMMAND",
  INVALID_FORMAT = "INVALID_FORMAT",
}

/**
 * Raised by commands, the model and the parser when user input cannot be
 * applied. The message is shown to the user as-is.
 */
export class CommandError extends Error {
  readonly code: CommandErrorCode;

  constructor(code: CommandErrorCode, message: string) {
    super(message);
    this.name = "CommandError";
    this.code = code;
  }
}

/**
 * Throws a TypeError naming the first argument that is null or undefined.
 * Used by command constructors; a missing argument is a caller bug, not a
 * user error.
 */
export function requireAllNonNull(args: Record<string, unknown>): void {
  for (const [name, value] of Object.entries(args)) {
    if (value === null || value === undefined) {
      throw new TypeError(`${name} is required`);
    }
  }
}
