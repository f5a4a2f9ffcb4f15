import { Model } from "../domain/model";
import { CommandError, CommandErrorCode } from "./commandError";
import { CommandResult } from "./commandResult";

/**
 * One user intent. Arguments are fixed at construction; execute() either
 * applies the whole change to the model and returns a result, or throws a
 * CommandError and leaves the model untouched.
 */
export interface Command {
  execute(model: Model): CommandResult;
  equals(other: unknown): boolean;
}

/**
 * Look up an entry of a displayed list by its 1-based index.
 */
export function getByDisplayIndex<T>(list: readonly T[], index: number, message: string): T {
  if (index > list.length) {
    throw new CommandError(CommandErrorCode.INVALID_INDEX, message);
  }
  return list[index - 1];
}

/**
 * Constructor-time check for 1-based display indexes
 */
export function requirePositiveIndex(index: number): void {
  if (!Number.isInteger(index) || index < 1) {
    throw new CommandError(
      CommandErrorCode.INVALID_INDEX,
      `Index must be a positive integer, got ${index}`
    );
  }
}
