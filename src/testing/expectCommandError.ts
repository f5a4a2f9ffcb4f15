import { CommandError, CommandErrorCode } from "../commands/commandError";

/**
 * Assert that fn throws a CommandError with the given code, and return it
 */
export function expectCommandError(fn: () => unknown, code: CommandErrorCode): CommandError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  if (!(caught instanceof CommandError)) {
    throw new Error(`Expected CommandError ${code}, got ${String(caught)}`);
  }
  expect(caught.code).toBe(code);
  return caught;
}
