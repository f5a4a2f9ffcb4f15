import { CommandError } from "../commands/commandError";
import { CommandResult } from "../commands/commandResult";
import { CommandService } from "../services/commandService";

export type InputOutcome =
  | { ok: true; result: CommandResult }
  | { ok: false; message: string };

/**
 * Run one line through the service. Every error comes back as a failed
 * outcome so the prompt keeps running; the service has already logged it.
 */
export function handleInput(service: CommandService, line: string): InputOutcome {
  try {
    return { ok: true, result: service.execute(line) };
  } catch (error) {
    if (error instanceof CommandError) {
      return { ok: false, message: error.message };
    }
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, message: `Unexpected error: ${detail}` };
  }
}

export function formatResult(outcome: InputOutcome): string {
  return outcome.ok ? outcome.result.feedbackToUser : `Error: ${outcome.message}`;
}
