import { Command } from "./command";
import { CommandResult } from "./commandResult";

export class ExitCommand implements Command {
  static readonly COMMAND_WORD = "exit";

  static readonly MESSAGE_USAGE = `${ExitCommand.COMMAND_WORD}: Exits the program.`;

  execute(): CommandResult {
    return new CommandResult("Exiting Address Book as requested ...", { exit: true });
  }

  equals(other: unknown): boolean {
    return other instanceof ExitCommand;
  }
}
