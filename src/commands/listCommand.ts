import { Model, SHOW_ALL } from "../domain/model";
import { Command } from "./command";
import { CommandResult } from "./commandResult";

export class ListCommand implements Command {
  static readonly COMMAND_WORD = "list";

  static readonly MESSAGE_USAGE = `${ListCommand.COMMAND_WORD}: Lists all persons and groups.`;

  execute(model: Model): CommandResult {
    model.updateFilteredPersonList(SHOW_ALL);
    model.updateFilteredGroupList(SHOW_ALL);
    return new CommandResult("Listed all persons and groups");
  }

  equals(other: unknown): boolean {
    return other instanceof ListCommand;
  }
}
