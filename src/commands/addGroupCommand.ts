import { Group } from "../domain/group";
import { Model } from "../domain/model";
import { Command } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

export class AddGroupCommand implements Command {
  static readonly COMMAND_WORD = "add-group";

  static readonly MESSAGE_USAGE =
    `${AddGroupCommand.COMMAND_WORD}: Adds an empty group to the address book. ` +
    "Parameters: n/NAME [t/TAG]...\n" +
    `Example: ${AddGroupCommand.COMMAND_WORD} n/CS2103T t/tutorial`;

  readonly toAdd: Group;

  constructor(group: Group) {
    requireAllNonNull({ group });
    this.toAdd = group;
  }

  execute(model: Model): CommandResult {
    model.addGroup(this.toAdd);
    return new CommandResult(`New group added: ${this.toAdd.toString()}`);
  }

  equals(other: unknown): boolean {
    return other === this || (other instanceof AddGroupCommand && this.toAdd.equals(other.toAdd));
  }
}
