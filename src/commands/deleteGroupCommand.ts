import { Model } from "../domain/model";
import { Command, getByDisplayIndex, requirePositiveIndex } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";
import { MESSAGE_INVALID_GROUP } from "./editGroupCommand";

export class DeleteGroupCommand implements Command {
  static readonly COMMAND_WORD = "delete-group";

  static readonly MESSAGE_USAGE =
    `${DeleteGroupCommand.COMMAND_WORD}: Deletes the group identified by the index number ` +
    "used in the displayed group list, along with its members' grades.\n" +
    "Parameters: INDEX (must be a positive integer)\n" +
    `Example: ${DeleteGroupCommand.COMMAND_WORD} 1`;

  readonly index: number;

  constructor(index: number) {
    requireAllNonNull({ index });
    requirePositiveIndex(index);
    this.index = index;
  }

  execute(model: Model): CommandResult {
    const group = getByDisplayIndex(model.getFilteredGroupList(), this.index, MESSAGE_INVALID_GROUP);
    model.deleteGroup(group);
    return new CommandResult(`Deleted Group: ${group.name}`);
  }

  equals(other: unknown): boolean {
    return other === this || (other instanceof DeleteGroupCommand && this.index === other.index);
  }
}
