import { Model } from "../domain/model";
import { Command } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

export class RemoveFromGroupCommand implements Command {
  static readonly COMMAND_WORD = "remove-from-group";

  static readonly MESSAGE_USAGE =
    `${RemoveFromGroupCommand.COMMAND_WORD}: Removes a person from a group, discarding their grades in it. ` +
    "Parameters: p/PERSON NAME g/GROUP NAME\n" +
    `Example: ${RemoveFromGroupCommand.COMMAND_WORD} p/John Doe g/CS2103T`;

  readonly personName: string;
  readonly groupName: string;

  constructor(personName: string, groupName: string) {
    requireAllNonNull({ personName, groupName });
    this.personName = personName;
    this.groupName = groupName;
  }

  execute(model: Model): CommandResult {
    const person = model.getPerson(this.personName);
    const group = model.getGroup(this.groupName);
    group.removeMember(person);
    return new CommandResult(`Removed ${this.personName} from ${this.groupName}`);
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    return (
      other instanceof RemoveFromGroupCommand &&
      this.personName === other.personName &&
      this.groupName === other.groupName
    );
  }
}
