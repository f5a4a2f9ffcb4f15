import { Model } from "../domain/model";
import { Command } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

export class AddToGroupCommand implements Command {
  static readonly COMMAND_WORD = "add-to-group";

  static readonly MESSAGE_USAGE =
    `${AddToGroupCommand.COMMAND_WORD}: Adds an existing person to an existing group. ` +
    "Parameters: p/PERSON NAME g/GROUP NAME\n" +
    `Example: ${AddToGroupCommand.COMMAND_WORD} p/John Doe g/CS2103T`;

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
    group.addMember(person);
    return new CommandResult(`Added ${this.personName} to ${this.groupName}`);
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    return (
      other instanceof AddToGroupCommand &&
      this.personName === other.personName &&
      this.groupName === other.groupName
    );
  }
}
