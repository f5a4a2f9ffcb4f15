import { Model } from "../domain/model";
import { Person } from "../domain/person";
import { Command } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

export class AddPersonCommand implements Command {
  static readonly COMMAND_WORD = "add-person";

  static readonly MESSAGE_USAGE =
    `${AddPersonCommand.COMMAND_WORD}: Adds a person to the address book. ` +
    "Parameters: n/NAME [ph/PHONE] [e/EMAIL]\n" +
    `Example: ${AddPersonCommand.COMMAND_WORD} n/John Doe ph/98765432 e/johnd@example.com`;

  readonly toAdd: Person;

  constructor(person: Person) {
    requireAllNonNull({ person });
    this.toAdd = person;
  }

  execute(model: Model): CommandResult {
    model.addPerson(this.toAdd);
    return new CommandResult(`New person added: ${this.toAdd.toString()}`);
  }

  equals(other: unknown): boolean {
    return other === this || (other instanceof AddPersonCommand && this.toAdd.equals(other.toAdd));
  }
}
