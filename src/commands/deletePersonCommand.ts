import { Model } from "../domain/model";
import { Command, getByDisplayIndex, requirePositiveIndex } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

/**
 * Deletes the person at a displayed index. The person also leaves every
 * group, taking their grades with them.
 */
export class DeletePersonCommand implements Command {
  static readonly COMMAND_WORD = "delete-person";

  static readonly MESSAGE_USAGE =
    `${DeletePersonCommand.COMMAND_WORD}: Deletes the person identified by the index number ` +
    "used in the displayed person list.\n" +
    "Parameters: INDEX (must be a positive integer)\n" +
    `Example: ${DeletePersonCommand.COMMAND_WORD} 1`;

  readonly index: number;

  constructor(index: number) {
    requireAllNonNull({ index });
    requirePositiveIndex(index);
    this.index = index;
  }

  execute(model: Model): CommandResult {
    const person = getByDisplayIndex(model.getFilteredPersonList(), this.index, "Invalid Person");
    model.deletePerson(person);
    return new CommandResult(`Deleted Person: ${person.toString()}`);
  }

  equals(other: unknown): boolean {
    return other === this || (other instanceof DeletePersonCommand && this.index === other.index);
  }
}
