/**
 * Command Service
 *
 * Runs one line of user input end to end: parse, execute against the
 * model, then persist the address book if the command changed it.
 * Both the CLI and the API go through here.
 */

import { CommandError } from "../commands/commandError";
import { CommandResult } from "../commands/commandResult";
import { ExitCommand } from "../commands/exitCommand";
import { FindGroupCommand } from "../commands/findGroupCommand";
import { HelpCommand } from "../commands/helpCommand";
import { ListCommand } from "../commands/listCommand";
import { ViewGradesCommand } from "../commands/viewGradesCommand";
import { AddressBookData, Model } from "../domain/model";
import { getCommandWord, parseCommand } from "../parser/commandParser";

/**
 * Anything that can persist a model snapshot
 */
export interface AddressBookSaver {
  save(data: AddressBookData): void;
}

export const MESSAGE_SAVE_FAILED =
  "Warning: the change was applied but could not be saved to disk.";

const READ_ONLY_COMMANDS = new Set<string>([
  HelpCommand.COMMAND_WORD,
  ExitCommand.COMMAND_WORD,
  ListCommand.COMMAND_WORD,
  FindGroupCommand.COMMAND_WORD,
  ViewGradesCommand.COMMAND_WORD,
]);

export class CommandService {
  constructor(
    private readonly model: Model,
    private readonly store: AddressBookSaver
  ) {}

  execute(input: string): CommandResult {
    const commandWord = getCommandWord(input);

    let result: CommandResult;
    try {
      result = parseCommand(input).execute(this.model);
    } catch (error) {
      if (error instanceof CommandError) {
        console.log(`[${commandWord}] failed (${error.code}): ${error.message}`);
      } else {
        console.error(`[${commandWord}] unexpected error:`, error);
      }
      throw error;
    }

    console.log(`[${commandWord}] ok`);
    if (READ_ONLY_COMMANDS.has(commandWord)) {
      return result;
    }

    // The change is already applied at this point
    try {
      this.store.save(this.model.getAddressBook());
    } catch (error) {
      console.error(`[${commandWord}] could not save address book:`, error);
      return new CommandResult(`${result.feedbackToUser}\n${MESSAGE_SAVE_FAILED}`, {
        showHelp: result.showHelp,
        exit: result.exit,
      });
    }
    return result;
  }

  getModel(): Model {
    return this.model;
  }
}
