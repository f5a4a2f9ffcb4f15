import { AddGroupCommand } from "./addGroupCommand";
import { AddPersonCommand } from "./addPersonCommand";
import { AddToGroupCommand } from "./addToGroupCommand";
import { Command } from "./command";
import { CommandResult } from "./commandResult";
import { DeleteGroupCommand } from "./deleteGroupCommand";
import { DeletePersonCommand } from "./deletePersonCommand";
import { EditGroupCommand } from "./editGroupCommand";
import { ExitCommand } from "./exitCommand";
import { FindGroupCommand } from "./findGroupCommand";
import { GradeAssignmentCommand } from "./gradeAssignmentCommand";
import { ListCommand } from "./listCommand";
import { RemoveFromGroupCommand } from "./removeFromGroupCommand";
import { ViewGradesCommand } from "./viewGradesCommand";

export class HelpCommand implements Command {
  static readonly COMMAND_WORD = "help";

  static readonly MESSAGE_USAGE = `${HelpCommand.COMMAND_WORD}: Shows usage of every command.`;

  execute(): CommandResult {
    const usages = [
      AddPersonCommand.MESSAGE_USAGE,
      DeletePersonCommand.MESSAGE_USAGE,
      AddGroupCommand.MESSAGE_USAGE,
      EditGroupCommand.MESSAGE_USAGE,
      DeleteGroupCommand.MESSAGE_USAGE,
      AddToGroupCommand.MESSAGE_USAGE,
      RemoveFromGroupCommand.MESSAGE_USAGE,
      GradeAssignmentCommand.MESSAGE_USAGE,
      ViewGradesCommand.MESSAGE_USAGE,
      FindGroupCommand.MESSAGE_USAGE,
      ListCommand.MESSAGE_USAGE,
      HelpCommand.MESSAGE_USAGE,
      ExitCommand.MESSAGE_USAGE,
    ];
    return new CommandResult(usages.join("\n\n"), { showHelp: true });
  }

  equals(other: unknown): boolean {
    return other instanceof HelpCommand;
  }
}
