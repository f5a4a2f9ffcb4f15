import { Group } from "../domain/group";
import { Model } from "../domain/model";
import { Command } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

/**
 * Narrows the displayed group list to groups whose name contains any of
 * the keywords as a whole word (case-insensitive).
 */
export class FindGroupCommand implements Command {
  static readonly COMMAND_WORD = "find-group";

  static readonly MESSAGE_USAGE =
    `${FindGroupCommand.COMMAND_WORD}: Finds all groups whose names contain any of ` +
    "the specified keywords (case-insensitive) and displays them as a list with index numbers.\n" +
    "Parameters: KEYWORD [MORE_KEYWORDS]...\n" +
    `Example: ${FindGroupCommand.COMMAND_WORD} CS2103T tutorial`;

  readonly keywords: readonly string[];

  constructor(keywords: readonly string[]) {
    requireAllNonNull({ keywords });
    this.keywords = [...keywords];
  }

  execute(model: Model): CommandResult {
    model.updateFilteredGroupList(group => this.matches(group));
    const count = model.getFilteredGroupList().length;
    return new CommandResult(`${count} group${count === 1 ? "" : "s"} listed!`);
  }

  private matches(group: Group): boolean {
    const words = group.name.toLowerCase().split(/\s+/);
    return this.keywords.some(k => words.includes(k.toLowerCase()));
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof FindGroupCommand)) {
      return false;
    }
    const otherKeywords = other.keywords;
    return (
      this.keywords.length === otherKeywords.length &&
      this.keywords.every((k, i) => k === otherKeywords[i])
    );
  }
}
