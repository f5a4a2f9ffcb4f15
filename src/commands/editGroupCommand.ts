import { Group } from "../domain/group";
import { Model } from "../domain/model";
import { Tag, sameTags, uniqueTags } from "../domain/tag";
import { Command, getByDisplayIndex, requirePositiveIndex } from "./command";
import { CommandError, CommandErrorCode, requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

export const MESSAGE_INVALID_GROUP = "Invalid Group";
export const MESSAGE_DUPLICATE_GROUP = "This group already exists in the address book.";

/**
 * Renames the group at a displayed index and optionally replaces its tags.
 *
 * The edited group keeps the exact member records of the original, so
 * membership and grades survive the edit. An empty tag list leaves the
 * group's tags as they were.
 */
export class EditGroupCommand implements Command {
  static readonly COMMAND_WORD = "edit-group";

  static readonly MESSAGE_USAGE =
    `${EditGroupCommand.COMMAND_WORD}: Edits the group identified by the index number ` +
    "used in the displayed group list. Existing values will be overwritten by the input values.\n" +
    "Parameters: INDEX (must be a positive integer) n/NAME [t/TAG]...\n" +
    `Example: ${EditGroupCommand.COMMAND_WORD} 1 n/CS2103T T12-1 t/tutorial`;

  readonly index: number;
  readonly newGroupName: string;
  readonly tags: readonly Tag[];

  constructor(index: number, newGroupName: string, tags?: Iterable<Tag> | null) {
    requireAllNonNull({ index, newGroupName });
    requirePositiveIndex(index);
    this.index = index;
    this.newGroupName = newGroupName;
    this.tags = uniqueTags(tags ?? []);
  }

  execute(model: Model): CommandResult {
    const groupToEdit = getByDisplayIndex(model.getFilteredGroupList(), this.index, MESSAGE_INVALID_GROUP);
    const editedGroup = this.createEditedGroup(groupToEdit);

    if (!groupToEdit.isSameGroup(editedGroup) && model.hasGroup(editedGroup)) {
      throw new CommandError(CommandErrorCode.DUPLICATE_GROUP, MESSAGE_DUPLICATE_GROUP);
    }

    model.setGroup(groupToEdit, editedGroup);
    return new CommandResult(`Edited Group: ${this.newGroupName}`);
  }

  private createEditedGroup(groupToEdit: Group): Group {
    const tags = this.tags.length > 0 ? this.tags : groupToEdit.getTags();
    return new Group(this.newGroupName, groupToEdit.getGroupMemberDetails(), tags);
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof EditGroupCommand)) {
      return false;
    }
    return (
      this.index === other.index &&
      this.newGroupName === other.newGroupName &&
      sameTags(this.tags, other.tags)
    );
  }
}
