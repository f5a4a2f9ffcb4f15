import { Model } from "../domain/model";
import { Command } from "./command";
import { requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";
import { formatScore } from "./gradeAssignmentCommand";

export class ViewGradesCommand implements Command {
  static readonly COMMAND_WORD = "view-grades";

  static readonly MESSAGE_USAGE =
    `${ViewGradesCommand.COMMAND_WORD}: Shows every graded assignment of a person in a group. ` +
    "Parameters: p/PERSON NAME g/GROUP NAME\n" +
    `Example: ${ViewGradesCommand.COMMAND_WORD} p/John Doe g/CS2103T`;

  readonly personName: string;
  readonly groupName: string;

  constructor(personName: string, groupName: string) {
    requireAllNonNull({ personName, groupName });
    this.personName = personName;
    this.groupName = groupName;
  }

  execute(model: Model): CommandResult {
    const person = model.getPerson(this.personName);
    const detail = model.getGroup(this.groupName).getGroupMemberDetail(person);
    const assignments = detail.getAssignments();

    if (assignments.size === 0) {
      return new CommandResult(`No graded assignments for ${this.personName} in ${this.groupName}`);
    }

    const lines = [`Grades for ${this.personName} in ${this.groupName}:`];
    for (const [name, score] of assignments) {
      lines.push(`${name}: ${formatScore(score)}`);
    }
    return new CommandResult(lines.join("\n"));
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    return (
      other instanceof ViewGradesCommand &&
      this.personName === other.personName &&
      this.groupName === other.groupName
    );
  }
}
