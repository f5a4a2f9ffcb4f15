import { Model } from "../domain/model";
import { Command } from "./command";
import { CommandError, CommandErrorCode, requireAllNonNull } from "./commandError";
import { CommandResult } from "./commandResult";

/**
 * Records a person's score for an assignment within one of their groups.
 * Grading the same assignment again overwrites the earlier score.
 */
export class GradeAssignmentCommand implements Command {
  static readonly COMMAND_WORD = "grade-assignment";

  static readonly MESSAGE_USAGE =
    `${GradeAssignmentCommand.COMMAND_WORD}: Grades the assignment of a person in a group. ` +
    "Parameters: p/PERSON NAME g/GROUP NAME a/ASSIGNMENT NAME s/SCORE\n" +
    `Example: ${GradeAssignmentCommand.COMMAND_WORD} p/John Doe g/CS2103T a/Submit UML s/95`;

  readonly personName: string;
  readonly groupName: string;
  readonly assignmentName: string;
  readonly score: number;

  constructor(personName: string, groupName: string, assignmentName: string, score: number) {
    requireAllNonNull({ personName, groupName, assignmentName, score });
    if (!Number.isFinite(score)) {
      throw new CommandError(CommandErrorCode.INVALID_ARGUMENT, `Score must be a finite number, got ${score}`);
    }
    this.personName = personName;
    this.groupName = groupName;
    this.assignmentName = assignmentName;
    this.score = score;
  }

  execute(model: Model): CommandResult {
    const person = model.getPerson(this.personName);
    const group = model.getGroup(this.groupName);
    const detail = group.getGroupMemberDetail(person);
    detail.gradeAssignment(this.assignmentName, this.score);

    return new CommandResult(
      `Graded Assignment ${this.assignmentName} for ${this.personName}, ${this.groupName} ` +
        `with ${formatScore(this.score)} score`
    );
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof GradeAssignmentCommand)) {
      return false;
    }
    return (
      this.personName === other.personName &&
      this.groupName === other.groupName &&
      this.assignmentName === other.assignmentName &&
      Object.is(this.score, other.score)
    );
  }
}

/**
 * Fixed six decimal places, e.g. 95 -> "95.000000"
 */
export function formatScore(score: number): string {
  return score.toFixed(6);
}
