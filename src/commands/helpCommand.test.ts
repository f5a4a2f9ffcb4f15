import { EditGroupCommand } from "./editGroupCommand";
import { GradeAssignmentCommand } from "./gradeAssignmentCommand";
import { HelpCommand } from "./helpCommand";
import { ViewGradesCommand } from "./viewGradesCommand";

describe("HelpCommand", () => {
  it("returns every usage and flags showHelp", () => {
    const result = new HelpCommand().execute();

    expect(result.showHelp).toBe(true);
    expect(result.exit).toBe(false);
    expect(result.feedbackToUser).toContain(GradeAssignmentCommand.MESSAGE_USAGE);
    expect(result.feedbackToUser).toContain(EditGroupCommand.MESSAGE_USAGE);
    expect(result.feedbackToUser).toContain(ViewGradesCommand.MESSAGE_USAGE);
  });

  it("equals any other HelpCommand", () => {
    expect(new HelpCommand().equals(new HelpCommand())).toBe(true);
  });
});
