import { ModelManager } from "../stores/modelManager";
import { Group } from "../domain/group";
import { Person } from "../domain/person";
import { expectCommandError } from "../testing/expectCommandError";
import { CommandErrorCode } from "./commandError";
import { ViewGradesCommand } from "./viewGradesCommand";

describe("ViewGradesCommand", () => {
  let model: ModelManager;
  let group: Group;
  let alice: Person;

  beforeEach(() => {
    model = new ModelManager();
    alice = new Person({ name: "Alice" });
    model.addPerson(alice);
    group = new Group("CS2103T");
    group.addMember(alice);
    model.addGroup(group);
  });

  it("lists grades in the order they were first recorded", () => {
    const detail = group.getGroupMemberDetail(alice);
    detail.gradeAssignment("Submit UML", 95);
    detail.gradeAssignment("Quiz 1", 7.5);

    const result = new ViewGradesCommand("Alice", "CS2103T").execute(model);

    expect(result.feedbackToUser).toBe(
      "Grades for Alice in CS2103T:\nSubmit UML: 95.000000\nQuiz 1: 7.500000"
    );
  });

  it("says so when nothing is graded", () => {
    expect(new ViewGradesCommand("Alice", "CS2103T").execute(model).feedbackToUser).toBe(
      "No graded assignments for Alice in CS2103T"
    );
  });

  it("fails for a non-member", () => {
    model.addPerson(new Person({ name: "Bob" }));

    expectCommandError(() => new ViewGradesCommand("Bob", "CS2103T").execute(model), CommandErrorCode.NOT_A_MEMBER);
  });
});
