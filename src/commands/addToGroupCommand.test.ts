import { ModelManager } from "../stores/modelManager";
import { Group } from "../domain/group";
import { Person } from "../domain/person";
import { expectCommandError } from "../testing/expectCommandError";
import { AddToGroupCommand } from "./addToGroupCommand";
import { CommandErrorCode } from "./commandError";
import { RemoveFromGroupCommand } from "./removeFromGroupCommand";

describe("AddToGroupCommand / RemoveFromGroupCommand", () => {
  let model: ModelManager;
  let alice: Person;

  beforeEach(() => {
    model = new ModelManager();
    alice = new Person({ name: "Alice" });
    model.addPerson(alice);
    model.addGroup(new Group("CS2103T"));
  });

  it("adds a person to a group", () => {
    const result = new AddToGroupCommand("Alice", "CS2103T").execute(model);

    expect(result.feedbackToUser).toBe("Added Alice to CS2103T");
    expect(model.getGroup("CS2103T").getGroupMembers()).toEqual([alice]);
  });

  it("rejects adding the same person twice", () => {
    new AddToGroupCommand("Alice", "CS2103T").execute(model);

    expectCommandError(
      () => new AddToGroupCommand("Alice", "CS2103T").execute(model),
      CommandErrorCode.DUPLICATE_MEMBER
    );
    expect(model.getGroup("CS2103T").getGroupMembers()).toHaveLength(1);
  });

  it("reports unknown persons and groups", () => {
    expectCommandError(() => new AddToGroupCommand("Bob", "CS2103T").execute(model), CommandErrorCode.PERSON_NOT_FOUND);
    expectCommandError(() => new AddToGroupCommand("Alice", "CS2101").execute(model), CommandErrorCode.GROUP_NOT_FOUND);
  });

  it("removes a member and their grades", () => {
    new AddToGroupCommand("Alice", "CS2103T").execute(model);
    model.getGroup("CS2103T").getGroupMemberDetail(alice).gradeAssignment("Quiz", 10);

    const result = new RemoveFromGroupCommand("Alice", "CS2103T").execute(model);

    expect(result.feedbackToUser).toBe("Removed Alice from CS2103T");
    expect(model.getGroup("CS2103T").hasMember(alice)).toBe(false);
  });

  it("fails to remove a person who is not a member", () => {
    expectCommandError(
      () => new RemoveFromGroupCommand("Alice", "CS2103T").execute(model),
      CommandErrorCode.NOT_A_MEMBER
    );
  });

  it("compares by person and group name", () => {
    const cmd = new AddToGroupCommand("Alice", "CS2103T");
    expect(cmd.equals(new AddToGroupCommand("Alice", "CS2103T"))).toBe(true);
    expect(cmd.equals(new AddToGroupCommand("Alice", "CS2101"))).toBe(false);
    expect(cmd.equals(new RemoveFromGroupCommand("Alice", "CS2103T"))).toBe(false);
  });
});
