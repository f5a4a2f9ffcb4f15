import { ModelManager } from "../stores/modelManager";
import { Group } from "../domain/group";
import { Person } from "../domain/person";
import { FindGroupCommand } from "./findGroupCommand";
import { ListCommand } from "./listCommand";

describe("FindGroupCommand / ListCommand", () => {
  let model: ModelManager;

  beforeEach(() => {
    model = new ModelManager();
    model.addGroup(new Group("CS2103T Tutorial"));
    model.addGroup(new Group("CS2101 Presentation"));
    model.addGroup(new Group("Project Team"));
    model.addPerson(new Person({ name: "Alice" }));
  });

  it("filters groups by whole-word keyword, case-insensitively", () => {
    const result = new FindGroupCommand(["tutorial", "team"]).execute(model);

    expect(result.feedbackToUser).toBe("2 groups listed!");
    expect(model.getFilteredGroupList().map(g => g.name)).toEqual(["CS2103T Tutorial", "Project Team"]);
  });

  it("does not match partial words", () => {
    const result = new FindGroupCommand(["CS21"]).execute(model);

    expect(result.feedbackToUser).toBe("0 groups listed!");
  });

  it("uses singular wording for one match", () => {
    expect(new FindGroupCommand(["cs2101"]).execute(model).feedbackToUser).toBe("1 group listed!");
  });

  it("list clears the filters", () => {
    new FindGroupCommand(["team"]).execute(model);
    model.updateFilteredPersonList(() => false);

    const result = new ListCommand().execute(model);

    expect(result.feedbackToUser).toBe("Listed all persons and groups");
    expect(model.getFilteredGroupList()).toHaveLength(3);
    expect(model.getFilteredPersonList()).toHaveLength(1);
  });

  it("compares keywords in order", () => {
    expect(new FindGroupCommand(["a", "b"]).equals(new FindGroupCommand(["a", "b"]))).toBe(true);
    expect(new FindGroupCommand(["a", "b"]).equals(new FindGroupCommand(["b", "a"]))).toBe(false);
  });
});
