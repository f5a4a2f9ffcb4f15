import { CommandErrorCode } from "../commands/commandError";
import { Group } from "../domain/group";
import { Person } from "../domain/person";
import { expectCommandError } from "../testing/expectCommandError";
import { ModelManager } from "./modelManager";

describe("ModelManager", () => {
  let model: ModelManager;
  const alice = new Person({ name: "Alice" });

  beforeEach(() => {
    model = new ModelManager();
  });

  describe("constructor", () => {
    it("loads an initial address book", () => {
      const group = new Group("CS2103T");
      const loaded = new ModelManager({ persons: [alice], groups: [group] });

      expect(loaded.getPerson("Alice")).toBe(alice);
      expect(loaded.getGroup("CS2103T")).toBe(group);
    });
  });

  describe("persons", () => {
    it("looks persons up by exact, case-sensitive name", () => {
      model.addPerson(alice);

      expect(model.getPerson("Alice")).toBe(alice);
      expectCommandError(() => model.getPerson("alice"), CommandErrorCode.PERSON_NOT_FOUND);
    });

    it("fails to delete an unknown person", () => {
      expectCommandError(() => model.deletePerson(alice), CommandErrorCode.PERSON_NOT_FOUND);
    });
  });

  describe("setGroup", () => {
    it("replaces the group in place", () => {
      const first = new Group("A");
      model.addGroup(first);
      model.addGroup(new Group("B"));

      model.setGroup(first, new Group("C"));

      expect(model.getFilteredGroupList().map(g => g.name)).toEqual(["C", "B"]);
    });

    it("rejects a replacement whose name belongs to another group", () => {
      const first = new Group("A");
      model.addGroup(first);
      model.addGroup(new Group("B"));

      expectCommandError(() => model.setGroup(first, new Group("B")), CommandErrorCode.DUPLICATE_GROUP);
      expect(model.getFilteredGroupList().map(g => g.name)).toEqual(["A", "B"]);
    });

    it("rejects a target that is not in the model", () => {
      expectCommandError(() => model.setGroup(new Group("A"), new Group("B")), CommandErrorCode.GROUP_NOT_FOUND);
    });
  });

  describe("filtered lists", () => {
    it("apply the predicate and keep insertion order", () => {
      ["Gamma", "Alpha", "Beta"].forEach(name => model.addGroup(new Group(name)));

      model.updateFilteredGroupList(g => g.name !== "Alpha");

      expect(model.getFilteredGroupList().map(g => g.name)).toEqual(["Gamma", "Beta"]);
      expect(model.getAddressBook().groups).toHaveLength(3);
    });
  });

  describe("deleteGroup", () => {
    it("removes the group", () => {
      const group = new Group("A");
      model.addGroup(group);

      model.deleteGroup(group);

      expect(model.hasGroup(group)).toBe(false);
      expectCommandError(() => model.deleteGroup(group), CommandErrorCode.GROUP_NOT_FOUND);
    });
  });
});
