import { CommandResult } from "../commands/commandResult";
import { CommandService } from "../services/commandService";
import { ModelManager } from "../stores/modelManager";
import { formatResult, handleInput } from "./helpers";

describe("CLI helpers", () => {
  let service: CommandService;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    service = new CommandService(new ModelManager(), { save: jest.fn() });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns the result of a successful command", () => {
    const outcome = handleInput(service, "add-group n/CS2103T");

    expect(outcome).toEqual({ ok: true, result: new CommandResult("New group added: CS2103T (0 members)") });
    expect(formatResult(outcome)).toBe("New group added: CS2103T (0 members)");
  });

  it("turns command errors into a failed outcome", () => {
    const outcome = handleInput(service, "edit-group 1 n/Anything");

    expect(outcome).toEqual({ ok: false, message: "Invalid Group" });
    expect(formatResult(outcome)).toBe("Error: Invalid Group");
  });

  it("reports unexpected errors instead of throwing", () => {
    jest.spyOn(service, "execute").mockImplementation(() => {
      throw new RangeError("boom");
    });

    const outcome = handleInput(service, "list");

    expect(outcome).toEqual({ ok: false, message: "Unexpected error: boom" });
    expect(formatResult(outcome)).toBe("Error: Unexpected error: boom");
  });

  it("reports a change whose save failed as applied", () => {
    const failing = new CommandService(new ModelManager(), {
      save: () => {
        throw new Error("EACCES: permission denied");
      },
    });
    jest.spyOn(console, "error").mockImplementation(() => undefined);

    const outcome = handleInput(failing, "add-group n/CS2103T");

    expect(outcome.ok).toBe(true);
    expect(failing.getModel().getFilteredGroupList().map(g => g.name)).toEqual(["CS2103T"]);
  });
});
