/**
 * Command API Routes
 *
 * POST /api/commands runs one line of command text, exactly as typed in
 * the CLI. The GET routes expose the currently displayed lists.
 */

import { Router } from "express";
import { CommandError } from "../../commands/commandError";
import { Group } from "../../domain/group";
import { CommandService } from "../../services/commandService";
import { toStoredGrades } from "../../stores/addressBookStore";

export function serializeGroup(group: Group) {
  return {
    name: group.name,
    tags: group.getTags().map(t => t.label),
    members: group.getGroupMemberDetails().map(d => ({
      personName: d.person.name,
      grades: toStoredGrades(d.getAssignments()),
    })),
  };
}

export function createCommandsRouter(service: CommandService): Router {
  const router = Router();

  /**
   * POST /api/commands
   * Body: { input: "grade-assignment p/John Doe g/CS2103T a/Submit UML s/95" }
   */
  router.post("/commands", (req, res) => {
    const input: unknown = req.body?.input;
    if (typeof input !== "string" || input.trim().length === 0) {
      return res.status(400).json({ error: "input is required" });
    }

    try {
      const result = service.execute(input);
      res.json({
        feedback: result.feedbackToUser,
        showHelp: result.showHelp,
        exit: result.exit,
      });
    } catch (error) {
      if (error instanceof CommandError) {
        return res.status(400).json({ error: error.message, code: error.code });
      }
      console.error("Error executing command:", error);
      res.status(500).json({ error: "Failed to execute command" });
    }
  });

  // GET /api/persons - Displayed person list
  router.get("/persons", (req, res) => {
    res.json(service.getModel().getFilteredPersonList().map(p => p.toData()));
  });

  // GET /api/groups - Displayed group list with members and grades
  router.get("/groups", (req, res) => {
    res.json(service.getModel().getFilteredGroupList().map(serializeGroup));
  });

  return router;
}
