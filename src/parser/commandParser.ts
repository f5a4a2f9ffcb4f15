/**
 * Command Parser
 *
 * Turns one line of user input into a Command. The first word selects the
 * command; the rest is split by prefix (see argumentTokenizer).
 */

import { AddGroupCommand } from "../commands/addGroupCommand";
import { AddPersonCommand } from "../commands/addPersonCommand";
import { AddToGroupCommand } from "../commands/addToGroupCommand";
import { Command } from "../commands/command";
import { CommandError, CommandErrorCode } from "../commands/commandError";
import { DeleteGroupCommand } from "../commands/deleteGroupCommand";
import { DeletePersonCommand } from "../commands/deletePersonCommand";
import { EditGroupCommand } from "../commands/editGroupCommand";
import { ExitCommand } from "../commands/exitCommand";
import { FindGroupCommand } from "../commands/findGroupCommand";
import { GradeAssignmentCommand } from "../commands/gradeAssignmentCommand";
import { HelpCommand } from "../commands/helpCommand";
import { ListCommand } from "../commands/listCommand";
import { RemoveFromGroupCommand } from "../commands/removeFromGroupCommand";
import { ViewGradesCommand } from "../commands/viewGradesCommand";
import { Group } from "../domain/group";
import { Person } from "../domain/person";
import { Tag } from "../domain/tag";
import {
  ArgumentMultimap,
  PREFIX_ASSIGNMENT,
  PREFIX_EMAIL,
  PREFIX_GROUP,
  PREFIX_NAME,
  PREFIX_PERSON,
  PREFIX_PHONE,
  PREFIX_SCORE,
  PREFIX_TAG,
  tokenize,
} from "./argumentTokenizer";

export const MESSAGE_UNKNOWN_COMMAND = "Unknown command";

// Plain decimals only: no hex, exponent or Infinity
const DECIMAL_SCORE = /^-?\d+(\.\d+)?$/;

type ParseFn = (args: string) => Command;

const PARSERS: Record<string, ParseFn> = {
  [AddPersonCommand.COMMAND_WORD]: parseAddPerson,
  [DeletePersonCommand.COMMAND_WORD]: args =>
    new DeletePersonCommand(parseIndex(args, DeletePersonCommand.MESSAGE_USAGE)),
  [AddGroupCommand.COMMAND_WORD]: parseAddGroup,
  [EditGroupCommand.COMMAND_WORD]: parseEditGroup,
  [DeleteGroupCommand.COMMAND_WORD]: args =>
    new DeleteGroupCommand(parseIndex(args, DeleteGroupCommand.MESSAGE_USAGE)),
  [AddToGroupCommand.COMMAND_WORD]: args => {
    const { personName, groupName } = parseMembership(args, AddToGroupCommand.MESSAGE_USAGE);
    return new AddToGroupCommand(personName, groupName);
  },
  [RemoveFromGroupCommand.COMMAND_WORD]: args => {
    const { personName, groupName } = parseMembership(args, RemoveFromGroupCommand.MESSAGE_USAGE);
    return new RemoveFromGroupCommand(personName, groupName);
  },
  [ViewGradesCommand.COMMAND_WORD]: args => {
    const { personName, groupName } = parseMembership(args, ViewGradesCommand.MESSAGE_USAGE);
    return new ViewGradesCommand(personName, groupName);
  },
  [GradeAssignmentCommand.COMMAND_WORD]: parseGradeAssignment,
  [FindGroupCommand.COMMAND_WORD]: parseFindGroup,
  [ListCommand.COMMAND_WORD]: () => new ListCommand(),
  [HelpCommand.COMMAND_WORD]: () => new HelpCommand(),
  [ExitCommand.COMMAND_WORD]: () => new ExitCommand(),
};

export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  const match = /^(\S+)(.*)$/s.exec(trimmed);
  if (!match) {
    throw invalidFormat(HelpCommand.MESSAGE_USAGE);
  }

  const [, commandWord, args] = match;
  const parse = Object.hasOwn(PARSERS, commandWord) ? PARSERS[commandWord] : undefined;
  if (!parse) {
    throw new CommandError(CommandErrorCode.UNKNOWN_COMMAND, `${MESSAGE_UNKNOWN_COMMAND}: ${commandWord}`);
  }
  return parse(args);
}

export function getCommandWord(input: string): string {
  return input.trim().split(/\s+/)[0] ?? "";
}

// ============================================
// Per-command parsing
// ============================================

function parseAddPerson(args: string): AddPersonCommand {
  const argMap = tokenize(args, [PREFIX_NAME, PREFIX_PHONE, PREFIX_EMAIL]);
  const usage = AddPersonCommand.MESSAGE_USAGE;
  requireEmptyPreamble(argMap, usage);
  requireNoRepeats(argMap, [PREFIX_NAME, PREFIX_PHONE, PREFIX_EMAIL]);

  return new AddPersonCommand(
    new Person({
      name: requireValue(argMap, PREFIX_NAME, usage),
      phone: argMap.getValue(PREFIX_PHONE) || undefined,
      email: argMap.getValue(PREFIX_EMAIL) || undefined,
    })
  );
}

function parseAddGroup(args: string): AddGroupCommand {
  const argMap = tokenize(args, [PREFIX_NAME, PREFIX_TAG]);
  const usage = AddGroupCommand.MESSAGE_USAGE;
  requireEmptyPreamble(argMap, usage);
  requireNoRepeats(argMap, [PREFIX_NAME]);

  return new AddGroupCommand(new Group(requireValue(argMap, PREFIX_NAME, usage), [], parseTags(argMap)));
}

function parseEditGroup(args: string): EditGroupCommand {
  const argMap = tokenize(args, [PREFIX_NAME, PREFIX_TAG]);
  const usage = EditGroupCommand.MESSAGE_USAGE;
  requireNoRepeats(argMap, [PREFIX_NAME]);

  const index = parseIndex(argMap.preamble, usage);
  return new EditGroupCommand(index, requireValue(argMap, PREFIX_NAME, usage), parseTags(argMap));
}

function parseGradeAssignment(args: string): GradeAssignmentCommand {
  const prefixes = [PREFIX_PERSON, PREFIX_GROUP, PREFIX_ASSIGNMENT, PREFIX_SCORE];
  const argMap = tokenize(args, prefixes);
  const usage = GradeAssignmentCommand.MESSAGE_USAGE;
  requireEmptyPreamble(argMap, usage);
  requireNoRepeats(argMap, prefixes);

  const rawScore = requireValue(argMap, PREFIX_SCORE, usage);
  if (!DECIMAL_SCORE.test(rawScore)) {
    throw new CommandError(CommandErrorCode.INVALID_ARGUMENT, `Score must be a number, got "${rawScore}"`);
  }
  const score = Number(rawScore);

  return new GradeAssignmentCommand(
    requireValue(argMap, PREFIX_PERSON, usage),
    requireValue(argMap, PREFIX_GROUP, usage),
    requireValue(argMap, PREFIX_ASSIGNMENT, usage),
    score
  );
}

function parseFindGroup(args: string): FindGroupCommand {
  const keywords = args.trim().split(/\s+/).filter(Boolean);
  if (keywords.length === 0) {
    throw invalidFormat(FindGroupCommand.MESSAGE_USAGE);
  }
  return new FindGroupCommand(keywords);
}

function parseMembership(args: string, usage: string): { personName: string; groupName: string } {
  const argMap = tokenize(args, [PREFIX_PERSON, PREFIX_GROUP]);
  requireEmptyPreamble(argMap, usage);
  requireNoRepeats(argMap, [PREFIX_PERSON, PREFIX_GROUP]);
  return {
    personName: requireValue(argMap, PREFIX_PERSON, usage),
    groupName: requireValue(argMap, PREFIX_GROUP, usage),
  };
}

// ============================================
// Helpers
// ============================================

function parseIndex(text: string, usage: string): number {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw invalidFormat(usage);
  }
  return Number(trimmed);
}

function parseTags(argMap: ArgumentMultimap): Tag[] {
  return argMap.getAllValues(PREFIX_TAG).map(label => new Tag(label));
}

function requireValue(argMap: ArgumentMultimap, prefix: string, usage: string): string {
  const value = argMap.getValue(prefix);
  if (!value) {
    throw invalidFormat(usage);
  }
  return value;
}

function requireEmptyPreamble(argMap: ArgumentMultimap, usage: string): void {
  if (argMap.preamble !== "") {
    throw invalidFormat(usage);
  }
}

function requireNoRepeats(argMap: ArgumentMultimap, prefixes: readonly string[]): void {
  const repeated = argMap.getRepeated(prefixes);
  if (repeated.length > 0) {
    throw new CommandError(
      CommandErrorCode.INVALID_FORMAT,
      `Multiple values specified for the following single-valued field(s): ${repeated.join(" ")}`
    );
  }
}

function invalidFormat(usage: string): CommandError {
  return new CommandError(CommandErrorCode.INVALID_FORMAT, `Invalid command format!\n${usage}`);
}
