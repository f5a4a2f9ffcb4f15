/**
 * Address Book Store
 *
 * Persists persons, groups, memberships and grades as a single JSON file.
 * Members are written by person name and re-linked to the loaded Person
 * objects on the way back in.
 */

import fs from "fs";
import path from "path";
import { Group } from "../domain/group";
import { GroupMemberDetail } from "../domain/groupMemberDetail";
import { AddressBookData } from "../domain/model";
import { Person, PersonData } from "../domain/person";
import { Tag } from "../domain/tag";

export interface StoredGrade {
  assignment: string;
  score: number;
}

export interface StoredMember {
  personName: string;
  // Array rather than object: object keys that look like integers would be reordered
  grades: StoredGrade[];
}

export interface StoredGroup {
  name: string;
  tags: string[];
  members: StoredMember[];
}

export interface StoredAddressBook {
  persons: PersonData[];
  groups: StoredGroup[];
}

const EMPTY: AddressBookData = { persons: [], groups: [] };

export class AddressBookStore {
  constructor(readonly filePath: string) {}

  /**
   * Load the address book. A missing file is an empty address book; an
   * unreadable one is reported and treated as empty.
   */
  load(): AddressBookData {
    if (!fs.existsSync(this.filePath)) {
      return EMPTY;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      console.error(`Could not read address book at ${this.filePath}:`, error);
      return EMPTY;
    }

    return fromStored(raw);
  }

  save(data: AddressBookData): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify(toStored(data), null, 2), "utf-8");
  }
}

export function toStored(data: AddressBookData): StoredAddressBook {
  return {
    persons: data.persons.map(p => p.toData()),
    groups: data.groups.map(g => ({
      name: g.name,
      tags: g.getTags().map(t => t.label),
      members: g.getGroupMemberDetails().map(d => ({
        personName: d.person.name,
        grades: toStoredGrades(d.getAssignments()),
      })),
    })),
  };
}

/**
 * Rebuild entities from parsed JSON. Entries that fail validation are
 * skipped with a warning; the rest of the file still loads.
 */
export function fromStored(raw: unknown): AddressBookData {
  if (!isRecord(raw)) {
    console.error("Address book file is not a JSON object, starting empty");
    return EMPTY;
  }

  const persons: Person[] = [];
  for (const entry of asArray(raw.persons)) {
    if (!isRecord(entry) || !isNonEmptyString(entry.name)) {
      console.warn("Skipping invalid person entry:", entry);
      continue;
    }
    const name = entry.name;
    if (persons.some(p => p.name === name)) {
      console.warn(`Skipping duplicate person "${name}"`);
      continue;
    }
    persons.push(new Person({
      name,
      phone: typeof entry.phone === "string" ? entry.phone : undefined,
      email: typeof entry.email === "string" ? entry.email : undefined,
    }));
  }

  const groups: Group[] = [];
  for (const entry of asArray(raw.groups)) {
    const group = groupFromStored(entry, persons);
    if (!group) {
      console.warn("Skipping invalid group entry:", entry);
      continue;
    }
    if (groups.some(g => g.isSameGroup(group))) {
      console.warn(`Skipping duplicate group "${group.name}"`);
      continue;
    }
    groups.push(group);
  }

  return { persons, groups };
}

function groupFromStored(entry: unknown, persons: readonly Person[]): Group | null {
  if (!isRecord(entry) || !isNonEmptyString(entry.name)) {
    return null;
  }
  const name = entry.name;

  const tags = asArray(entry.tags)
    .filter((label): label is string => typeof label === "string" && Tag.isValidLabel(label))
    .map(label => new Tag(label));

  const members: GroupMemberDetail[] = [];
  for (const stored of asArray(entry.members)) {
    if (!isRecord(stored) || typeof stored.personName !== "string") {
      continue;
    }
    const personName = stored.personName;
    const person = persons.find(p => p.name === personName);
    if (!person || members.some(m => m.isFor(person))) {
      continue;
    }
    members.push(new GroupMemberDetail(person, gradesFromStored(stored.grades)));
  }

  return new Group(name, members, tags);
}

export function toStoredGrades(grades: Map<string, number>): StoredGrade[] {
  return [...grades].map(([assignment, score]) => ({ assignment, score }));
}

function gradesFromStored(raw: unknown): [string, number][] {
  const grades: [string, number][] = [];
  for (const entry of asArray(raw)) {
    if (
      isRecord(entry) &&
      typeof entry.assignment === "string" &&
      typeof entry.score === "number" &&
      Number.isFinite(entry.score)
    ) {
      grades.push([entry.assignment, entry.score]);
    }
  }
  return grades;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}
