/**
 * Model Manager
 *
 * Array-backed implementation of Model. Filtered views are recomputed from
 * the canonical arrays on each call.
 */

import { CommandError, CommandErrorCode } from "../commands/commandError";
import { Group } from "../domain/group";
import { AddressBookData, Model, Predicate, SHOW_ALL } from "../domain/model";
import { Person } from "../domain/person";

export class ModelManager implements Model {
  private readonly persons: Person[] = [];
  private readonly groups: Group[] = [];
  private personFilter: Predicate<Person> = SHOW_ALL;
  private groupFilter: Predicate<Group> = SHOW_ALL;

  constructor(initial?: AddressBookData) {
    if (initial) {
      initial.persons.forEach(p => this.addPerson(p));
      initial.groups.forEach(g => this.addGroup(g));
    }
  }

  // ============================================
  // Persons
  // ============================================

  getPerson(name: string): Person {
    const person = this.persons.find(p => p.name === name);
    if (!person) {
      throw new CommandError(CommandErrorCode.PERSON_NOT_FOUND, `No person named "${name}"`);
    }
    return person;
  }

  hasPerson(person: Person): boolean {
    return this.persons.some(p => p.isSamePerson(person));
  }

  addPerson(person: Person): void {
    if (this.hasPerson(person)) {
      throw new CommandError(
        CommandErrorCode.DUPLICATE_PERSON,
        "This person already exists in the address book."
      );
    }
    this.persons.push(person);
  }

  deletePerson(person: Person): void {
    const index = this.persons.findIndex(p => p.isSamePerson(person));
    if (index === -1) {
      throw new CommandError(CommandErrorCode.PERSON_NOT_FOUND, `No person named "${person.name}"`);
    }
    this.persons.splice(index, 1);
    for (const group of this.groups) {
      if (group.hasMember(person)) {
        group.removeMember(person);
      }
    }
  }

  // ============================================
  // Groups
  // ============================================

  getGroup(name: string): Group {
    const group = this.groups.find(g => g.name === name);
    if (!group) {
      throw new CommandError(CommandErrorCode.GROUP_NOT_FOUND, `No group named "${name}"`);
    }
    return group;
  }

  hasGroup(group: Group): boolean {
    return this.groups.some(g => g.isSameGroup(group));
  }

  addGroup(group: Group): void {
    if (this.hasGroup(group)) {
      throw duplicateGroup();
    }
    this.groups.push(group);
  }

  deleteGroup(group: Group): void {
    const index = this.groups.indexOf(group);
    if (index === -1) {
      throw new CommandError(CommandErrorCode.GROUP_NOT_FOUND, `No group named "${group.name}"`);
    }
    this.groups.splice(index, 1);
  }

  setGroup(target: Group, edited: Group): void {
    const index = this.groups.indexOf(target);
    if (index === -1) {
      throw new CommandError(CommandErrorCode.GROUP_NOT_FOUND, `No group named "${target.name}"`);
    }
    if (!target.isSameGroup(edited) && this.hasGroup(edited)) {
      throw duplicateGroup();
    }
    this.groups[index] = edited;
  }

  // ============================================
  // Filtered views
  // ============================================

  getFilteredPersonList(): readonly Person[] {
    return this.persons.filter(this.personFilter);
  }

  getFilteredGroupList(): readonly Group[] {
    return this.groups.filter(this.groupFilter);
  }

  updateFilteredPersonList(predicate: Predicate<Person>): void {
    this.personFilter = predicate;
  }

  updateFilteredGroupList(predicate: Predicate<Group>): void {
    this.groupFilter = predicate;
  }

  getAddressBook(): AddressBookData {
    return { persons: [...this.persons], groups: [...this.groups] };
  }
}

function duplicateGroup(): CommandError {
  return new CommandError(
    CommandErrorCode.DUPLICATE_GROUP,
    "This group already exists in the address book."
  );
}
