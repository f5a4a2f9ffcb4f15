/**
 * Model
 *
 * The in-memory store of all persons and groups for one session.
 * Commands receive it explicitly in execute(); there is no global instance.
 *
 * The filtered lists are what the user currently sees, and what
 * index-based commands (delete-person 2, edit-group 1 ...) address.
 * They keep insertion order.
 *
 * Not thread-safe: a host that submits commands concurrently must
 * serialize calls itself.
 */

import { Group } from "./group";
import { Person } from "./person";

export type Predicate<T> = (item: T) => boolean;

export const SHOW_ALL = (): boolean => true;

/**
 * Snapshot of the canonical collections, used for persistence
 */
export interface AddressBookData {
  persons: readonly Person[];
  groups: readonly Group[];
}

export interface Model {
  /** @throws CommandError PERSON_NOT_FOUND */
  getPerson(name: string): Person;
  hasPerson(person: Person): boolean;
  /** @throws CommandError DUPLICATE_PERSON */
  addPerson(person: Person): void;
  /** Removes the person from the model and from every group it belongs to */
  deletePerson(person: Person): void;

  /** @throws CommandError GROUP_NOT_FOUND */
  getGroup(name: string): Group;
  hasGroup(group: Group): boolean;
  /** @throws CommandError DUPLICATE_GROUP */
  addGroup(group: Group): void;
  deleteGroup(group: Group): void;
  /**
   * Replace target with edited, keeping its position.
   * @throws CommandError GROUP_NOT_FOUND or DUPLICATE_GROUP
   */
  setGroup(target: Group, edited: Group): void;

  getFilteredPersonList(): readonly Person[];
  getFilteredGroupList(): readonly Group[];
  updateFilteredPersonList(predicate: Predicate<Person>): void;
  updateFilteredGroupList(predicate: Predicate<Group>): void;

  getAddressBook(): AddressBookData;
}
