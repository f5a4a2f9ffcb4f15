/**
 * Group Domain Model
 *
 * A named collection of persons with shared tags, e.g. a tutorial group
 * "CS2103T T12" or a project team. Group names are unique within the
 * address book.
 *
 * Relationships:
 * - Group has members (via GroupMemberDetail, one per Person, in join order)
 * - Each member record carries that person's assignment grades
 * - Group has Tags (unique by label)
 */

import { CommandError, CommandErrorCode } from "../commands/commandError";
import { GroupMemberDetail } from "./groupMemberDetail";
import { Person } from "./person";
import { Tag, sameTags, uniqueTags } from "./tag";

export class Group {
  readonly name: string;
  private readonly members: GroupMemberDetail[];
  private readonly tags: Tag[];

  constructor(name: string, members: Iterable<GroupMemberDetail> = [], tags: Iterable<Tag> = []) {
    this.name = name;
    this.members = [];
    for (const detail of members) {
      if (this.members.some(m => m.isFor(detail.person))) {
        throw new CommandError(
          CommandErrorCode.DUPLICATE_MEMBER,
          `${detail.person.name} is already in ${name}`
        );
      }
      this.members.push(detail);
    }
    this.tags = uniqueTags(tags);
  }

  getGroupMembers(): Person[] {
    return this.members.map(m => m.person);
  }

  getGroupMemberDetails(): readonly GroupMemberDetail[] {
    return [...this.members];
  }

  getTags(): readonly Tag[] {
    return [...this.tags];
  }

  hasMember(person: Person): boolean {
    return this.members.some(m => m.isFor(person));
  }

  addMember(person: Person): GroupMemberDetail {
    if (this.hasMember(person)) {
      throw new CommandError(
        CommandErrorCode.DUPLICATE_MEMBER,
        `${person.name} is already in ${this.name}`
      );
    }
    const detail = new GroupMemberDetail(person);
    this.members.push(detail);
    return detail;
  }

  removeMember(person: Person): void {
    const index = this.members.findIndex(m => m.isFor(person));
    if (index === -1) {
      throw notAMember(person, this);
    }
    this.members.splice(index, 1);
  }

  /**
   * Membership record of the person in this group
   */
  getGroupMemberDetail(person: Person): GroupMemberDetail {
    const detail = this.members.find(m => m.isFor(person));
    if (!detail) {
      throw notAMember(person, this);
    }
    return detail;
  }

  /**
   * Weaker notion of equality used for duplicate detection
   */
  isSameGroup(other: Group): boolean {
    return other === this || other.name === this.name;
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof Group)) {
      return false;
    }
    const otherMembers = other.members;
    return (
      this.name === other.name &&
      this.members.length === otherMembers.length &&
      this.members.every((m, i) => m.equals(otherMembers[i])) &&
      sameTags(this.tags, other.tags)
    );
  }

  toString(): string {
    const tagText = this.tags.map(t => t.toString()).join("");
    return `${this.name}${tagText ? " " + tagText : ""} (${this.members.length} member${this.members.length === 1 ? "" : "s"})`;
  }
}

function notAMember(person: Person, group: Group): CommandError {
  return new CommandError(
    CommandErrorCode.NOT_A_MEMBER,
    `${person.name} is not a member of ${group.name}`
  );
}
