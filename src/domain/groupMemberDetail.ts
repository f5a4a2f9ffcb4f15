import { Person } from "./person";

/**
 * One person's participation record within one group.
 *
 * The record is owned by its Group and points at the Person without owning
 * it. Assignment names are unique per record; grading an assignment that
 * does not exist yet creates it, grading it again overwrites the score.
 */
export class GroupMemberDetail {
  readonly person: Person;
  private readonly grades: Map<string, number>;

  constructor(person: Person, grades?: Iterable<[string, number]>) {
    this.person = person;
    this.grades = new Map(grades ?? []);
  }

  gradeAssignment(assignmentName: string, score: number): void {
    this.grades.set(assignmentName, score);
  }

  getGrade(assignmentName: string): number | undefined {
    return this.grades.get(assignmentName);
  }

  /**
   * Copy of the grade mapping in the order assignments were first graded
   */
  getAssignments(): Map<string, number> {
    return new Map(this.grades);
  }

  isFor(person: Person): boolean {
    return this.person.isSamePerson(person);
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof GroupMemberDetail)) {
      return false;
    }
    if (!this.person.equals(other.person) || this.grades.size !== other.grades.size) {
      return false;
    }
    for (const [name, score] of this.grades) {
      if (other.grades.get(name) !== score) {
        return false;
      }
    }
    return true;
  }
}
