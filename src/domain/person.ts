/**
 * Person Domain Model
 *
 * A named individual tracked in the address book.
 * Identity is the exact (case-sensitive) name; two persons with the same
 * name cannot coexist in one model.
 *
 * Relationships:
 * - Person can belong to many Groups (via GroupMemberDetail)
 * - Groups reference the Person, they never own it
 */

export interface PersonData {
  name: string;
  phone?: string;
  email?: string;
}

export class Person {
  readonly name: string;
  readonly phone?: string;
  readonly email?: string;

  constructor(data: PersonData) {
    this.name = data.name;
    this.phone = data.phone;
    this.email = data.email;
  }

  /**
   * Weaker notion of equality used for duplicate detection
   */
  isSamePerson(other: Person): boolean {
    return other === this || other.name === this.name;
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof Person)) {
      return false;
    }
    return (
      this.name === other.name &&
      this.phone === other.phone &&
      this.email === other.email
    );
  }

  toData(): PersonData {
    return { name: this.name, phone: this.phone, email: this.email };
  }

  toString(): string {
    const parts = [this.name];
    if (this.phone) parts.push(`Phone: ${this.phone}`);
    if (this.email) parts.push(`Email: ${this.email}`);
    return parts.join("; ");
  }
}
