import { CommandError, CommandErrorCode } from "../commands/commandError";

const VALID_TAG = /^[\p{L}\p{N}]+$/u;

export const MESSAGE_TAG_CONSTRAINTS = "Tag names should be alphanumeric";

/**
 * A label attached to a Group. Equal by label.
 */
export class Tag {
  readonly label: string;

  constructor(label: string) {
    if (!Tag.isValidLabel(label)) {
      throw new CommandError(CommandErrorCode.INVALID_ARGUMENT, `${MESSAGE_TAG_CONSTRAINTS}: "${label}"`);
    }
    this.label = label;
  }

  static isValidLabel(label: string): boolean {
    return VALID_TAG.test(label);
  }

  equals(other: unknown): boolean {
    return other instanceof Tag && other.label === this.label;
  }

  toString(): string {
    return `[${this.label}]`;
  }
}

/**
 * Drop repeated labels, keeping the first occurrence of each.
 */
export function uniqueTags(tags: Iterable<Tag>): Tag[] {
  const seen = new Set<string>();
  const result: Tag[] = [];
  for (const tag of tags) {
    if (!seen.has(tag.label)) {
      seen.add(tag.label);
      result.push(tag);
    }
  }
  return result;
}

/**
 * Set equality over tag labels (order ignored)
 */
export function sameTags(a: readonly Tag[], b: readonly Tag[]): boolean {
  const left = new Set(a.map(t => t.label));
  const right = new Set(b.map(t => t.label));
  if (left.size !== right.size) {
    return false;
  }
  for (const label of left) {
    if (!right.has(label)) {
      return false;
    }
  }
  return true;
}
