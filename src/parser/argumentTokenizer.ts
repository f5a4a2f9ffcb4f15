/**
 * Splits "1 n/CS2103T t/tutorial t/core" into a preamble ("1") and the
 * values given for each prefix. A prefix only counts when it starts the
 * input or follows whitespace, so "john/doe" is not read as a prefix.
 */

export const PREFIX_NAME = "n/";
export const PREFIX_PHONE = "ph/";
export const PREFIX_EMAIL = "e/";
export const PREFIX_TAG = "t/";
export const PREFIX_PERSON = "p/";
export const PREFIX_GROUP = "g/";
export const PREFIX_ASSIGNMENT = "a/";
export const PREFIX_SCORE = "s/";

export class ArgumentMultimap {
  private readonly values = new Map<string, string[]>();

  constructor(readonly preamble: string) {}

  put(prefix: string, value: string): void {
    const existing = this.values.get(prefix);
    if (existing) {
      existing.push(value);
    } else {
      this.values.set(prefix, [value]);
    }
  }

  /**
   * Last value given for the prefix, if any
   */
  getValue(prefix: string): string | undefined {
    const all = this.values.get(prefix);
    return all ? all[all.length - 1] : undefined;
  }

  getAllValues(prefix: string): string[] {
    return [...(this.values.get(prefix) ?? [])];
  }

  has(prefix: string): boolean {
    return this.values.has(prefix);
  }

  /**
   * Prefixes that were given more than once, among those that only allow one
   */
  getRepeated(prefixes: readonly string[]): string[] {
    return prefixes.filter(p => (this.values.get(p)?.length ?? 0) > 1);
  }
}

interface PrefixPosition {
  prefix: string;
  start: number;
}

export function tokenize(args: string, prefixes: readonly string[]): ArgumentMultimap {
  const padded = ` ${args}`;
  const positions: PrefixPosition[] = [];

  for (const prefix of prefixes) {
    const pattern = new RegExp(`\\s${escapeRegExp(prefix)}`, "g");
    for (const match of padded.matchAll(pattern)) {
      positions.push({ prefix, start: (match.index ?? 0) + 1 });
    }
  }
  positions.sort((a, b) => a.start - b.start);

  const firstStart = positions.length > 0 ? positions[0].start : padded.length;
  const multimap = new ArgumentMultimap(padded.slice(0, firstStart).trim());

  positions.forEach((pos, i) => {
    const end = i + 1 < positions.length ? positions[i + 1].start : padded.length;
    multimap.put(pos.prefix, padded.slice(pos.start + pos.prefix.length, end).trim());
  });

  return multimap;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
