import { PREFIX_NAME, PREFIX_PERSON, PREFIX_PHONE, PREFIX_TAG, tokenize } from "./argumentTokenizer";

describe("tokenize", () => {
  it("splits the preamble from prefixed values", () => {
    const argMap = tokenize(" 1 n/CS2103T T12 t/lab t/core", [PREFIX_NAME, PREFIX_TAG]);

    expect(argMap.preamble).toBe("1");
    expect(argMap.getValue(PREFIX_NAME)).toBe("CS2103T T12");
    expect(argMap.getAllValues(PREFIX_TAG)).toEqual(["lab", "core"]);
  });

  it("reads a prefix at the very start", () => {
    const argMap = tokenize("n/John Doe ph/98765432", [PREFIX_NAME, PREFIX_PHONE]);

    expect(argMap.preamble).toBe("");
    expect(argMap.getValue(PREFIX_NAME)).toBe("John Doe");
    expect(argMap.getValue(PREFIX_PHONE)).toBe("98765432");
  });

  it("ignores prefixes that do not follow whitespace", () => {
    const argMap = tokenize(" n/john/doep/x", [PREFIX_NAME, PREFIX_PERSON]);

    expect(argMap.getValue(PREFIX_NAME)).toBe("john/doep/x");
    expect(argMap.has(PREFIX_PERSON)).toBe(false);
  });

  it("keeps the last value and reports repeats", () => {
    const argMap = tokenize(" n/A n/B", [PREFIX_NAME, PREFIX_TAG]);

    expect(argMap.getValue(PREFIX_NAME)).toBe("B");
    expect(argMap.getRepeated([PREFIX_NAME, PREFIX_TAG])).toEqual([PREFIX_NAME]);
  });

  it("returns undefined and an empty list for absent prefixes", () => {
    const argMap = tokenize("", [PREFIX_NAME]);

    expect(argMap.getValue(PREFIX_NAME)).toBeUndefined();
    expect(argMap.getAllValues(PREFIX_TAG)).toEqual([]);
  });
});
