import { describe, it, expect } from "vitest";
import { InvalidNameError } from "../errors/catalog.js";
import {
  matchLevelPattern,
  malformedAreaCode,
  stripCodePrefix,
  folderNameFor,
  isFolderNameFor,
  isSectionName,
  sectionLabel,
} from "./match.js";

describe("matchLevelPattern", () => {
  it("classifies an area folder", () => {
    expect(matchLevelPattern("10-19 Life admin")).toEqual({
      level: "area",
      code: "10-19",
      label: "Life admin",
    });
  });

  it("classifies a category folder", () => {
    expect(matchLevelPattern("11 Me")).toEqual({
      level: "category",
      code: "11",
      label: "Me",
    });
  });

  it("classifies an id folder", () => {
    expect(matchLevelPattern("11.01 Inbox")).toEqual({
      level: "id",
      code: "11.01",
      label: "Inbox",
    });
  });

  it("returns null for folders outside the numbering", () => {
    expect(matchLevelPattern("Photos")).toBeNull();
    expect(matchLevelPattern("11Inbox")).toBeNull();
    expect(matchLevelPattern("11.1 Inbox")).toBeNull();
    expect(matchLevelPattern("10-19")).toBeNull();
  });

  it("does not treat a badly ranged area as an area", () => {
    expect(matchLevelPattern("10-29 Misc")).toBeNull();
    expect(malformedAreaCode("10-29 Misc")).toBe("10-29");
    expect(malformedAreaCode("10-19 Life admin")).toBeNull();
  });
});

describe("stripCodePrefix", () => {
  it("removes the code and following whitespace", () => {
    expect(stripCodePrefix("11.01", "11.01 Health Records")).toBe("Health Records");
  });

  it("leaves names without the prefix alone", () => {
    expect(stripCodePrefix("11.01", "Health Records")).toBe("Health Records");
    expect(stripCodePrefix("11", "11.01 Inbox")).toBe("11.01 Inbox");
  });
});

describe("folderNameFor", () => {
  it("prefixes the code", () => {
    expect(folderNameFor("11.03", "Taxes")).toBe("11.03 Taxes");
  });

  it("trims surrounding whitespace from a bare name", () => {
    expect(folderNameFor("11.03", "  Taxes ")).toBe("11.03 Taxes");
  });

  it("does not double a code prefix", () => {
    expect(folderNameFor("11.03", "11.03 Taxes")).toBe("11.03 Taxes");
  });

  it("is idempotent", () => {
    const once = folderNameFor("20-29", "Work");
    expect(folderNameFor("20-29", once)).toBe(once);
  });

  it("throws InvalidNameError for an empty name", () => {
    expect(() => folderNameFor("11.03", "   ")).toThrow(InvalidNameError);
    expect(() => folderNameFor("11.03", "11.03")).toThrow(InvalidNameError);
  });
});

describe("isFolderNameFor", () => {
  it("accepts prefixed and bare names", () => {
    expect(isFolderNameFor("11.03", "11.03 Taxes")).toBe(true);
    expect(isFolderNameFor("11.03", "Taxes")).toBe(true);
  });

  it("accepts a prefixed name with nothing after the code", () => {
    expect(isFolderNameFor("11.03", "11.03 ")).toBe(true);
  });

  it("rejects empty names and bare codes", () => {
    expect(isFolderNameFor("11.03", "")).toBe(false);
    expect(isFolderNameFor("11.03", "  ")).toBe(false);
    expect(isFolderNameFor("11.03", "11.03")).toBe(false);
  });
});

describe("section names", () => {
  it("detects the section marker", () => {
    expect(isSectionName("11.10 ■ Finances")).toBe(true);
    expect(isSectionName("11.11 Bank")).toBe(false);
  });

  it("strips the marker for display", () => {
    expect(sectionLabel("11.10 ■ Finances")).toBe("11.10 Finances");
  });
});
