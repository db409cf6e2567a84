import { describe, it, expect } from "vitest";
import { JdIndexSchema } from "./jd-index.js";

const valid = {
  areas: {
    "10-19": {
      name: "10-19 Life admin",
      categories: {
        "11": {
          name: "11 Me",
          ids: {
            "11.01": { name: "11.01 Inbox" },
            "11.10": { name: "11.10 ■ Health", section: true },
          },
        },
      },
    },
  },
};

describe("JdIndexSchema", () => {
  it("accepts a well-formed index", () => {
    expect(JdIndexSchema.parse(valid)).toEqual(valid);
  });

  it("accepts an empty index", () => {
    expect(JdIndexSchema.parse({ areas: {} })).toEqual({ areas: {} });
  });

  it("rejects a missing areas key", () => {
    expect(JdIndexSchema.safeParse({}).success).toBe(false);
  });

  it("rejects an area code that is not a ten-number range", () => {
    const result = JdIndexSchema.safeParse({
      areas: { "10-29": { name: "10-29 Bad", categories: {} } },
    });
    expect(result.success).toBe(false);
  });

  it("rejects a category outside its area", () => {
    const result = JdIndexSchema.safeParse({
      areas: {
        "10-19": {
          name: "10-19 Life admin",
          categories: { "21": { name: "21 Misc", ids: {} } },
        },
      },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        "Category 21 is outside area 10-19",
      );
    }
  });

  it("rejects an id whose prefix differs from its category", () => {
    const result = JdIndexSchema.safeParse({
      areas: {
        "10-19": {
          name: "10-19 Life admin",
          categories: {
            "11": { name: "11 Me", ids: { "12.01": { name: "12.01 Stray" } } },
          },
        },
      },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual([
        "areas",
        "10-19",
        "categories",
        "11",
        "ids",
        "12.01",
      ]);
    }
  });

  it("rejects an entry without a name", () => {
    const result = JdIndexSchema.safeParse({
      areas: { "10-19": { categories: {} } },
    });
    expect(result.success).toBe(false);
  });

  it("rejects names a folder path cannot be built from", () => {
    const result = JdIndexSchema.safeParse({
      areas: {
        "10-19": {
          name: "10-19 Life admin",
          categories: {
            "11": {
              name: "11 Me",
              ids: { "11.01": { name: "11.01" }, "11.02": { name: "" } },
            },
          },
        },
      },
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => [issue.path.join("."), issue.message])).toEqual([
      ["areas.10-19.categories.11.ids.11.01.name", "Name of 11.01 must be more than its code"],
      ["areas.10-19.categories.11.ids.11.02.name", "Name of 11.02 must be more than its code"],
    ]);
  });

  it("rejects an area or category named only by its code", () => {
    const result = JdIndexSchema.safeParse({
      areas: { "10-19": { name: "10-19", categories: { "11": { name: " ", ids: {} } } } },
    });

    expect(result.error?.issues.map((issue) => issue.path.join("."))).toEqual([
      "areas.10-19.name",
      "areas.10-19.categories.11.name",
    ]);
  });
});
