import { describe, it, expect } from "vitest";
import type { JdIndex } from "../schemas/jd-index.js";
import { sampleIndex, smallIndex } from "../test-utils/jd-tree.js";
import { matchNode, searchIndex, type IndexNode } from "./engine.js";

const root = "/jd";

function codes(index: JdIndex, options: Parameters<typeof searchIndex>[1]): string[] {
  return [...searchIndex(index, options)].map((r) => r.code);
}

describe("searchIndex", () => {
  describe("empty query", () => {
    it("lists every node grouped area, category, id in code order", () => {
      const results = [...searchIndex(smallIndex(), { query: "", root })];

      expect(results.map((r) => [r.level, r.code])).toEqual([
        ["area", "10-19"],
        ["category", "11"],
        ["category", "12"],
        ["id", "11.01"],
        ["id", "11.02"],
        ["id", "12.01"],
      ]);
      expect(results.every((r) => r.match === "listing")).toBe(true);
    });

    it("lists one level when filtered", () => {
      expect(codes(sampleIndex(), { level: "category", root })).toEqual(["11", "12", "21"]);
    });

    it("includes section dividers without a path", () => {
      const divider = [...searchIndex(sampleIndex(), { level: "id", root })].find(
        (r) => r.code === "11.10",
      );
      expect(divider).toMatchObject({ section: true, path: null, label: "11.10 Travel" });
    });
  });

  describe("text query", () => {
    it("ranks name-starts-with above substring", () => {
      expect(codes(sampleIndex(), { query: "heal", level: "id", root })).toEqual([
        "11.01",
        "11.02",
      ]);
    });

    it("is case-insensitive", () => {
      expect(codes(sampleIndex(), { query: "PASSPORT", root })).toEqual(["11.05"]);
    });

    it("ranks an exact code above name matches", () => {
      const index: JdIndex = {
        areas: {
          "10-19": {
            name: "10-19 Life admin",
            categories: {
              "12": { name: "12 13 Ghosts", ids: {} },
              "13": { name: "13 Misc", ids: {} },
            },
          },
        },
      };
      const results = [...searchIndex(index, { query: "13", level: "category", root })];
      expect(results.map((r) => [r.code, r.match])).toEqual([
        ["13", "code"],
        ["12", "prefix"],
      ]);
    });

    it("breaks ties by ascending code", () => {
      const results = [...searchIndex(sampleIndex(), { query: "1", level: "category", root })];
      expect(results.map((r) => [r.code, r.match])).toEqual([
        ["11", "prefix"],
        ["12", "prefix"],
        ["21", "substring"],
      ]);
    });

    it("groups results by level when unfiltered", () => {
      expect(codes(sampleIndex(), { query: "11", root })).toEqual([
        "11",
        "11.01",
        "11.02",
        "11.05",
        "11.11",
      ]);
    });

    it("matches when every word appears in the name", () => {
      const results = [...searchIndex(sampleIndex(), { query: "records health", root })];
      expect(results.map((r) => [r.code, r.match])).toEqual([["11.01", "words"]]);
    });

    it("never matches section dividers", () => {
      expect(codes(sampleIndex(), { query: "travel", root })).toEqual([]);
    });

    it("returns nothing when nothing matches", () => {
      expect(codes(sampleIndex(), { query: "zebra", root })).toEqual([]);
    });
  });

  describe("result records", () => {
    it("carry path, ancestors and breadcrumb", () => {
      const [visas] = searchIndex(sampleIndex(), { query: "visas", root });

      expect(visas).toEqual({
        level: "id",
        code: "11.11",
        name: "11.11 Visas",
        label: "11.11 Visas",
        area: "10-19",
        category: "11",
        id: "11.11",
        section: false,
        breadcrumb: ["10-19 Life admin", "11 Me", "11.10 Travel"],
        path: "/jd/10-19 Life admin/11 Me/11.11 Visas",
        match: "prefix",
      });
    });

    it("resolve area paths", () => {
      const [area] = searchIndex(sampleIndex(), { query: "work", level: "area", root });
      expect(area.path).toBe("/jd/20-29 Work");
      expect(area.breadcrumb).toEqual([]);
    });
  });

  describe("laziness", () => {
    it("stops after the limit", () => {
      expect(codes(sampleIndex(), { query: "", root, limit: 2 })).toEqual(["10-19", "20-29"]);
    });

    it("produces results on demand and cannot be restarted", () => {
      const results = searchIndex(sampleIndex(), { query: "", level: "area", root });

      const first = results.next();
      expect(first.done ? null : first.value.code).toBe("10-19");
      expect([...results].map((r) => r.code)).toEqual(["20-29"]);
      expect([...results]).toEqual([]);
    });
  });
});

describe("matchNode", () => {
  const node: IndexNode = {
    level: "id",
    code: "11.01",
    name: "11.01 Health Records",
    area: "10-19",
    category: "11",
    id: "11.01",
    section: false,
    breadcrumb: [],
  };

  it("classifies each kind of match", () => {
    expect(matchNode(node, "11.01")).toBe("code");
    expect(matchNode(node, "health")).toBe("prefix");
    expect(matchNode(node, "11.0")).toBe("prefix");
    expect(matchNode(node, "records")).toBe("substring");
    expect(matchNode(node, "records health")).toBe("words");
    expect(matchNode(node, "bills")).toBeNull();
  });
});
