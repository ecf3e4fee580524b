import { describe, it, expect, vi } from "vitest";
import {
  naturalKey,
  naturalSort,
  compareNaturalKeys,
  sortTree,
  type Tree,
} from "../sorting/natural-sort.js";
import { formatJson } from "../generators/json.generator.js";

function keysOf(tree: Tree): string[] {
  if (!(tree instanceof Map)) throw new Error("expected a sorted mapping");
  return [...tree.keys()];
}

describe("naturalKey", () => {
  it("splits a dotted instance type into word, digit and other runs", () => {
    expect(naturalKey("m5.large")).toEqual([
      [-1n, "m", ""],
      [5n, "-1", ""],
      [-1n, "-1", "."],
      [-1n, "3", ""],
    ]);
  });

  it("keeps hyphens and underscores inside word runs", () => {
    expect(naturalKey("x-large")).toEqual([[-1n, "5", ""]]);
    expect(naturalKey("ec2_linux")).toEqual([
      [-1n, "ec", ""],
      [2n, "-1", ""],
      [-1n, "_linux", ""],
    ]);
  });

  it("returns an empty key for the empty string", () => {
    expect(naturalKey("")).toEqual([]);
  });
});

describe("compareNaturalKeys", () => {
  it("orders a key that is a prefix of another first", () => {
    expect(compareNaturalKeys(naturalKey("m5"), naturalKey("m5.large"))).toBeLessThan(0);
    expect(compareNaturalKeys(naturalKey("m5.large"), naturalKey("m5"))).toBeGreaterThan(0);
  });

  it("treats keys with equal runs as equal", () => {
    expect(compareNaturalKeys(naturalKey("m5.large"), naturalKey("m5.large"))).toBe(0);
  });
});

describe("naturalSort", () => {
  it("orders instance sizes by progression, then numerically", () => {
    expect(naturalSort(["m5.16xlarge", "m5.2xlarge", "m5.xlarge", "m5.large"])).toEqual([
      "m5.large",
      "m5.xlarge",
      "m5.2xlarge",
      "m5.16xlarge",
    ]);
  });

  it("ranks size words by the vocabulary, not the alphabet", () => {
    expect(naturalSort(["small", "micro", "large"])).toEqual(["micro", "small", "large"]);
    expect(naturalSort(["extra-large", "x-large", "xlarge", "medium"])).toEqual([
      "medium",
      "xlarge",
      "x-large",
      "extra-large",
    ]);
  });

  it("interleaves legacy size names numerically", () => {
    expect(naturalSort(["16xlarge", "4xlarge", "2xlarge"])).toEqual(["2xlarge", "4xlarge", "16xlarge"]);
  });

  it("compares long digit runs exactly", () => {
    expect(naturalSort(["k9007199254740993", "k9007199254740992"])).toEqual([
      "k9007199254740992",
      "k9007199254740993",
    ]);
    expect(naturalSort(["k9007199254740992", "k9007199254740993"])).toEqual([
      "k9007199254740992",
      "k9007199254740993",
    ]);
    expect(naturalSort(["k123456789012345678901", "k99"])).toEqual(["k99", "k123456789012345678901"]);
  });

  it("orders region codes by name then number", () => {
    expect(naturalSort(["us-west-2", "us-east-2", "us-east-1", "ap-south-1"])).toEqual([
      "ap-south-1",
      "us-east-1",
      "us-east-2",
      "us-west-2",
    ]);
  });

  it("reports a size word compared against another word", () => {
    const onMixedRank = vi.fn();
    expect(naturalSort(["zeta", "large"], { onMixedRank })).toEqual(["large", "zeta"]);
    expect(onMixedRank).toHaveBeenCalled();
    expect(new Set(onMixedRank.mock.calls[0])).toEqual(new Set(["zeta", "large"]));
  });

  it("does not report comparisons of one kind", () => {
    const onMixedRank = vi.fn();
    naturalSort(["small", "micro"], { onMixedRank });
    naturalSort(["beta", "alpha"], { onMixedRank });
    naturalSort(["2xlarge", "xlarge"], { onMixedRank });
    expect(onMixedRank).not.toHaveBeenCalled();
  });
});

describe("sortTree", () => {
  it("orders every nesting level", () => {
    const sorted = sortTree({
      updated: 1,
      compute: {
        ec2_linux: {
          "m5.xlarge": { "us-west-2": 0.192, "us-east-1": 0.192 },
          "m5.large": { "us-east-1": 0.096 },
        },
      },
    });

    expect(keysOf(sorted)).toEqual(["compute", "updated"]);
    if (!(sorted instanceof Map)) throw new Error("expected a sorted mapping");
    const compute = sorted.get("compute");
    if (!(compute instanceof Map)) throw new Error("expected a sorted mapping");
    const linux = compute.get("ec2_linux");
    if (!(linux instanceof Map)) throw new Error("expected a sorted mapping");

    expect(keysOf(linux)).toEqual(["m5.large", "m5.xlarge"]);
    const xlarge = linux.get("m5.xlarge");
    if (!(xlarge instanceof Map)) throw new Error("expected a sorted mapping");
    expect(keysOf(xlarge)).toEqual(["us-east-1", "us-west-2"]);
  });

  it("keeps natural order for integer-like keys", () => {
    const sorted = sortTree({ "10": 1, "9": 2, a: 3 });
    expect(keysOf(sorted)).toEqual(["a", "9", "10"]);
    expect(formatJson(sorted)).toBe('{\n    "a": 3,\n    "9": 2,\n    "10": 1\n}');
  });

  it("returns scalars and arrays unchanged", () => {
    const list = [{ b: 1, a: 2 }];
    expect(sortTree(5)).toBe(5);
    expect(sortTree("xlarge")).toBe("xlarge");
    expect(sortTree(null)).toBeNull();
    expect(sortTree(list)).toBe(list);
  });

  it("is idempotent", () => {
    const input = {
      updated: 1700000000,
      compute: {
        ec2_windows: { "t3.small": { "eu-west-1": 0.04 }, "t3.micro": {} },
        ec2_linux: { xlarge: { "us-east-1": 0.35 }, "2xlarge": { "us-east-1": 0.7 }, small: {} },
      },
    };

    const once = sortTree(input);
    const twice = sortTree(once);

    expect(formatJson(twice)).toBe(formatJson(once));
    expect(keysOf(twice)).toEqual(keysOf(once));
  });
});
