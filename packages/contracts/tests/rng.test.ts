import { describe, expect, it } from "vitest";
import { choice, probability, range, sample } from "../src";

const constant = (value: number) => () => value;

describe("range", () => {
  it("maps the bottom of the unit interval to min", () => {
    expect(range(constant(0), 3, 6)).toBe(3);
  });

  it("maps the top of the unit interval to max", () => {
    expect(range(constant(0.9999), 3, 6)).toBe(6);
  });

  it("handles negative bounds", () => {
    expect(range(constant(0), -10, 10)).toBe(-10);
    expect(range(constant(0.5), -10, 10)).toBe(0);
  });
});

describe("choice", () => {
  it("returns undefined for an empty array", () => {
    expect(choice(constant(0.5), [])).toBeUndefined();
  });

  it("indexes by the scaled draw", () => {
    expect(choice(constant(0.5), ["a", "b", "c", "d"])).toBe("c");
    expect(choice(constant(0), ["a", "b", "c", "d"])).toBe("a");
  });
});

describe("sample", () => {
  it("takes leading elements when every draw is 0", () => {
    expect(sample(constant(0), ["a", "b", "c"], 2)).toEqual(["a", "b"]);
  });

  it("swaps drawn elements out of the pool", () => {
    // i=0 draws index 2 ("c"), pool becomes [c, b, a]; i=1 draws index 2 ("a")
    expect(sample(constant(0.99), ["a", "b", "c"], 2)).toEqual(["c", "a"]);
  });

  it("clamps the count to the pool size", () => {
    const picked = sample(constant(0.3), ["a", "b", "c"], 10);
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
  });

  it("returns nothing for a non-positive count", () => {
    expect(sample(constant(0.3), ["a", "b"], 0)).toEqual([]);
    expect(sample(constant(0.3), ["a", "b"], -2)).toEqual([]);
  });

  it("does not mutate the input", () => {
    const pool = ["a", "b", "c"];
    sample(constant(0.99), pool, 3);
    expect(pool).toEqual(["a", "b", "c"]);
  });
});

describe("probability", () => {
  it("is true only strictly below the chance", () => {
    expect(probability(constant(0.29), 0.3)).toBe(true);
    expect(probability(constant(0.3), 0.3)).toBe(false);
  });

  it("never fires at chance 0", () => {
    expect(probability(constant(0), 0)).toBe(false);
  });
});
