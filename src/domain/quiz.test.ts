import { describe, it, expect, vi, afterEach } from "vitest";
import { mathRandomIndex, pickRandom } from "./quiz.js";

describe("pickRandom", () => {
  it("returns null without drawing when there are no candidates", () => {
    const draw = vi.fn((max: number) => max - 1);
    expect(pickRandom([], draw)).toBeNull();
    expect(draw).not.toHaveBeenCalled();
  });

  it("returns the only candidate", () => {
    const draw = vi.fn(() => 0);
    expect(pickRandom([{ id: 5 }], draw)).toEqual({ id: 5 });
    expect(draw).toHaveBeenCalledWith(1);
  });

  it("returns the candidate at the drawn index", () => {
    expect(pickRandom(["a", "b", "c"], () => 2)).toBe("c");
  });

  it("rejects an index outside the candidate range", () => {
    expect(() => pickRandom(["a", "b"], () => 2)).toThrow(RangeError);
    expect(() => pickRandom(["a", "b"], () => -1)).toThrow(RangeError);
  });
});

describe("mathRandomIndex", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps Math.random onto [0, max)", () => {
    const random = vi.spyOn(Math, "random");
    random.mockReturnValueOnce(0);
    expect(mathRandomIndex(3)).toBe(0);
    random.mockReturnValueOnce(0.999);
    expect(mathRandomIndex(3)).toBe(2);
  });
});
