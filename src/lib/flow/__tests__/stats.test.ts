import { describe, expect, it } from "vitest";
import { median, robustZscore } from "../index.js";

describe("median", () => {
  it("handles odd and even lengths", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("does not reorder the input", () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it("is NaN for an empty sequence", () => {
    expect(median([])).toBeNaN();
  });
});

describe("robustZscore", () => {
  it("centers on the median and scales by 1.4826 * MAD", () => {
    // median 3, absolute deviations [2, 1, 0, 1, 2] -> MAD 1
    const scores = robustZscore([1, 2, 3, 4, 5]);
    expect(scores).toEqual([-2 / 1.4826, -1 / 1.4826, 0, 1 / 1.4826, 2 / 1.4826]);
  });

  it("keeps a single outlier from moving the center", () => {
    const scores = robustZscore([10, 11, 12, 13, 1000]);
    // median 12, deviations [2, 1, 0, 1, 988] -> MAD 1
    expect(scores[2]).toBe(0);
    expect(scores[4]).toBeCloseTo(988 / 1.4826, 9);
  });

  it("returns zeros when MAD is 0", () => {
    expect(robustZscore([7, 7, 7, 9])).toEqual([0, 0, 0, 0]);
  });

  it("returns an empty list for empty input", () => {
    expect(robustZscore([])).toEqual([]);
  });
});
