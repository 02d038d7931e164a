import { describe, it, expect } from "vitest";
import {
  UNDEFINED, mean, median, quantile, sampleStdev, statValue, value, variationCoefficient,
} from "./stats";

describe("quantile", () => {
  it("interpolates linearly between order statistics", () => {
    const xs = [1, 2, 3, 4];
    expect(quantile(xs, 0)).toBe(1);
    expect(quantile(xs, 1)).toBe(4);
    expect(quantile(xs, 0.5)).toBe(2.5);
    expect(quantile([1, 2, 2, 3, 4, 5, 100], 0.75)).toBe(4.5);
  });

  it("throws on an empty sample", () => {
    expect(() => quantile([], 0.5)).toThrow(RangeError);
  });

  it("median of an odd-length sample is the middle value", () => {
    expect(median([1, 3, 5])).toBe(3);
    expect(median([20, 20, 30, 30])).toBe(25);
  });
});

describe("sampleStdev", () => {
  it("uses the N - 1 denominator", () => {
    const sd = sampleStdev([10, 20, 30, 40]);
    expect(sd.kind).toBe("value");
    expect(statValue(sd)).toBeCloseTo(12.909944, 6);
  });

  it("is undefined below two values", () => {
    expect(sampleStdev([5])).toEqual(UNDEFINED);
    expect(sampleStdev([])).toEqual(UNDEFINED);
  });

  it("is zero for a constant sample", () => {
    expect(sampleStdev([7, 7, 7])).toEqual(value(0));
  });
});

describe("variationCoefficient", () => {
  it("divides stdev by mean", () => {
    expect(variationCoefficient(value(5), value(25))).toEqual(value(0.2));
  });

  it("is undefined for a zero mean or undefined stdev", () => {
    expect(variationCoefficient(value(5), value(0))).toEqual(UNDEFINED);
    expect(variationCoefficient(UNDEFINED, value(3))).toEqual(UNDEFINED);
  });
});

describe("mean / statValue", () => {
  it("averages values", () => {
    expect(mean([10, 11, 9, 10, 100])).toBe(28);
  });

  it("maps undefined stats to null", () => {
    expect(statValue(UNDEFINED)).toBeNull();
    expect(statValue(value(0))).toBe(0);
  });
});
