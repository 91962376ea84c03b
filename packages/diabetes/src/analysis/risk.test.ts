import { describe, it, expect } from "vitest";
import { bucketGlucose, classifyRiskFromCounts, countRiskBuckets } from "./risk.js";
import { ValidationError } from "../errors.js";

describe("bucketGlucose", () => {
  it("treats both normal boundaries as normal", () => {
    expect(bucketGlucose(70)).toBe("normal");
    expect(bucketGlucose(140)).toBe("normal");
  });

  it("classifies values just outside the boundaries", () => {
    expect(bucketGlucose(69.9)).toBe("low");
    expect(bucketGlucose(140.1)).toBe("high");
  });
});

describe("countRiskBuckets", () => {
  it("partitions every value exactly once", () => {
    const values = [50, 69, 70, 100, 140, 141, 200, 300];
    const counts = countRiskBuckets(values);

    expect(counts).toEqual({ high: 3, normal: 3, low: 2 });
    expect(counts.high + counts.normal + counts.low).toBe(values.length);
  });

  it("returns zero counts for no values", () => {
    expect(countRiskBuckets([])).toEqual({ high: 0, normal: 0, low: 0 });
  });
});

describe("classifyRiskFromCounts", () => {
  it("returns unknown when there are no readings", () => {
    expect(classifyRiskFromCounts({ high: 0, normal: 0, low: 0 })).toBe("unknown");
  });

  it("returns high above a 30% share", () => {
    expect(classifyRiskFromCounts({ high: 4, normal: 6, low: 0 })).toBe("high");
  });

  it("returns moderate at exactly 30%", () => {
    expect(classifyRiskFromCounts({ high: 3, normal: 7, low: 0 })).toBe("moderate");
  });

  it("returns moderate just above 15%", () => {
    expect(classifyRiskFromCounts({ high: 2, normal: 8, low: 1 })).toBe("moderate");
  });

  it("returns low at exactly 15%", () => {
    expect(classifyRiskFromCounts({ high: 3, normal: 17, low: 0 })).toBe("low");
  });

  it("counts low readings in the total", () => {
    // 1 / 10 = 10%
    expect(classifyRiskFromCounts({ high: 1, normal: 0, low: 9 })).toBe("low");
  });

  it("never decreases as the high share grows", () => {
    const order = { low: 0, moderate: 1, high: 2, unknown: -1 };
    const total = 20;
    let previous = -1;
    for (let high = 0; high <= total; high++) {
      const level = classifyRiskFromCounts({ high, normal: total - high, low: 0 });
      expect(order[level]).toBeGreaterThanOrEqual(previous);
      previous = order[level];
    }
    expect(previous).toBe(2);
  });

  it("rejects negative or fractional counts", () => {
    expect(() => classifyRiskFromCounts({ high: -1, normal: 2, low: 0 })).toThrow(ValidationError);
    expect(() => classifyRiskFromCounts({ high: 1.5, normal: 2, low: 0 })).toThrow(ValidationError);
  });
});
