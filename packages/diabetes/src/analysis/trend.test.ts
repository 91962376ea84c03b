/**
 * Tests for trend analysis over reading series
 */

import { describe, it, expect } from "vitest";
import { analyzeTrends, calculateAverageRateOfChange, createEmptyTrendReport } from "./trend.js";
import { classifyRiskFromCounts, countRiskBuckets } from "./risk.js";
import { ValidationError } from "../errors.js";
import type { ReadingInput } from "../records/reading.js";

const HOUR = 60 * 60 * 1000;
const START = Date.UTC(2024, 2, 1, 8, 0, 0);

const day: ReadingInput[] = [
  { timestamp: "2024-03-01T08:00:00Z", glucoseMgDl: 100, mealType: "breakfast" },
  { timestamp: "2024-03-01T09:00:00Z", glucoseMgDl: 160, mealType: "breakfast" },
  { timestamp: "2024-03-01T12:00:00Z", glucoseMgDl: 130, mealType: "lunch" },
  { timestamp: "2024-03-01T13:30:00Z", glucoseMgDl: 190, mealType: "lunch" },
  { timestamp: "2024-03-01T18:00:00Z", glucoseMgDl: 65, mealType: "dinner" },
];

function series(values: number[]): ReadingInput[] {
  return values.map((glucoseMgDl, i) => ({ timestamp: START + i * HOUR, glucoseMgDl }));
}

describe("analyzeTrends", () => {
  it("returns the empty report for no readings", () => {
    const report = analyzeTrends([]);
    expect(report).toEqual(createEmptyTrendReport());
    expect(report.isEmpty).toBe(true);
    expect(report.riskLevel).toBe("unknown");
  });

  it("computes summary statistics", () => {
    const report = analyzeTrends(day);

    expect(report.isEmpty).toBe(false);
    expect(report.readingCount).toBe(5);
    expect(report.summary).toEqual({
      mean: 129,
      max: 190,
      min: 65,
      median: 130,
      stdDev: expect.any(Number),
    });
  });

  it("averages the hourly rate of change between consecutive readings", () => {
    // +60/1h, -30/3h, +60/1.5h, -125/4.5h
    const report = analyzeTrends(day);
    expect(report.averageRateOfChange).toBeCloseTo(140 / 9, 10);
  });

  it("sorts by timestamp before computing rates", () => {
    const report = analyzeTrends([...day].reverse());
    expect(report.averageRateOfChange).toBeCloseTo(140 / 9, 10);
  });

  it("skips pairs that share a timestamp and keeps input order for ties", () => {
    const rate = calculateAverageRateOfChange([
      { timestamp: START, glucoseMgDl: 100 },
      { timestamp: START, glucoseMgDl: 200 },
      { timestamp: START + HOUR, glucoseMgDl: 150 },
    ]);
    expect(rate).toBe(-50);
  });

  it("omits the rate of change for a single reading", () => {
    expect(analyzeTrends(series([120])).averageRateOfChange).toBeNull();
  });

  it("omits the rate of change when every timestamp is the same", () => {
    const readings = [
      { timestamp: START, glucoseMgDl: 100 },
      { timestamp: START, glucoseMgDl: 140 },
    ];
    expect(analyzeTrends(readings).averageRateOfChange).toBeNull();
  });

  it("breaks statistics down by meal type in label order", () => {
    const report = analyzeTrends(day);

    expect(report.mealBreakdown?.map((m) => m.mealType)).toEqual(["breakfast", "dinner", "lunch"]);

    const [breakfast, dinner, lunch] = report.mealBreakdown ?? [];
    expect(breakfast).toMatchObject({ readingCount: 2, mean: 130, max: 160, min: 100 });
    expect(breakfast.stdDev).toBeCloseTo(Math.sqrt(1800), 10);
    expect(dinner).toEqual({ mealType: "dinner", readingCount: 1, mean: 65, max: 65, min: 65, stdDev: null });
    expect(lunch).toMatchObject({ readingCount: 2, mean: 160, max: 190, min: 130 });
  });

  it("has no breakdown when no reading is labelled", () => {
    expect(analyzeTrends(series([100, 110])).mealBreakdown).toBeNull();
  });

  it("counts risk buckets and derives the risk level", () => {
    const report = analyzeTrends(day);

    expect(report.riskCounts).toEqual({ high: 2, normal: 2, low: 1 });
    expect(report.riskLevel).toBe("high");
  });

  it("bucket counts always sum to the number of readings", () => {
    const report = analyzeTrends(series([40, 70, 70.5, 139, 140, 141, 250]));
    const { high, normal, low } = report.riskCounts;
    expect(high + normal + low).toBe(7);
  });

  it("agrees with classifying hand-computed counts", () => {
    const cases: Array<{ values: number[]; expected: string }> = [
      // 4 of 10 above 140
      { values: [150, 160, 170, 180, 100, 110, 120, 130, 90, 80], expected: "high" },
      // 2 of 10 above 140
      { values: [150, 160, 100, 100, 100, 100, 100, 100, 60, 60], expected: "moderate" },
      // 1 of 10 above 140
      { values: [150, 100, 100, 100, 100, 100, 100, 100, 100, 100], expected: "low" },
    ];

    for (const { values, expected } of cases) {
      const byHand = classifyRiskFromCounts(countRiskBuckets(values));
      expect(byHand).toBe(expected);
      expect(analyzeTrends(series(values)).riskLevel).toBe(byHand);
    }
  });

  it("is idempotent and leaves the input untouched", () => {
    const input = [...day].reverse();
    const snapshot = input.map((r) => ({ ...r }));

    const first = analyzeTrends(input);
    const second = analyzeTrends(input);

    expect(second).toEqual(first);
    expect(input).toEqual(snapshot);
  });

  describe("validation", () => {
    it("rejects a reading without a glucose value", () => {
      const input: ReadingInput[] = JSON.parse('[{ "timestamp": "2024-03-01T08:00:00Z" }]');
      expect(() => analyzeTrends(input)).toThrow(ValidationError);
    });

    it("rejects a reading without a timestamp", () => {
      const input: ReadingInput[] = JSON.parse('[{ "glucoseMgDl": 120 }]');
      expect(() => analyzeTrends(input)).toThrow(ValidationError);
    });

    it("rejects a non-numeric glucose value", () => {
      const input: ReadingInput[] = JSON.parse(
        '[{ "timestamp": "2024-03-01T08:00:00Z", "glucoseMgDl": "high" }]'
      );
      expect(() => analyzeTrends(input)).toThrow(/glucoseMgDl/);
    });

    it("rejects a malformed timestamp", () => {
      expect(() => analyzeTrends([{ timestamp: "yesterday", glucoseMgDl: 120 }])).toThrow(
        'Invalid readings: 0.timestamp: malformed timestamp "yesterday"'
      );
    });
  });
});

describe("analyzeTrends timezone", () => {
  it("rejects an unknown timezone with a ValidationError", () => {
    const readings: ReadingInput[] = [{ timestamp: "2024-01-01 08:00", glucoseMgDl: 100 }];

    expect(() => analyzeTrends(readings, { timezone: "Not/AZone" })).toThrow(ValidationError);
    expect(() => analyzeTrends(readings, { timezone: "Not/AZone" })).toThrow(
      'Invalid timezone: value: unknown timezone "Not/AZone"'
    );
  });
});
