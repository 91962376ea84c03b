import { describe, it, expect } from "vitest";
import { calculateAdjustedRisk, getActivityMultiplier, isActivityLevel } from "./activity.js";

describe("getActivityMultiplier", () => {
  it("maps each activity level", () => {
    expect(getActivityMultiplier("sedentary")).toBe(1.2);
    expect(getActivityMultiplier("light")).toBe(1.0);
    expect(getActivityMultiplier("moderate")).toBe(0.8);
    expect(getActivityMultiplier("active")).toBe(0.6);
  });

  it("defaults unrecognized levels to 1.0", () => {
    expect(getActivityMultiplier("marathon")).toBe(1.0);
    expect(getActivityMultiplier("")).toBe(1.0);
    expect(getActivityMultiplier("Active")).toBe(1.0);
  });
});

describe("calculateAdjustedRisk", () => {
  it("scales genetic risk by activity", () => {
    expect(calculateAdjustedRisk(0.5, "active")).toBeCloseTo(0.3, 10);
    expect(calculateAdjustedRisk(0.5, "sedentary")).toBeCloseTo(0.6, 10);
  });

  it("caps at 1", () => {
    expect(calculateAdjustedRisk(0.9, "sedentary")).toBe(1);
  });
});

describe("isActivityLevel", () => {
  it("accepts only the enumerated levels", () => {
    expect(isActivityLevel("light")).toBe(true);
    expect(isActivityLevel("very active")).toBe(false);
  });
});
