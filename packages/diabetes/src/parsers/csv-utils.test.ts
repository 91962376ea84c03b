import { describe, it, expect } from "vitest";
import { createColumnMap, formatCsvValue, getColumn, parseCsvLine, splitLines } from "./csv-utils.js";

describe("parseCsvLine", () => {
  it("splits on commas outside quotes", () => {
    expect(parseCsvLine('2024-03-01 08:00,"Toast, buttered",30')).toEqual([
      "2024-03-01 08:00",
      "Toast, buttered",
      "30",
    ]);
  });

  it("unescapes doubled quotes", () => {
    expect(parseCsvLine('"the ""big"" breakfast",55')).toEqual(['the "big" breakfast', "55"]);
  });
});

describe("splitLines", () => {
  it("drops blank lines and CR characters", () => {
    expect(splitLines("a,b\r\n1,2\r\n\r\n3,4\n")).toEqual(["a,b", "1,2", "3,4"]);
  });
});

describe("getColumn", () => {
  it("matches headers regardless of case and punctuation", () => {
    const colMap = createColumnMap(["Timestamp", "Meal Type", "Glucose (mg/dL)"]);
    const row = ["2024-03-01 08:00", "breakfast", "120"];

    expect(getColumn(row, colMap, "meal_type")).toBe("breakfast");
    expect(getColumn(row, colMap, "glucose", "glucosemgdl")).toBe("120");
    expect(getColumn(row, colMap, "carbs")).toBe("");
  });
});

describe("formatCsvValue", () => {
  it("quotes values that need it", () => {
    expect(formatCsvValue("plain")).toBe("plain");
    expect(formatCsvValue("a,b")).toBe('"a,b"');
    expect(formatCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvValue(null)).toBe("");
    expect(formatCsvValue(12.5)).toBe("12.5");
  });
});
