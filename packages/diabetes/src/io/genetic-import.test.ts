/**
 * Tests for genetic data import
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadGeneticData, parseGeneticData } from "./genetic-import.js";
import { ValidationError } from "../errors.js";

const sample = {
  genetic_risk_factors: [
    { gene: "TCF7L2", variant: "rs7903146", risk_level: 0.7 },
    { gene: "FTO", variant: "rs9939609", risk_level: 0.3 },
  ],
  family_history: { diabetes: true },
  ethnicity: "test-ethnicity",
  age: 52,
};

describe("parseGeneticData", () => {
  it("maps risk factors by gene", () => {
    const profile = parseGeneticData(sample);

    expect(profile.riskFactors).toEqual({ TCF7L2: 0.7, FTO: 0.3 });
    expect(profile.geneVariants).toEqual({ TCF7L2: "rs7903146", FTO: "rs9939609" });
    expect(profile.familyHistory).toEqual({ diabetes: true });
    expect(profile.age).toBe(52);
  });

  it("fills defaults for optional fields", () => {
    const profile = parseGeneticData({ genetic_risk_factors: [] });

    expect(profile.riskFactors).toEqual({});
    expect(profile.ethnicity).toBe("");
    expect(profile.age).toBe(0);
  });

  it("rejects a missing risk factor list", () => {
    expect(() => parseGeneticData({ age: 40 })).toThrow(ValidationError);
  });

  it("rejects out-of-range risk levels", () => {
    expect(() =>
      parseGeneticData({ genetic_risk_factors: [{ gene: "FTO", variant: "x", risk_level: 1.5 }] })
    ).toThrow("Invalid genetic profile: riskFactors.FTO: Number must be less than or equal to 1");
  });
});

describe("loadGeneticData", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "genetic-"));
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("loads a profile from a file", () => {
    const file = join(dir, "genetics.json");
    writeFileSync(file, JSON.stringify(sample));

    const profile = loadGeneticData(file);

    expect(profile?.riskFactors).toEqual({ TCF7L2: 0.7, FTO: 0.3 });
    expect(console.error).not.toHaveBeenCalled();
  });

  it("returns null for a missing file", () => {
    const file = join(dir, "missing.json");

    expect(loadGeneticData(file)).toBeNull();
    expect(console.error).toHaveBeenCalledWith(`Genetic data file not found at ${file}`);
  });

  it("returns null for the wrong shape", () => {
    const file = join(dir, "genetics.json");
    writeFileSync(file, JSON.stringify({ genes: [] }));

    expect(loadGeneticData(file)).toBeNull();
    expect(console.error).toHaveBeenCalledWith(
      "Invalid genetic data format: Invalid genetic data: genetic_risk_factors: Required"
    );
  });

  it("returns null for malformed JSON", () => {
    const file = join(dir, "genetics.json");
    writeFileSync(file, "{ not json");

    expect(loadGeneticData(file)).toBeNull();
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(/^Error loading genetic data: /);
  });
});
