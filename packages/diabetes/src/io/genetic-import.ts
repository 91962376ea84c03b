/**
 * Genetic data import
 *
 * Reads a JSON file of the form
 * `{ genetic_risk_factors: [{ gene, variant, risk_level }], family_history?, ethnicity?, age? }`.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { GeneticProfile } from "../models/index.js";
import { isValidationError } from "../errors.js";
import { parseInput } from "../parsers/validation.js";
import { createGeneticProfile } from "../records/genetics.js";

export const geneticFileSchema = z.object({
  genetic_risk_factors: z.array(
    z.object({
      gene: z.string().min(1),
      variant: z.string(),
      risk_level: z.number(),
    })
  ),
  family_history: z.record(z.boolean()).optional(),
  ethnicity: z.string().optional(),
  age: z.number().optional(),
});

export type GeneticFile = z.infer<typeof geneticFileSchema>;

/**
 * Convert parsed JSON into a genetic profile. Throws ValidationError.
 */
export function parseGeneticData(json: unknown): GeneticProfile {
  const data = parseInput(geneticFileSchema, json, "genetic data");

  const geneVariants: Record<string, string> = {};
  const riskFactors: Record<string, number> = {};
  for (const factor of data.genetic_risk_factors) {
    geneVariants[factor.gene] = factor.variant;
    riskFactors[factor.gene] = factor.risk_level;
  }

  return createGeneticProfile({
    geneVariants,
    riskFactors,
    familyHistory: data.family_history,
    ethnicity: data.ethnicity,
    age: data.age,
  });
}

/**
 * Load a genetic profile from disk. Logs and returns null when the file is
 * missing, unreadable or does not match the expected shape.
 */
export function loadGeneticData(filePath: string): GeneticProfile | null {
  try {
    const content = readFileSync(filePath, "utf-8");
    return parseGeneticData(JSON.parse(content));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.error(`Genetic data file not found at ${filePath}`);
    } else if (isValidationError(error)) {
      console.error(`Invalid genetic data format: ${error.message}`);
    } else {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`Error loading genetic data: ${errorMsg}`);
    }
    return null;
  }
}
