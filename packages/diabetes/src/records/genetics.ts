/**
 * Genetic profile construction and scoring
 */

import { z } from "zod";
import type { GeneticProfile } from "../models/index.js";
import { parseInput } from "../parsers/validation.js";
import { riskScoreSchema } from "./schemas.js";

export interface GeneticProfileInput {
  geneVariants?: Record<string, string>;
  riskFactors?: Record<string, number>;
  familyHistory?: Record<string, boolean>;
  ethnicity?: string;
  age?: number;
}

export const geneticProfileSchema = z.object({
  geneVariants: z.record(z.string()).default({}),
  riskFactors: z.record(riskScoreSchema).default({}),
  familyHistory: z.record(z.boolean()).default({}),
  ethnicity: z.string().default(""),
  age: z.number().int().nonnegative().default(0),
});

/**
 * Build an immutable genetic profile, throwing ValidationError on bad input
 */
export function createGeneticProfile(input: GeneticProfileInput): GeneticProfile {
  const parsed = parseInput(geneticProfileSchema, input, "genetic profile");
  return Object.freeze({
    geneVariants: Object.freeze({ ...parsed.geneVariants }),
    riskFactors: Object.freeze({ ...parsed.riskFactors }),
    familyHistory: Object.freeze({ ...parsed.familyHistory }),
    ethnicity: parsed.ethnicity,
    age: parsed.age,
  });
}

/**
 * Mean of all risk factor scores, 0 when there are none
 */
export function getOverallRiskScore(profile: GeneticProfile): number {
  const scores = Object.values(profile.riskFactors);
  if (scores.length === 0) return 0;
  return scores.reduce((a, b) => a + b, 0) / scores.length;
}

/**
 * Score of a single named risk factor, 0 when absent
 */
export function getRiskFactor(profile: GeneticProfile, name: string): number {
  return profile.riskFactors[name] ?? 0;
}
