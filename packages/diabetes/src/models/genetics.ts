/**
 * Genetic risk profile
 */

export interface GeneticProfile {
  /** Gene name to variant label */
  readonly geneVariants: Readonly<Record<string, string>>;
  /** Risk factor name to score in [0, 1] */
  readonly riskFactors: Readonly<Record<string, number>>;
  /** Condition name to presence in family history */
  readonly familyHistory: Readonly<Record<string, boolean>>;
  readonly ethnicity: string;
  readonly age: number;
}
