/**
 * Base types shared by all glucose and meal records
 */

/**
 * Every record is anchored to an instant
 */
export interface BaseRecord {
  /** Unix timestamp in milliseconds */
  readonly timestamp: number;
}
