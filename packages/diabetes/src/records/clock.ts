/**
 * Time source for records created without an explicit timestamp
 */

/** Returns the current instant in Unix milliseconds */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
