/**
 * Tests for timestamp parsing
 *
 * Key invariants:
 * 1. Timestamps with explicit timezone (Z or offset) parse as-is
 * 2. Naive timestamps are read in the requested timezone (UTC by default)
 * 3. Impossible dates are rejected rather than rolled over
 */

import { describe, it, expect } from "vitest";
import { parseTimestamp, toTimestamp } from "./timestamps.js";

describe("parseTimestamp", () => {
  it("parses explicit UTC and offsets as-is", () => {
    expect(parseTimestamp("2024-01-15T08:30:00Z")).toBe(Date.UTC(2024, 0, 15, 8, 30, 0));
    expect(parseTimestamp("2024-01-15T08:30:00-05:00")).toBe(Date.UTC(2024, 0, 15, 13, 30, 0));
  });

  it("reads naive ISO timestamps as UTC by default", () => {
    expect(parseTimestamp("2024-01-15 08:30")).toBe(Date.UTC(2024, 0, 15, 8, 30, 0));
    expect(parseTimestamp("2024-01-15T08:30:45")).toBe(Date.UTC(2024, 0, 15, 8, 30, 45));
    expect(parseTimestamp("2024-01-15T08:30:45.250")).toBe(Date.UTC(2024, 0, 15, 8, 30, 45, 250));
  });

  it("reads date-only values as midnight", () => {
    expect(parseTimestamp("2024-01-15")).toBe(Date.UTC(2024, 0, 15));
  });

  it("reads naive timestamps in a named timezone", () => {
    // PST is UTC-8 in January, PDT is UTC-7 in July
    expect(parseTimestamp("2024-01-15 23:30", "America/Los_Angeles")).toBe(Date.UTC(2024, 0, 16, 7, 30, 0));
    expect(parseTimestamp("2024-07-15 12:00:30", "America/Los_Angeles")).toBe(Date.UTC(2024, 6, 15, 19, 0, 30));
  });

  it("parses US month/day/year format", () => {
    expect(parseTimestamp("3/7/2024 14:05")).toBe(Date.UTC(2024, 2, 7, 14, 5, 0));
  });

  it("rejects impossible dates and garbage", () => {
    expect(parseTimestamp("2023-02-29 10:00")).toBeNull();
    expect(parseTimestamp("2024-01-15 25:00")).toBeNull();
    expect(parseTimestamp("2024-13-01")).toBeNull();
    expect(parseTimestamp("breakfast")).toBeNull();
    expect(parseTimestamp("")).toBeNull();
  });
});

describe("toTimestamp", () => {
  it("passes through finite numbers", () => {
    expect(toTimestamp(1709280000000)).toBe(1709280000000);
    expect(toTimestamp(NaN)).toBeNull();
  });

  it("accepts dates", () => {
    expect(toTimestamp(new Date(Date.UTC(2024, 2, 1)))).toBe(Date.UTC(2024, 2, 1));
    expect(toTimestamp(new Date("invalid"))).toBeNull();
  });
});
