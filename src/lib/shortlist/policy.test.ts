// /src/lib/shortlist/policy.test.ts
import { describe, it, expect } from "vitest";

import { ConfigError } from "../errors";
import { loadShortlistPolicy, parseShortlistPolicy } from "./policy";

describe("shortlist policy", () => {
  it("loads the bundled policy file", async () => {
    const policy = await loadShortlistPolicy();

    expect(policy.min_experience_years).toBe(4);
    expect(policy.max_hourly_rate).toBe(100);
    expect(policy.min_availability_hours).toBe(20);
    expect(policy.tier1_companies).toHaveLength(17);
    expect(policy.tier1_companies).toContain("google");
    expect(policy.qualified_locations).toContain("united kingdom");
    expect(Object.isFrozen(policy)).toBe(true);
  });

  it("trims and lower-cases list entries", () => {
    const policy = parseShortlistPolicy({
      tier1_companies: [" Google "],
      qualified_locations: ["USA"],
      min_experience_years: 3,
      max_hourly_rate: 120,
      min_availability_hours: 10,
    });

    expect(policy.tier1_companies).toEqual(["google"]);
    expect(policy.qualified_locations).toEqual(["usa"]);
  });

  it("reports missing and unknown keys", () => {
    let caught: unknown;
    try {
      parseShortlistPolicy({
        tier1_companies: [],
        qualified_locations: [],
        min_experience_years: 4,
        min_availability_hours: 20,
        max_rate: 100,
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: expect.arrayContaining(["max_hourly_rate: Required", expect.stringContaining("max_rate")]),
    });
  });
});
