/**
 * Runtime type guard tests for @tallystake/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isUnixSeconds,
  isBasisPoints,
  isNonNegativeAmount,
  isEventSource,
  isTokenEventType,
  isEventMetadata,
  isTokenEvent,
} from "../src/guards.js";
import { ZERO_ADDRESS } from "../src/primitives.js";

// =============================================================================
// Scalar guards
// =============================================================================

describe("isAddress", () => {
  it("accepts opaque non-empty identifiers", () => {
    expect(isAddress("alice")).toBe(true);
    expect(isAddress(ZERO_ADDRESS)).toBe(true);
  });

  it("rejects empty and padded strings", () => {
    expect(isAddress("")).toBe(false);
    expect(isAddress("   ")).toBe(false);
    expect(isAddress(" alice")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isUnixSeconds", () => {
  it("accepts zero and positive integers", () => {
    expect(isUnixSeconds(0)).toBe(true);
    expect(isUnixSeconds(1_700_000_000)).toBe(true);
  });

  it("rejects negatives, fractions and unsafe integers", () => {
    expect(isUnixSeconds(-1)).toBe(false);
    expect(isUnixSeconds(1.5)).toBe(false);
    expect(isUnixSeconds(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
  });
});

describe("isBasisPoints", () => {
  it("accepts the closed range 0..10000", () => {
    expect(isBasisPoints(0)).toBe(true);
    expect(isBasisPoints(10_000)).toBe(true);
  });

  it("rejects values outside the range", () => {
    expect(isBasisPoints(10_001)).toBe(false);
    expect(isBasisPoints(-1)).toBe(false);
    expect(isBasisPoints("500")).toBe(false);
  });
});

describe("isNonNegativeAmount", () => {
  it("accepts zero and positive bigints", () => {
    expect(isNonNegativeAmount(0n)).toBe(true);
    expect(isNonNegativeAmount(10n ** 30n)).toBe(true);
  });

  it("rejects negative bigints and numbers", () => {
    expect(isNonNegativeAmount(-1n)).toBe(false);
    expect(isNonNegativeAmount(5)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventMetadata", () => {
  const validMetadata = { timestamp: 1_000, actor: "alice", source: "ledger" };

  it("accepts valid metadata for each source", () => {
    for (const source of ["ledger", "staking", "vesting"]) {
      expect(isEventSource(source)).toBe(true);
      expect(isEventMetadata({ ...validMetadata, source })).toBe(true);
    }
  });

  it("rejects invalid source", () => {
    expect(isEventMetadata({ ...validMetadata, source: "treasury" })).toBe(false);
  });

  it("rejects a string timestamp", () => {
    expect(isEventMetadata({ ...validMetadata, timestamp: "2024-01-01" })).toBe(false);
  });
});

describe("isTokenEvent", () => {
  const validEvent = {
    type: "Staked",
    metadata: { timestamp: 1_000, actor: "alice", source: "staking" },
    payload: { account: "alice", amount: 100n, stakedAmount: 100n, tierIndex: 0 },
  };

  it("accepts a valid event", () => {
    expect(isTokenEvent(validEvent)).toBe(true);
  });

  it("rejects unknown event types", () => {
    expect(isTokenEventType("Slashed")).toBe(false);
    expect(isTokenEvent({ ...validEvent, type: "Slashed" })).toBe(false);
  });

  it("rejects event with null payload", () => {
    expect(isTokenEvent({ ...validEvent, payload: null })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isTokenEvent("Staked")).toBe(false);
  });
});
