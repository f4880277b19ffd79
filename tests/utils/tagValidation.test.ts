import { describe, expect, it } from "vitest";

import {
  locationOf,
  namespaceFor,
  normalizeTagName,
  verifyOwnerId,
  verifyTagContent,
  verifyTagName,
} from "../../src/utils/tagValidation.js";

describe("verifyTagName", () => {
  it("accepts ordinary names", () => {
    expect(verifyTagName("welcome")).toBeUndefined();
    expect(verifyTagName("a".repeat(100))).toBeUndefined();
  });

  it.each([
    ["@everyone-ping", "blocked-name"],
    ["hi@here", "blocked-name"],
    ["a".repeat(101), "name-too-long"],
    ["", "missing-name"],
  ])("rejects %j as %s", (name, reason) => {
    expect(verifyTagName(name)?.reason).toBe(reason);
  });

  it("counts emoji as single characters", () => {
    expect(verifyTagName("🎉".repeat(100))).toBeUndefined();
    expect(verifyTagName("🎉".repeat(101))?.reason).toBe("name-too-long");
  });

  it("uses the documented messages", () => {
    expect(verifyTagName("@here")?.message).toBe("Tag contains blocked words.");
    expect(verifyTagName("x".repeat(150))?.message).toBe(
      "Tag name limit is 100 characters."
    );
  });
});

describe("verifyTagContent", () => {
  it("rejects empty and blank content", () => {
    expect(verifyTagContent("")?.reason).toBe("missing-content");
    expect(verifyTagContent(" \n\t")?.reason).toBe("missing-content");
    expect(verifyTagContent("Hi!")).toBeUndefined();
  });
});

describe("verifyOwnerId", () => {
  it("accepts canonical ids up to the largest 64-bit snowflake", () => {
    expect(verifyOwnerId("0")).toBeUndefined();
    expect(verifyOwnerId("123456789012345678")).toBeUndefined();
    expect(verifyOwnerId("18446744073709551615")).toBeUndefined();
  });

  it.each(["", "user-1", "007", "-1", "1.5", " 1", "18446744073709551616"])(
    "rejects %j",
    (ownerId) => {
      expect(verifyOwnerId(ownerId)?.reason).toBe("invalid-owner");
    }
  );
});

describe("namespaces", () => {
  it("maps guild context to namespace keys and back", () => {
    expect(namespaceFor(null)).toBe("generic");
    expect(namespaceFor("555")).toBe("555");
    expect(locationOf("generic")).toBeNull();
    expect(locationOf("555")).toBe("555");
  });
});

describe("normalizeTagName", () => {
  it("trims and lowercases", () => {
    expect(normalizeTagName("  Hello World ")).toBe("hello world");
  });
});
