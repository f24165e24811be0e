// ============================================
// Quality Filter Tests
// ============================================

import { describe, it, expect } from "vitest";
import { filterQualityMessages, rejectReason } from "../src/retrieval/qualityFilter.js";
import { makeCandidate } from "./fakes.js";

describe("rejectReason", () => {
  it("rejects short messages after trimming", () => {
    expect(rejectReason("   ok!    ")).toBe("too_short");
    expect(rejectReason("123456789")).toBe("too_short");
  });

  it("accepts a message of exactly the minimum length", () => {
    expect(rejectReason("1234567890")).toBeNull();
  });

  it("rejects system notifications regardless of case", () => {
    expect(rejectReason("Dana Has Joined The Channel")).toBe("system_notification");
    expect(rejectReason("sam pinned a message to this channel")).toBe("system_notification");
  });

  it("rejects messages made mostly of mentions", () => {
    // 3 mentions / 4 words
    expect(rejectReason("<@U1> <@U2> <@U3> ping")).toBe("mention_heavy");
  });

  it("keeps messages where mentions are half the words", () => {
    // 2 mentions / 4 words
    expect(rejectReason("<@U1> <@U2> review please")).toBeNull();
  });
});

describe("filterQualityMessages", () => {
  it("keeps retrieval order", () => {
    const candidates = [
      makeCandidate("first substantive message"),
      makeCandidate("lol"),
      makeCandidate("second substantive message"),
      makeCandidate("ben has joined the channel"),
      makeCandidate("third substantive message"),
    ];

    const filtered = filterQualityMessages(candidates, 10);

    expect(filtered.map((c) => c.text)).toEqual([
      "first substantive message",
      "second substantive message",
      "third substantive message",
    ]);
  });

  it("stops at the limit", () => {
    const candidates = ["alpha message one", "beta message two", "gamma message three"].map((t) => makeCandidate(t));
    expect(filterQualityMessages(candidates, 2).map((c) => c.text)).toEqual(["alpha message one", "beta message two"]);
  });

  it("returns nothing when every candidate is a notification", () => {
    const candidates = ["a", "b", "c", "d", "e"].map((name) => makeCandidate(`${name} has joined the channel`));
    expect(filterQualityMessages(candidates, 10)).toEqual([]);
  });
});
