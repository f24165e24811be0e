// ============================================
// Confidence Extraction Tests
// ============================================

import { describe, it, expect } from "vitest";
import { clampConfidence, estimateConfidence, extractConfidence } from "../src/answer/confidence.js";

describe("extractConfidence", () => {
  it("reads a plain confidence line", () => {
    expect(extractConfidence("Alice shipped it.\nConfidence: 85% - Clear update")).toEqual({
      confidence: 85,
      explanation: "Clear update",
    });
  });

  it("tolerates a leading emoji and bold label", () => {
    expect(extractConfidence("Done.\n:bar_chart: **Confidence:** 85% - Clear updates from two people")).toEqual({
      confidence: 85,
      explanation: "Clear updates from two people",
    });
  });

  it("tolerates bold around the number and an en dash", () => {
    expect(extractConfidence("Done.\n**Confidence: 72%** – Two matching messages")).toEqual({
      confidence: 72,
      explanation: "Two matching messages",
    });
  });

  it("tolerates a leading unicode emoji", () => {
    expect(extractConfidence("Alice shipped it.\n\n📊 Confidence: 85% - Clear update")).toEqual({
      confidence: 85,
      explanation: "Clear update",
    });
  });

  it("tolerates a list bullet", () => {
    expect(extractConfidence("Alice shipped it.\n- Confidence: 85% - Clear update")).toEqual({
      confidence: 85,
      explanation: "Clear update",
    });
  });

  it("drops italic markers wrapped around the line", () => {
    expect(extractConfidence("Done.\n_Confidence: 70% - Two messages agree_")).toEqual({
      confidence: 70,
      explanation: "Two messages agree",
    });
  });

  it("clamps values above 100", () => {
    expect(extractConfidence("Confidence: 150% - Very sure").confidence).toBe(100);
  });

  it("falls back to the wording explanation when the stated one is only emoji", () => {
    expect(extractConfidence("Done.\nConfidence: 70% - :thumbsup:")).toEqual({
      confidence: 70,
      explanation: "Relevant information found",
    });
  });

  it("estimates when there is no confidence line", () => {
    expect(extractConfidence("I couldn't find anything about that.")).toEqual({
      confidence: 10,
      explanation: "No relevant information found",
    });
  });
});

describe("estimateConfidence", () => {
  it("checks buckets in order", () => {
    // "unclear" (30) is checked before "might" (55)
    expect(estimateConfidence("It's unclear, but it might ship Friday").confidence).toBe(30);
  });

  it("detects hedging", () => {
    expect(estimateConfidence("It seems the release slipped")).toEqual({
      confidence: 55,
      explanation: "Some relevant information but not definitive",
    });
  });

  it("defaults to 65", () => {
    expect(estimateConfidence("Launch is Friday.")).toEqual({ confidence: 65, explanation: "Relevant information found" });
  });
});

describe("clampConfidence", () => {
  it("keeps values within 0-100", () => {
    expect(clampConfidence(-5)).toBe(0);
    expect(clampConfidence(42)).toBe(42);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});
