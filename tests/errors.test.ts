// ============================================
// Error Helper Tests
// ============================================

import { describe, it, expect } from "vitest";
import {
  configError,
  conversationStoreError,
  getUserMessage,
  isRecallError,
  RecallError,
  lookupError,
  retrievalError,
  wrapError,
} from "../src/lib/errors.js";

describe("RecallError", () => {
  it("narrows by code", () => {
    const err = retrievalError("retrieval failed", "req-1");

    expect(isRecallError(err)).toBe(true);
    expect(isRecallError(err, "RETRIEVAL_FAILED")).toBe(true);
    expect(isRecallError(err, "CONFIG_ERROR")).toBe(false);
    expect(isRecallError(new Error("plain"))).toBe(false);
  });

  it("serializes without the cause", () => {
    const err = configError("missing workspace", { key: "WORKSPACE_ID" });
    expect(err.toJSON()).toEqual({
      code: "CONFIG_ERROR",
      message: "missing workspace",
      requestId: undefined,
      context: { key: "WORKSPACE_ID" },
    });
  });
});

describe("wrapError", () => {
  it("passes RecallErrors through", () => {
    const err = retrievalError("retrieval failed");
    expect(wrapError(err)).toBe(err);
  });

  it("wraps anything else as UNKNOWN_ERROR", () => {
    const wrapped = wrapError("socket hang up", "req-9");
    expect(wrapped).toBeInstanceOf(RecallError);
    expect(wrapped.code).toBe("UNKNOWN_ERROR");
    expect(wrapped.message).toBe("socket hang up");
    expect(wrapped.requestId).toBe("req-9");
  });
});

describe("getUserMessage", () => {
  it("explains retrieval failures", () => {
    expect(getUserMessage(retrievalError("x"))).toBe("I couldn't search the message history. Please try again.");
  });

  it("falls back to a generic message", () => {
    expect(getUserMessage(wrapError(new Error("x")))).toBe("Something went wrong. Please try again.");
  });

  it("uses the generic message for recovered failures", () => {
    expect(getUserMessage(lookupError("x"))).toBe("Something went wrong. Please try again.");
    expect(getUserMessage(conversationStoreError("x"))).toBe("Something went wrong. Please try again.");
  });
});
