import { ZodError } from "zod";
import { describeWaitPolicy, resolveWaitPolicy } from "./wait-policy";

describe("resolveWaitPolicy", () => {
  it("applies the default interval and timeout", () => {
    expect(resolveWaitPolicy()).toEqual({
      pollIntervalMs: 5_000,
      maxAttempts: undefined,
      timeoutMs: 600_000,
    });
  });

  it("keeps an attempt cap without adding a timeout", () => {
    const policy = resolveWaitPolicy({ pollIntervalMs: 1_000, maxAttempts: 3 });

    expect(policy.maxAttempts).toBe(3);
    expect(policy.timeoutMs).toBeUndefined();
  });

  it("keeps both bounds when both are given", () => {
    const policy = resolveWaitPolicy({ maxAttempts: 10, timeoutMs: 30_000 });

    expect(policy).toEqual({ pollIntervalMs: 5_000, maxAttempts: 10, timeoutMs: 30_000 });
  });

  it("returns a frozen policy", () => {
    expect(Object.isFrozen(resolveWaitPolicy())).toBe(true);
  });

  it("rejects non-positive values", () => {
    expect(() => resolveWaitPolicy({ pollIntervalMs: 0 })).toThrow(ZodError);
    expect(() => resolveWaitPolicy({ maxAttempts: -1 })).toThrow(ZodError);
  });

  it("rejects fractional attempt counts", () => {
    expect(() => resolveWaitPolicy({ maxAttempts: 2.5 })).toThrow(ZodError);
  });
});

describe("describeWaitPolicy", () => {
  it("lists every configured bound", () => {
    expect(describeWaitPolicy({ pollIntervalMs: 1, maxAttempts: 3, timeoutMs: 500 })).toBe(
      "3 attempts / 500ms",
    );
  });

  it("lists a single bound", () => {
    expect(describeWaitPolicy({ pollIntervalMs: 1, timeoutMs: 500 })).toBe("500ms");
  });
});
