import {
  BaseOperation,
  OperationCancelledError,
  abortableSleep,
  type OperationRuntime,
  type RetryOptions,
} from "./base-operation";

class TestOperation extends BaseOperation {
  constructor(runtime?: OperationRuntime) {
    super(runtime);
  }

  retry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T> {
    return this.withRetry(operation, options);
  }

  emit(tag: string, fields: Record<string, string | number | null>): void {
    this.logFields(tag, fields);
  }
}

describe("BaseOperation", () => {
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;
  let logCallback: jest.Mock;
  let operation: TestOperation;

  beforeEach(() => {
    sleep = jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined);
    logCallback = jest.fn();
    operation = new TestOperation({ sleep });
    operation.setLogCallback(logCallback);
  });

  describe("withRetry", () => {
    it("returns the first successful result", async () => {
      const fn = jest.fn().mockResolvedValue("done");

      await expect(operation.retry(fn)).resolves.toBe("done");
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("retries with exponential backoff", async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error("flaky"))
        .mockRejectedValueOnce(new Error("flaky"))
        .mockResolvedValueOnce("done");

      await expect(
        operation.retry(fn, { maxAttempts: 3, delayMs: 100, backoffMultiplier: 2 }),
      ).resolves.toBe("done");

      expect(fn).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
      expect(logCallback).toHaveBeenCalledWith(
        "operation failed (attempt 1/3): flaky. Retrying in 100ms...",
        "stderr",
      );
    });

    it("throws the last error after exhausting attempts", async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error("first"))
        .mockRejectedValueOnce(new Error("second"));

      await expect(operation.retry(fn, { maxAttempts: 2 })).rejects.toThrow("second");
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it("stops immediately when shouldRetry declines", async () => {
      const fn = jest.fn().mockRejectedValue(new Error("fatal"));

      await expect(
        operation.retry(fn, { shouldRetry: (e) => e.message !== "fatal" }),
      ).rejects.toThrow("fatal");
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("wraps non-Error rejections", async () => {
      const fn = jest.fn().mockRejectedValue("boom");

      await expect(operation.retry(fn, { maxAttempts: 1 })).rejects.toThrow("boom");
    });

    it("passes the abort signal to the sleep", async () => {
      const controller = new AbortController();
      const fn = jest.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce(1);

      await operation.retry(fn, { signal: controller.signal });

      expect(sleep).toHaveBeenCalledWith(1000, controller.signal);
    });
  });

  describe("logFields", () => {
    it("formats a structured line", () => {
      operation.emit("launch", { step: "request", instance: null });

      expect(logCallback).toHaveBeenCalledWith("[launch] step=request instance=null", "stdout");
    });
  });
});

describe("abortableSleep", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("resolves after the delay", async () => {
    jest.useFakeTimers();
    const promise = abortableSleep(1_000);

    jest.advanceTimersByTime(1_000);

    await expect(promise).resolves.toBeUndefined();
  });

  it("rejects immediately when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableSleep(1_000, controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
  });

  it("rejects when aborted mid-wait", async () => {
    jest.useFakeTimers();
    const controller = new AbortController();
    const promise = abortableSleep(60_000, controller.signal);

    controller.abort();

    await expect(promise).rejects.toThrow("Operation cancelled");
  });
});
