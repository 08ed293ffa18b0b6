import { describe, it, expect, vi } from "vitest";
import { executeWithRetry, InstantDelayProvider } from "../../../domain/utils/retry.js";

describe("executeWithRetry", () => {
  it("should return success on first try", async () => {
    const delays = new InstantDelayProvider();
    const operation = vi.fn().mockResolvedValue("success");

    const result = await executeWithRetry(operation, { attempts: 3, delayMs: 5000 }, delays);

    expect(result).toEqual({ success: true, value: "success", attempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays.delays).toEqual([]);
  });

  it("should retry on failure and succeed", async () => {
    const delays = new InstantDelayProvider();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error("fail 1"))
      .mockRejectedValueOnce(new Error("fail 2"))
      .mockResolvedValue("success");

    const result = await executeWithRetry(operation, { attempts: 3, delayMs: 5000 }, delays);

    expect(result).toEqual({ success: true, value: "success", attempts: 3 });
    expect(delays.delays).toEqual([5000, 5000]);
  });

  it("should fail with the last error after all attempts", async () => {
    const delays = new InstantDelayProvider();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(new Error("third"));

    const result = await executeWithRetry(operation, { attempts: 3, delayMs: 10 }, delays);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toEqual(new Error("third"));
      expect(result.attempts).toBe(3);
    }
    expect(operation).toHaveBeenCalledTimes(3);
    // No delay after the final attempt
    expect(delays.delays).toEqual([10, 10]);
  });

  it("should make a single attempt when attempts is 1", async () => {
    const delays = new InstantDelayProvider();
    const operation = vi.fn().mockRejectedValue(new Error("fail"));

    const result = await executeWithRetry(operation, { attempts: 1, delayMs: 100 }, delays);

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
    expect(delays.delays).toEqual([]);
  });

  it("should call onRetry before each retry", async () => {
    const onRetry = vi.fn();
    const failure = new Error("fail");
    const operation = vi.fn().mockRejectedValueOnce(failure).mockResolvedValue("ok");

    await executeWithRetry(operation, { attempts: 3, delayMs: 250, onRetry }, new InstantDelayProvider());

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, failure, 250);
  });
});
