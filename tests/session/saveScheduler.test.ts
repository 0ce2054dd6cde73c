import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SaveScheduler } from "../../app/lib/saveScheduler";

describe("SaveScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("saves once after a burst of edits goes quiet", () => {
    const save = vi.fn(async () => {});
    const scheduler = new SaveScheduler(400, save, vi.fn());

    scheduler.schedule();
    vi.advanceTimersByTime(300);
    scheduler.schedule();
    vi.advanceTimersByTime(300);
    scheduler.schedule();
    vi.advanceTimersByTime(399);

    expect(save).not.toHaveBeenCalled();
    expect(scheduler.pending).toBe(true);

    vi.advanceTimersByTime(1);

    expect(save).toHaveBeenCalledTimes(1);
    expect(scheduler.pending).toBe(false);
  });

  it("reports failed saves to the error callback", async () => {
    const error = new Error("disk full");
    const onError = vi.fn();
    const scheduler = new SaveScheduler(
      400,
      () => Promise.reject(error),
      onError,
    );

    scheduler.schedule();
    await vi.advanceTimersByTimeAsync(400);

    await vi.waitFor(() => expect(onError).toHaveBeenCalledWith(error));
  });

  it("runs a pending save immediately on flush", async () => {
    const save = vi.fn(async () => {});
    const scheduler = new SaveScheduler(400, save, vi.fn());

    scheduler.schedule();
    await scheduler.flush();
    vi.advanceTimersByTime(1000);

    expect(save).toHaveBeenCalledTimes(1);
  });

  it("does nothing on flush when no save is pending", async () => {
    const save = vi.fn(async () => {});
    const scheduler = new SaveScheduler(400, save, vi.fn());

    await scheduler.flush();

    expect(save).not.toHaveBeenCalled();
  });

  it("rejects a flush whose save fails", async () => {
    const onError = vi.fn();
    const scheduler = new SaveScheduler(
      400,
      () => Promise.reject(new Error("disk full")),
      onError,
    );

    scheduler.schedule();

    await expect(scheduler.flush()).rejects.toThrow("disk full");
    expect(onError).not.toHaveBeenCalled();
  });

  it("waits for a save in progress before starting the next", async () => {
    const calls: string[] = [];
    const releases: (() => void)[] = [];
    const save = vi.fn(async () => {
      calls.push("start");
      await new Promise<void>((resolve) => releases.push(resolve));
      calls.push("end");
    });
    const scheduler = new SaveScheduler(400, save, vi.fn());

    scheduler.schedule();
    vi.advanceTimersByTime(400);
    expect(save).toHaveBeenCalledTimes(1);

    scheduler.schedule();
    const flushed = scheduler.flush();
    await Promise.resolve();
    await Promise.resolve();
    expect(save).toHaveBeenCalledTimes(1);

    releases[0]?.();
    await vi.waitFor(() => expect(save).toHaveBeenCalledTimes(2));
    releases[1]?.();
    await flushed;

    expect(calls).toEqual(["start", "end", "start", "end"]);
  });

  it("waits for a save in progress on flush with nothing pending", async () => {
    let release = () => {};
    let finished = false;
    // The save starts from the timer, so `release` is set before flush.
    const scheduler = new SaveScheduler(
      400,
      async () => {
        await new Promise<void>((resolve) => {
          release = resolve;
        });
        finished = true;
      },
      vi.fn(),
    );

    scheduler.schedule();
    vi.advanceTimersByTime(400);
    const flushed = scheduler.flush();
    release();
    await flushed;

    expect(finished).toBe(true);
  });

  it("drops a pending save on cancel", () => {
    const save = vi.fn(async () => {});
    const scheduler = new SaveScheduler(400, save, vi.fn());

    scheduler.schedule();
    scheduler.cancel();
    vi.advanceTimersByTime(1000);

    expect(save).not.toHaveBeenCalled();
    expect(scheduler.pending).toBe(false);
  });
});
