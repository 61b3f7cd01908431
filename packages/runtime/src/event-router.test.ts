import { describe, it, expect, vi } from "vitest";
import { EventRouter, Executor, currentExecutorId } from "./event-router.js";
import type { RoutableEvent } from "./event-router.js";

interface TestEvent extends RoutableEvent {
  n: number;
}

describe("Executor", () => {
  it("reports its id inside run and nothing outside", () => {
    const executor = new Executor("ui");
    expect(currentExecutorId()).toBeUndefined();
    expect(executor.run(() => currentExecutorId())).toBe("ui");
  });

  it("keeps its identity across awaits", async () => {
    const executor = new Executor("ui");
    const seen = await executor.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return currentExecutorId();
    });
    expect(seen).toBe("ui");
  });

  it("drains posted tasks in order on its own identity", async () => {
    const executor = new Executor("ui");
    const seen: Array<[number, string | undefined]> = [];
    executor.post(() => { seen.push([1, currentExecutorId()]); });
    executor.post(async () => { seen.push([2, currentExecutorId()]); });
    expect(executor.pending()).toBe(2);
    await executor.idle();
    expect(seen).toEqual([[1, "ui"], [2, "ui"]]);
    expect(executor.pending()).toBe(0);
  });

  it("logs a failing task and keeps draining", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const executor = new Executor("ui", logger);
    const after = vi.fn();
    executor.post(() => { throw new Error("boom"); });
    executor.post(after);
    await executor.idle();
    expect(after).toHaveBeenCalledOnce();
    expect(logger.error).toHaveBeenCalledWith("executor task failed", { executor: "ui", error: "boom" });
  });

  it("is idle immediately when nothing was posted", async () => {
    await expect(new Executor("ui").idle()).resolves.toBeUndefined();
  });
});

describe("EventRouter", () => {
  it("calls the handler in place when the producer is the target", async () => {
    const router = new EventRouter<TestEvent>();
    const ui = new Executor("ui");
    const handled: number[] = [];
    router.register(ui, (event) => { handled.push(event.n); });

    await ui.run(() => router.route({ target: "ui", n: 1 }));

    expect(handled).toEqual([1]);
    expect(ui.pending()).toBe(0);
    expect(router.stats()).toEqual({ direct: 1, posted: 0 });
  });

  it("posts to the target mailbox from any other producer", async () => {
    const router = new EventRouter<TestEvent>();
    const ui = new Executor("ui");
    const worker = new Executor("worker");
    const handled: Array<[number, string | undefined]> = [];
    router.register(ui, (event) => { handled.push([event.n, currentExecutorId()]); });

    await worker.run(() => router.route({ target: "ui", n: 1 }));
    await router.route({ target: "ui", n: 2 });
    expect(handled).toEqual([]);
    expect(ui.pending()).toBe(2);

    await ui.idle();
    expect(handled).toEqual([[1, "ui"], [2, "ui"]]);
    expect(router.stats()).toEqual({ direct: 0, posted: 2 });
  });

  it("takes an explicit producer id", async () => {
    const router = new EventRouter<TestEvent>();
    const ui = new Executor("ui");
    const handler = vi.fn();
    router.register(ui, handler);
    await router.route({ target: "ui", n: 7 }, "ui");
    expect(handler).toHaveBeenCalledWith({ target: "ui", n: 7 });
    expect(router.stats().direct).toBe(1);
  });

  it("rejects events for an unknown executor", async () => {
    const router = new EventRouter<TestEvent>();
    await expect(router.route({ target: "nowhere", n: 1 })).rejects.toThrow('No executor registered for "nowhere"');
  });

  it("refuses a second registration and allows re-registering after unregister", () => {
    const router = new EventRouter<TestEvent>();
    const ui = new Executor("ui");
    const unregister = router.register(ui, () => {});
    expect(() => router.register(ui, () => {})).toThrow('Executor "ui" is already registered');
    unregister();
    expect(() => router.register(ui, () => {})).not.toThrow();
  });
});
