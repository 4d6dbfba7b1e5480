import { describe, it, expect, beforeEach } from "vitest";
import { EventBus, topicMatches } from "../src/core/event-bus.js";
import { EventPriority } from "../src/types/events.js";
import type { IEventEnvelope } from "../src/types/events.js";
import { BusClosedError, EventDispatchError } from "../src/types/errors.js";

describe("topicMatches", () => {
  it("matches exact topics, prefixes and the catch-all", () => {
    expect(topicMatches("export.csv", "export.csv")).toBe(true);
    expect(topicMatches("export.*", "export.csv")).toBe(true);
    expect(topicMatches("export.*", "export.csv.completed")).toBe(true);
    expect(topicMatches("export.*", "export")).toBe(false);
    expect(topicMatches("export.*", "exports.csv")).toBe(false);
    expect(topicMatches("*", "anything.at.all")).toBe(true);
    expect(topicMatches("export.csv", "export.pdf")).toBe(false);
  });
});

describe("EventBus", () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  describe("sync dispatch", () => {
    it("runs handlers by priority, then registration order, past a throwing handler", () => {
      const calls: string[] = [];
      bus.subscribe("sale.recorded", () => { calls.push("low"); }, { priority: EventPriority.Low });
      bus.subscribe("sale.recorded", () => { calls.push("high-1"); }, { priority: EventPriority.High });
      bus.subscribe("sale.recorded", () => { calls.push("normal"); });
      bus.subscribe(
        "sale.recorded",
        () => {
          calls.push("high-2");
          throw new Error("handler broke");
        },
        { priority: EventPriority.High },
      );

      expect(() => bus.publish("sale.recorded", { amount: 10 })).not.toThrow();
      expect(calls).toEqual(["high-1", "high-2", "normal", "low"]);
      expect(bus.failureCount).toBe(1);
    });

    it("delivers the envelope with defaults filled in", () => {
      let received: IEventEnvelope<{ amount: number }> | undefined;
      bus.subscribe<{ amount: number }>("sale.recorded", (envelope) => {
        received = envelope;
      });
      const published = bus.publish("sale.recorded", { amount: 10 });

      expect(received).toBe(published);
      expect(published.payload).toEqual({ amount: 10 });
      expect(published.priority).toBe(EventPriority.Normal);
      expect(published.source).toBe("core");
      expect(published.correlationId).toHaveLength(36);
    });

    it("keeps the dispatch snapshot when a handler unsubscribes another", () => {
      const calls: string[] = [];
      const second = bus.subscribe("tick", () => { calls.push("second"); }, { priority: EventPriority.Low });
      bus.subscribe("tick", () => {
        calls.push("first");
        bus.unsubscribe(second);
      });

      bus.publish("tick", null);
      bus.publish("tick", null);
      expect(calls).toEqual(["first", "second", "first"]);
    });

    it("filters envelopes below a subscription's minimum priority", () => {
      const seen: EventPriority[] = [];
      bus.subscribe("alert", (envelope) => { seen.push(envelope.priority); }, { minPriority: EventPriority.High });

      bus.publish("alert", 1, { priority: EventPriority.Low });
      bus.publish("alert", 2);
      bus.publish("alert", 3, { priority: EventPriority.High });
      expect(seen).toEqual([EventPriority.High]);
    });

    it("delivers wildcard subscriptions", () => {
      const topics: string[] = [];
      bus.subscribe("export.*", (envelope) => { topics.push(`prefix:${envelope.topic}`); });
      bus.subscribe("*", (envelope) => { topics.push(`all:${envelope.topic}`); });

      bus.publish("export.csv.completed", {});
      bus.publish("import.csv", {});
      expect(topics).toEqual(["prefix:export.csv.completed", "all:export.csv.completed", "all:import.csv"]);
    });

    it("delivers once() subscriptions a single time", () => {
      let count = 0;
      bus.once("ready", () => { count++; });
      bus.publish("ready", null);
      bus.publish("ready", null);
      expect(count).toBe(1);
      expect(bus.listenerCount("ready")).toBe(0);
    });
  });

  describe("handler failures", () => {
    it("announces bus.handler_failed with the failing subscription", () => {
      const failures: IEventEnvelope<{ topic: string; subscriptionId: string; error: string }>[] = [];
      bus.on("bus.handler_failed", (envelope) => { failures.push(envelope); });
      const broken = bus.subscribe("sale.recorded", () => {
        throw new Error("no ledger");
      });

      const published = bus.publish("sale.recorded", {}, { correlationId: "corr-1" });

      expect(failures).toHaveLength(1);
      expect(failures[0]?.payload).toEqual({
        topic: "sale.recorded",
        subscriptionId: broken.id,
        error: "no ledger",
      });
      expect(failures[0]?.correlationId).toBe(published.correlationId);
    });

    it("does not re-announce failures of bus.* handlers", () => {
      bus.subscribe("bus.handler_failed", () => {
        throw new Error("observer broke");
      });
      bus.subscribe("sale.recorded", () => {
        throw new Error("no ledger");
      });

      bus.publish("sale.recorded", {});
      expect(bus.failureCount).toBe(2);
    });

    it("tells dispatch error listeners", () => {
      const errors: EventDispatchError[] = [];
      bus.onDispatchError((error) => { errors.push(error); });
      bus.subscribe("sale.recorded", () => {
        throw new Error("no ledger");
      });

      bus.publish("sale.recorded", {});
      expect(errors).toHaveLength(1);
      expect(errors[0]?.topic).toBe("sale.recorded");
      expect(errors[0]?.message).toContain("no ledger");
    });

    it("catches rejections from sync handlers that return a promise", async () => {
      bus.subscribe("sale.recorded", async () => {
        throw new Error("late failure");
      });
      bus.publish("sale.recorded", {});
      await Promise.resolve();
      await Promise.resolve();
      expect(bus.failureCount).toBe(1);
    });
  });

  describe("async dispatch", () => {
    it("does not run async handlers on the publisher's call", async () => {
      const calls: string[] = [];
      bus.subscribe("sale.recorded", () => { calls.push("async"); }, { mode: "async" });
      bus.subscribe("sale.recorded", () => { calls.push("sync"); });

      bus.publish("sale.recorded", {});
      calls.push("published");
      await bus.flush();

      expect(calls).toEqual(["sync", "published", "async"]);
    });

    it("bounds in-flight async deliveries by the queue depth", async () => {
      const bounded = new EventBus({ asyncQueueDepth: 1 });
      let active = 0;
      let maxActive = 0;
      const order: number[] = [];
      bounded.subscribe<number>(
        "job",
        async (envelope) => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          order.push(envelope.payload);
          active--;
        },
        { mode: "async" },
      );

      bounded.publish("job", 1);
      bounded.publish("job", 2);
      bounded.publish("job", 3);
      await bounded.flush();

      expect(maxActive).toBe(1);
      expect(order).toEqual([1, 2, 3]);
    });

    it("hands async deliveries to an attached dispatcher", async () => {
      const detached: string[] = [];
      bus.attachDispatcher({
        detach: (work, _priority, name) => {
          detached.push(name);
          return work();
        },
      });
      let ran = false;
      bus.subscribe("report.ready", () => { ran = true; }, { mode: "async" });

      bus.publish("report.ready", {});
      await bus.flush();
      expect(detached).toEqual(["event:report.ready"]);
      expect(ran).toBe(true);
    });

    it("reports async handler failures", async () => {
      const failed: string[] = [];
      bus.on("bus.handler_failed", (envelope) => { failed.push(envelope.payload.topic); });
      bus.subscribe("report.ready", async () => {
        throw new Error("render failed");
      }, { mode: "async" });

      bus.publish("report.ready", {});
      await bus.flush();
      expect(failed).toEqual(["report.ready"]);
    });
  });

  describe("ownership", () => {
    it("tags scoped subscriptions and publishes with the owner", () => {
      const sources: string[] = [];
      const scoped = bus.scoped("sales");
      scoped.subscribe("sale.recorded", () => undefined);
      scoped.subscribe("sale.voided", () => undefined);
      bus.subscribe("sale.recorded", (envelope) => { sources.push(envelope.source); });

      scoped.publish("sale.recorded", {});
      expect(sources).toEqual(["sales"]);
      expect(bus.countByOwner("sales")).toBe(2);

      expect(bus.unsubscribeOwner("sales")).toBe(2);
      expect(bus.countByOwner("sales")).toBe(0);
      expect(bus.listenerCount()).toBe(1);
    });

    it("refuses to unsubscribe another owner's subscription through a scoped view", () => {
      const foreign = bus.subscribe("tick", () => undefined, { ownerId: "other" });
      expect(bus.scoped("sales").unsubscribe(foreign)).toBe(false);
      expect(bus.listenerCount("tick")).toBe(1);
    });
  });

  describe("close", () => {
    it("rejects publishes and subscriptions once closed", () => {
      bus.subscribe("tick", () => undefined);
      bus.close();

      expect(bus.isClosed).toBe(true);
      expect(bus.listenerCount()).toBe(0);
      expect(() => bus.publish("tick", null)).toThrow(BusClosedError);
      expect(() => bus.subscribe("tick", () => undefined)).toThrow(BusClosedError);
    });
  });
});
