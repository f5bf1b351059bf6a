import { describe, it } from "@signalbox/bdd";
import { expect } from "expect";
import { sleep, spawn } from "effection";
import { useDispatcher } from "./dispatch.ts";
import { createSignal } from "./signal.ts";

describe("signal", () => {
  describe("connect", () => {
    it("delivers every fire to a connected handler", function* () {
      const signal = yield* createSignal<[number]>();
      const log: number[] = [];

      signal.connect((value) => {
        log.push(value);
      });

      signal.fire(1);
      signal.fire(2);

      yield* sleep(10);

      expect(log).toEqual([1, 2]);
    });

    it("passes every argument of the fire", function* () {
      const signal = yield* createSignal<[string, number, boolean]>();
      const received: [string, number, boolean][] = [];

      signal.connect((name, count, flag) => {
        received.push([name, count, flag]);
      });

      signal.fire("ticks", 3, true);

      yield* sleep(10);

      expect(received).toEqual([["ticks", 3, true]]);
    });

    it("returns from fire before any handler runs", function* () {
      const signal = yield* createSignal();
      const log: string[] = [];

      signal.connect(() => {
        log.push("handler");
      });

      signal.fire();
      log.push("fired");

      yield* sleep(10);

      expect(log).toEqual(["fired", "handler"]);
    });

    it("visits each live connection exactly once per fire", function* () {
      const signal = yield* createSignal();
      const counts = [0, 0, 0];

      for (let i = 0; i < counts.length; i++) {
        signal.connect(() => {
          counts[i]++;
        });
      }

      signal.fire();

      yield* sleep(10);

      expect(counts).toEqual([1, 1, 1]);
    });

    it("does not deliver the current fire to a connection made by a handler", function* () {
      const signal = yield* createSignal<[number]>();
      const late: number[] = [];
      let connected = false;

      signal.connect(() => {
        if (!connected) {
          connected = true;
          signal.connect((value) => {
            late.push(value);
          });
        }
      });

      signal.fire(1);
      yield* sleep(10);
      signal.fire(2);
      yield* sleep(10);

      expect(late).toEqual([2]);
    });

    it("rejects a handler that is not a function", function* () {
      const signal = yield* createSignal();

      expect(() => Reflect.apply(signal.connect, signal, [42])).toThrow(
        TypeError,
      );
      expect(() => Reflect.apply(signal.once, signal, ["nope"])).toThrow(
        TypeError,
      );
    });
  });

  describe("disconnect", () => {
    it("stops delivery to that connection only", function* () {
      const signal = yield* createSignal<[number]>();
      const kept: number[] = [];
      const dropped: number[] = [];

      signal.connect((value) => {
        kept.push(value);
      });
      const connection = signal.connect((value) => {
        dropped.push(value);
      });

      signal.fire(1);
      connection.disconnect();
      signal.fire(2);

      yield* sleep(10);

      expect(kept).toEqual([1, 2]);
      expect(dropped).toEqual([1]);
      expect(connection.connected).toEqual(false);
    });

    it("is idempotent", function* () {
      const signal = yield* createSignal();
      let count = 0;

      const connection = signal.connect(() => {
        count++;
      });
      signal.connect(() => {
        count += 10;
      });

      connection.disconnect();
      connection.disconnect();
      signal.fire();

      yield* sleep(10);

      expect(count).toEqual(10);
    });
  });

  describe("once", () => {
    it("invokes the handler for the first fire only", function* () {
      const signal = yield* createSignal<[number]>();
      const received: number[] = [];

      const connection = signal.once((value) => {
        received.push(value);
      });

      expect(connection.connected).toEqual(true);

      signal.fire(1);

      expect(connection.connected).toEqual(false);

      signal.fire(2);

      yield* sleep(10);

      expect(received).toEqual([1]);
    });

    it("runs once even when the handler fires the same signal", function* () {
      const signal = yield* createSignal();
      let count = 0;

      signal.once(() => {
        count++;
        signal.fire();
        signal.fire();
      });

      signal.fire();

      yield* sleep(20);

      expect(count).toEqual(1);
    });
  });

  describe("disconnectAll", () => {
    it("leaves nothing for the next fire to reach", function* () {
      const dispatched: unknown[][] = [];

      yield* useDispatcher({
        dispatch(_handler, args) {
          dispatched.push(args);
        },
      });

      const signal = yield* createSignal();
      signal.connect(() => {});
      signal.once(() => {});

      signal.disconnectAll();
      signal.fire();

      expect(dispatched).toEqual([]);
    });

    it("keeps the connected flag of each dropped connection", function* () {
      const signal = yield* createSignal();
      let count = 0;

      const connection = signal.connect(() => {
        count++;
      });

      signal.disconnectAll();
      signal.fire();

      yield* sleep(10);

      expect(connection.connected).toEqual(true);
      expect(count).toEqual(0);
    });

    it("does not cancel invocations already scheduled", function* () {
      const signal = yield* createSignal();
      let count = 0;

      signal.connect(() => {
        count++;
      });

      signal.fire();
      signal.disconnectAll();

      yield* sleep(10);

      expect(count).toEqual(1);
    });

    it("accepts new connections afterwards", function* () {
      const signal = yield* createSignal<[string]>();
      const received: string[] = [];

      signal.connect(() => {
        received.push("old");
      });
      signal.disconnectAll();
      signal.connect((value) => {
        received.push(value);
      });

      signal.fire("new");

      yield* sleep(10);

      expect(received).toEqual(["new"]);
    });
  });

  describe("after the scope that created it exits", () => {
    it("does nothing on fire", function* () {
      const child = yield* spawn(() => createSignal<[number]>());
      const signal = yield* child;
      const received: number[] = [];

      signal.connect((value) => {
        received.push(value);
      });
      const once = signal.once((value) => {
        received.push(value);
      });

      expect(() => signal.fire(1)).not.toThrow();

      yield* sleep(10);

      expect(received).toEqual([]);
      expect(once.connected).toEqual(true);
    });
  });

  describe("wait", () => {
    it("resumes with the arguments of the next fire", function* () {
      const signal = yield* createSignal<[number, string]>();

      const waiter = yield* spawn(() => signal.wait());
      yield* sleep(1);

      signal.fire(7, "seven");

      expect(yield* waiter).toEqual([7, "seven"]);
    });

    it("ignores fires that happened before it was called", function* () {
      const signal = yield* createSignal<[number]>();

      signal.fire(1);
      yield* sleep(10);

      const waiter = yield* spawn(() => signal.wait());
      yield* sleep(1);

      signal.fire(2);

      expect(yield* waiter).toEqual([2]);
    });

    it("stays parked when the signal is torn down with disconnectAll", function* () {
      const signal = yield* createSignal();
      let woke = false;

      yield* spawn(function* () {
        yield* signal.wait();
        woke = true;
      });
      yield* sleep(1);

      signal.disconnectAll();
      signal.fire();

      yield* sleep(20);

      expect(woke).toEqual(false);
    });

    it("drops its connection when the waiter is halted", function* () {
      const dispatched: unknown[][] = [];

      yield* useDispatcher({
        dispatch(_handler, args) {
          dispatched.push(args);
        },
      });

      const signal = yield* createSignal<[string]>();

      const waiter = yield* spawn(() => signal.wait());
      yield* sleep(1);
      yield* waiter.halt();

      signal.fire("late");

      expect(dispatched).toEqual([]);
    });
  });
});
