/**
 * Observability Tests
 *
 * RingBuffer history and the log lines LoggingStreamObserver emits.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { TransportError, UnknownEntityError } from "../errors";
import { LoggingStreamObserver } from "../services/stream-observer";
import { Logger } from "../utils/logger";
import { RingBuffer } from "../utils/ring-buffer";

describe("RingBuffer", () => {
  it("should reject a non-positive capacity", () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
  });

  it("should return entries oldest first and drop the oldest when full", () => {
    const buffer = new RingBuffer<number>(3);
    expect(buffer.getAll()).toEqual([]);
    expect(buffer.last()).toBeUndefined();

    for (const n of [1, 2, 3, 4, 5]) buffer.push(n);

    expect(buffer.getAll()).toEqual([3, 4, 5]);
    expect(buffer.last()).toBe(5);
    expect(buffer.length).toBe(3);
  });

  it("should empty on clear", () => {
    const buffer = new RingBuffer<string>(2);
    buffer.push("a");
    buffer.clear();

    expect(buffer.length).toBe(0);
    expect(buffer.getAll()).toEqual([]);
  });
});

describe("LoggingStreamObserver", () => {
  let log: Logger;
  let observer: LoggingStreamObserver;

  beforeEach(() => {
    log = new Logger("debug");
    observer = new LoggingStreamObserver(log);
  });

  it("should warn on a move to reconnecting and log other moves as info", () => {
    const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
    const info = vi.spyOn(log, "info").mockImplementation(() => {});

    observer.onStateChange({ from: "active", to: "reconnecting", at: "2026-01-01T00:00:00.000Z", reason: "Socket error" });
    observer.onStateChange({ from: "reconnecting", to: "connecting", at: "2026-01-01T00:00:01.000Z" });

    expect(warn).toHaveBeenCalledWith("Stream", "active -> reconnecting (Socket error)");
    expect(info).toHaveBeenCalledWith("Stream", "reconnecting -> connecting");
  });

  it("should log the reconnect schedule with its cause", () => {
    const warn = vi.spyOn(log, "warn").mockImplementation(() => {});

    observer.onReconnectScheduled(2, 2000.4, new TransportError("Connection timeout after 500ms"));

    expect(warn).toHaveBeenCalledWith("Stream", "Reconnect attempt 2 in 2000ms: Connection timeout after 500ms");
  });

  it("should log only every hundredth unknown-entity frame", () => {
    const debug = vi.spyOn(log, "debug").mockImplementation(() => {});

    for (let i = 0; i < 150; i++) {
      observer.onUnknownEntity(new UnknownEntityError(42, "market.last.price"));
    }

    expect(debug).toHaveBeenCalledTimes(2);
    expect(debug).toHaveBeenLastCalledWith(
      "Dispatcher",
      "No topic for market 42 (101 unknown-entity frames so far)"
    );
  });
});
