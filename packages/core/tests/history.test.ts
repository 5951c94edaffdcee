import { describe, it, expect } from "vitest";
import { RecordingHistory } from "../src/history.js";

describe("RecordingHistory", () => {
  it("records nothing while disabled", () => {
    const history = new RecordingHistory<number>();

    history.push(1);

    expect(history.enabled).toBe(false);
    expect(history.read()).toEqual([]);
  });

  it("records pushes once enabled, oldest first", () => {
    const history = new RecordingHistory<number>();
    history.enable();

    history.push(1);
    history.push(1);
    history.push(2);
    history.disable();
    history.push(3);

    expect(history.read()).toEqual([1, 1, 2]);
    expect([...history]).toEqual([1, 1, 2]);
    expect(history.size).toBe(3);
  });

  it("hands out copies", () => {
    const history = new RecordingHistory<number>({ enabled: true });
    history.push(1);

    const snapshot = history.read();
    history.push(2);

    expect(snapshot).toEqual([1]);
  });

  it("keeps only the newest entries under a limit", () => {
    const history = new RecordingHistory<number>({ enabled: true, limit: 2 });

    history.push(1);
    history.push(2);
    history.push(3);

    expect(history.read()).toEqual([2, 3]);
  });

  it("rejects a limit below one", () => {
    expect(() => new RecordingHistory<number>({ limit: 0 })).toThrow(RangeError);
  });

  it("clears", () => {
    const history = new RecordingHistory<number>({ enabled: true });
    history.push(1);
    history.clear();

    expect(history.size).toBe(0);
  });
});
