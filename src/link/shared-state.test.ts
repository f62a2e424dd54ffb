import { describe, it, expect, vi } from "vitest";
import { createSharedState } from "./shared-state.js";
import type { MeasurementResult, RectangleShape } from "../types/protocol.js";

function result(overrides: Partial<MeasurementResult> = {}): MeasurementResult {
  return {
    red: 100,
    green: 110,
    blue: 120,
    depthBits: 8,
    x: 0.31,
    y: 0.33,
    yLum: null,
    shapes: [],
    ...overrides,
  };
}

const SMALL: RectangleShape = {
  kind: "rectangle",
  color: { red: 0, green: 255, blue: 0, depthBits: 8 },
  geometry: { width: 0.1, height: 0.1, center: null },
};

const LARGE: RectangleShape = {
  kind: "rectangle",
  color: { red: 255, green: 0, blue: 0, depthBits: 8 },
  geometry: { width: 1, height: 1, center: null },
};

describe("createSharedState", () => {
  it("starts disconnected and black", () => {
    const state = createSharedState();

    expect(state.read()).toEqual({
      connected: false,
      shapes: [],
      measuredColor: { red: 0, green: 0, blue: 0, depthBits: 8 },
      requestedColor: { red: 0, green: 0, blue: 0, depthBits: 8 },
      lastMeasurement: null,
      lastError: null,
      fault: null,
    });
  });

  it("uses result channels when no shape carries a color", () => {
    const state = createSharedState();

    state.applyMeasurement(result());

    const snapshot = state.read();
    expect(snapshot.connected).toBe(true);
    expect(snapshot.measuredColor).toEqual({ red: 100, green: 110, blue: 120, depthBits: 8 });
    expect(snapshot.lastMeasurement?.x).toBe(0.31);
  });

  it("prefers the first shape's color", () => {
    const state = createSharedState();

    state.applyMeasurement(result({ shapes: [LARGE, SMALL] }));

    expect(state.read().measuredColor).toEqual(LARGE.color);
    expect(state.read().shapes).toEqual([LARGE, SMALL]);
  });

  it("prefers the smallest shape under smallest-area", () => {
    const state = createSharedState({ shapeColorPriority: "smallest-area" });

    state.applyMeasurement(result({ shapes: [LARGE, SMALL] }));

    expect(state.read().measuredColor).toEqual(SMALL.color);
  });

  it("clears shapes when a later measurement has none", () => {
    const state = createSharedState();

    state.applyMeasurement(result({ shapes: [LARGE] }));
    state.applyMeasurement(result());

    expect(state.read().shapes).toEqual([]);
    expect(state.read().measuredColor.red).toBe(100);
  });

  it("hands out copies that later updates do not change", () => {
    const state = createSharedState();
    state.applyMeasurement(result({ shapes: [LARGE] }));

    const before = state.read();
    state.applyMeasurement(result({ shapes: [SMALL, LARGE] }));

    expect(before.shapes).toEqual([LARGE]);
  });

  it("copies the requested color", () => {
    const state = createSharedState();
    const color = { red: 1, green: 2, blue: 3, depthBits: 8 as const };

    state.setRequestedColor(color);

    expect(state.read().requestedColor).toEqual(color);
    expect(state.read().requestedColor).not.toBe(color);
  });

  it("records the reason on disconnect and notifies only on change", () => {
    const onChange = vi.fn();
    const state = createSharedState({ onChange });
    state.applyMeasurement(result());
    onChange.mockClear();

    state.markDisconnected("remote signalled end of communication");
    state.markDisconnected("remote signalled end of communication");

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(state.read().connected).toBe(false);
    expect(state.read().lastError).toBe("remote signalled end of communication");
  });

  it("clears the last error on the next measurement", () => {
    const state = createSharedState();
    state.markDisconnected("gone");

    state.applyMeasurement(result());

    expect(state.read().lastError).toBeNull();
  });

  it("records a fault and marks the link disconnected", () => {
    const onChange = vi.fn();
    const state = createSharedState({ onChange });
    state.applyMeasurement(result());

    state.recordFault({ code: "DuplicateCommand", message: "twice", at: 1_000 });

    const snapshot = state.read();
    expect(snapshot.connected).toBe(false);
    expect(snapshot.fault).toEqual({ code: "DuplicateCommand", message: "twice", at: 1_000 });
    expect(snapshot.lastError).toBe("twice");
    expect(onChange).toHaveBeenLastCalledWith(snapshot);
  });
});
