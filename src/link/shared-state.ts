import type {
  Color,
  LinkFault,
  LinkSnapshot,
  MeasurementResult,
  ShapeColorPriority,
  ShapeInstruction,
} from "../types/protocol.js";
import { BLACK, clampChannel, selectShapeColor } from "../color/color.js";

/** Mutable version of LinkSnapshot for internal state tracking */
interface MutableState {
  connected: boolean;
  shapes: readonly ShapeInstruction[];
  measuredColor: Color;
  requestedColor: Color;
  lastMeasurement: MeasurementResult | null;
  lastError: string | null;
  fault: LinkFault | null;
}

export interface SharedStateOptions {
  readonly shapeColorPriority?: ShapeColorPriority;
  readonly onChange?: (snapshot: LinkSnapshot) => void;
}

/**
 * The one record both worker loops and the display consumer share. Every
 * read hands out a copy, so readers never observe a half-applied update.
 */
export interface SharedState {
  readonly read: () => LinkSnapshot;
  readonly setRequestedColor: (color: Color) => void;
  readonly applyMeasurement: (result: MeasurementResult) => void;
  readonly markDisconnected: (reason: string) => void;
  readonly recordFault: (fault: LinkFault) => void;
}

export function createSharedState(options: SharedStateOptions = {}): SharedState {
  const priority = options.shapeColorPriority ?? "first";

  const state: MutableState = {
    connected: false,
    shapes: [],
    measuredColor: BLACK,
    requestedColor: BLACK,
    lastMeasurement: null,
    lastError: null,
    fault: null,
  };

  function snapshot(): LinkSnapshot {
    return { ...state, shapes: [...state.shapes] };
  }

  function notifyChange(): void {
    options.onChange?.(snapshot());
  }

  return {
    read(): LinkSnapshot {
      return snapshot();
    },

    setRequestedColor(color: Color): void {
      state.requestedColor = { ...color };
      notifyChange();
    },

    applyMeasurement(result: MeasurementResult): void {
      state.connected = true;
      state.lastError = null;
      state.lastMeasurement = result;

      const shapeColor = selectShapeColor(result.shapes, priority);

      if (shapeColor !== null) {
        state.shapes = [...result.shapes];
        state.measuredColor = shapeColor;
      } else {
        state.shapes = [];
        state.measuredColor = {
          red: clampChannel(result.red, result.depthBits),
          green: clampChannel(result.green, result.depthBits),
          blue: clampChannel(result.blue, result.depthBits),
          depthBits: result.depthBits,
        };
      }

      notifyChange();
    },

    markDisconnected(reason: string): void {
      const changed = state.connected || state.lastError !== reason;
      state.connected = false;
      state.lastError = reason;
      if (changed) {
        notifyChange();
      }
    },

    recordFault(fault: LinkFault): void {
      state.connected = false;
      state.fault = fault;
      state.lastError = fault.message;
      notifyChange();
    },
  };
}
