import type { BitDepth, Color, ShapeColorPriority, ShapeInstruction } from "../types/protocol.js";
import { LinkError } from "../link/errors.js";

export const DEFAULT_DEPTH: BitDepth = 8;
export const SUPPORTED_DEPTHS: readonly BitDepth[] = [8, 10, 12, 16];

/** Widest channel value any supported depth can carry */
export const MAX_CHANNEL_VALUE = 0xffff;

export const BLACK: Color = { red: 0, green: 0, blue: 0, depthBits: DEFAULT_DEPTH };

export function isBitDepth(value: number): value is BitDepth {
  return SUPPORTED_DEPTHS.some((depth) => depth === value);
}

/**
 * Largest channel value at the given depth. A depth of 0 (or anything
 * non-positive) is treated as the 8-bit default.
 */
export function maxChannelValue(depthBits: number): number {
  const bits = depthBits > 0 ? depthBits : DEFAULT_DEPTH;
  return 2 ** bits - 1;
}

export function clampChannel(value: number, depthBits: number): number {
  return Math.max(0, Math.min(maxChannelValue(depthBits), Math.round(value)));
}

export function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** Builds a color, rejecting channels outside the depth's range */
export function createColor(
  red: number,
  green: number,
  blue: number,
  depthBits: BitDepth = DEFAULT_DEPTH,
): Color {
  const max = maxChannelValue(depthBits);

  for (const [name, value] of [["red", red], ["green", green], ["blue", blue]] as const) {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new LinkError(
        "InvalidColor",
        `Invalid ${name} channel: ${value}. Must be an integer between 0 and ${max} at ${depthBits} bits.`,
      );
    }
  }

  return { red, green, blue, depthBits };
}

function scaleChannel(value: number, fromMax: number, toMax: number): number {
  return Math.max(0, Math.min(toMax, Math.round((value * toMax) / fromMax)));
}

export function convertDepth(color: Color, depthBits: BitDepth): Color {
  if (color.depthBits === depthBits) {
    return color;
  }

  const fromMax = maxChannelValue(color.depthBits);
  const toMax = maxChannelValue(depthBits);

  return {
    red: scaleChannel(color.red, fromMax, toMax),
    green: scaleChannel(color.green, fromMax, toMax),
    blue: scaleChannel(color.blue, fromMax, toMax),
    depthBits,
  };
}

/** Canonical 8-bit form: round(value * 255 / maxValue) */
export function to8Bit(color: Color): Color {
  return convertDepth(color, 8);
}

export function colorsEqual(a: Color, b: Color): boolean {
  return (
    a.red === b.red &&
    a.green === b.green &&
    a.blue === b.blue &&
    a.depthBits === b.depthBits
  );
}

export function shapeArea(shape: ShapeInstruction): number {
  switch (shape.kind) {
    case "rectangle":
      return Math.abs(shape.geometry.width) * Math.abs(shape.geometry.height);
  }
}

/**
 * Picks the color the instrument is measuring from a list of shapes.
 * "smallest-area" favours the smallest drawn patch; shapes with a zero or
 * non-finite area sort last.
 */
export function selectShapeColor(
  shapes: readonly ShapeInstruction[],
  priority: ShapeColorPriority,
): Color | null {
  const [first] = shapes;
  if (first === undefined) {
    return null;
  }

  if (priority === "first") {
    return first.color;
  }

  let best = first;
  let bestArea = sortableArea(first);

  for (const shape of shapes.slice(1)) {
    const area = sortableArea(shape);
    if (area < bestArea) {
      best = shape;
      bestArea = area;
    }
  }

  return best.color;
}

function sortableArea(shape: ShapeInstruction): number {
  const area = shapeArea(shape);
  return Number.isFinite(area) && area > 0 ? area : Number.POSITIVE_INFINITY;
}
