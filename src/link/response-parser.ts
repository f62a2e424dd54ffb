import { SaxesParser, type SaxesTagPlain } from "saxes";
import type {
  BitDepth,
  Color,
  MeasurementResult,
  ShapeInstruction,
  ShapeKind,
} from "../types/protocol.js";
import {
  DEFAULT_DEPTH,
  clampChannel,
  clampUnit,
  isBitDepth,
} from "../color/color.js";
import { LinkError, describeError } from "./errors.js";

/** Depth of the command element: <CS_RMC> is 1, its first child 2 */
const COMMAND_DEPTH = 2;

const COLOR_ELEMENTS: ReadonlySet<string> = new Set(["color", "colour"]);
const GEOMETRY_ELEMENT = "geometry";
const RESULT_ELEMENT = "result";
const DEPTH_KEYS: readonly string[] = ["bits", "depth", "bitDepth"];

type Attributes = Readonly<Record<string, string>>;

interface ShapeBuilder {
  readonly applyColor: (attributes: Attributes) => void;
  readonly applyGeometry: (attributes: Attributes) => void;
  /** Throws IncompleteShape when the element never carried a color */
  readonly build: () => ShapeInstruction;
}

/** Element roles the state machine dispatches on */
type ElementRole =
  | "result"
  | "result-field"
  | "shape"
  | "shape-color"
  | "shape-geometry"
  | "other";

interface ResultDraft {
  red: number;
  green: number;
  blue: number;
  depthBits: BitDepth;
  x: number | null;
  y: number | null;
  yLum: number | null;
}

interface ParseState {
  readonly stack: string[];
  readonly commands: Set<string>;
  readonly shapes: ShapeInstruction[];
  readonly draft: ResultDraft;
  inResult: boolean;
  builder: ShapeBuilder | null;
  text: string;
}

/** Unsigned integer up to 2^53 - 1; callers clamp to the channel depth */
export function parseUnsigned(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\+?\d+$/.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === "") {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function parseDepth(text: string): BitDepth | null {
  const value = parseUnsigned(text);
  return value !== null && isBitDepth(value) ? value : null;
}

function createRectangleBuilder(): ShapeBuilder {
  let red = 0;
  let green = 0;
  let blue = 0;
  let depthBits: BitDepth = DEFAULT_DEPTH;
  let colorTouched = false;
  let width: number | null = null;
  let height: number | null = null;
  let centerX: number | null = null;
  let centerY: number | null = null;

  return {
    applyColor(attributes) {
      for (const [key, raw] of Object.entries(attributes)) {
        if (key === "red" || key === "green" || key === "blue") {
          const value = parseUnsigned(raw);
          if (value === null) continue;
          if (key === "red") red = value;
          else if (key === "green") green = value;
          else blue = value;
          colorTouched = true;
        } else if (DEPTH_KEYS.includes(key)) {
          depthBits = parseDepth(raw) ?? depthBits;
        }
      }
    },

    applyGeometry(attributes) {
      // cx/cy always win; x/y only fill a dimension nothing has set yet
      for (const [key, raw] of Object.entries(attributes)) {
        const value = parseDecimal(raw);
        if (value === null) continue;

        switch (key) {
          case "cx":
            width = value;
            break;
          case "cy":
            height = value;
            break;
          case "x":
            width ??= value;
            break;
          case "y":
            height ??= value;
            break;
          case "centerX":
            centerX = value;
            break;
          case "centerY":
            centerY = value;
            break;
        }
      }
    },

    build() {
      if (!colorTouched) {
        throw new LinkError(
          "IncompleteShape",
          "Rectangle is missing a color with at least one channel attribute",
        );
      }

      const color: Color = {
        red: clampChannel(red, depthBits),
        green: clampChannel(green, depthBits),
        blue: clampChannel(blue, depthBits),
        depthBits,
      };

      const center =
        centerX !== null || centerY !== null
          ? { x: clampUnit(centerX ?? 0.5), y: clampUnit(centerY ?? 0.5) }
          : null;

      return {
        kind: "rectangle",
        color,
        geometry: {
          width: clampUnit(width ?? 1),
          height: clampUnit(height ?? 1),
          center,
        },
      };
    },
  };
}

const SHAPE_BUILDERS: ReadonlyMap<string, () => ShapeBuilder> = new Map([
  ["rectangle" satisfies ShapeKind, createRectangleBuilder],
]);

const RESULT_FIELDS: ReadonlyMap<string, (draft: ResultDraft, text: string) => void> = new Map<
  string,
  (draft: ResultDraft, text: string) => void
>([
  ["red", (draft, text) => { draft.red = parseUnsigned(text) ?? draft.red; }],
  ["green", (draft, text) => { draft.green = parseUnsigned(text) ?? draft.green; }],
  ["blue", (draft, text) => { draft.blue = parseUnsigned(text) ?? draft.blue; }],
  ["x", (draft, text) => { draft.x = parseDecimal(text) ?? draft.x; }],
  ["y", (draft, text) => { draft.y = parseDecimal(text) ?? draft.y; }],
  ["Y", (draft, text) => { draft.yLum = parseDecimal(text) ?? draft.yLum; }],
  ...DEPTH_KEYS.map(
    (key): [string, (draft: ResultDraft, text: string) => void] => [
      key,
      (draft, text) => { draft.depthBits = parseDepth(text) ?? draft.depthBits; },
    ],
  ),
]);

function roleOf(name: string, state: ParseState): ElementRole {
  if (name === RESULT_ELEMENT) return "result";
  if (SHAPE_BUILDERS.has(name)) return "shape";
  if (state.builder !== null && COLOR_ELEMENTS.has(name)) return "shape-color";
  if (state.builder !== null && name === GEOMETRY_ELEMENT) return "shape-geometry";
  if (state.inResult && RESULT_FIELDS.has(name)) return "result-field";
  return "other";
}

function onOpenTag(tag: SaxesTagPlain, state: ParseState): void {
  state.stack.push(tag.name);
  state.text = "";

  if (state.stack.length === COMMAND_DEPTH) {
    if (state.commands.has(tag.name)) {
      throw new LinkError(
        "DuplicateCommand",
        `Command <${tag.name}> appears more than once in one message`,
      );
    }
    state.commands.add(tag.name);
  }

  switch (roleOf(tag.name, state)) {
    case "result":
      state.inResult = true;
      break;
    case "shape": {
      const factory = SHAPE_BUILDERS.get(tag.name);
      state.builder = factory ? factory() : null;
      break;
    }
    case "shape-color":
      state.builder?.applyColor(tag.attributes);
      break;
    case "shape-geometry":
      state.builder?.applyGeometry(tag.attributes);
      break;
    default:
      break;
  }
}

function onCloseTag(tag: SaxesTagPlain, state: ParseState): void {
  switch (roleOf(tag.name, state)) {
    case "result":
      state.inResult = false;
      break;
    case "result-field":
      RESULT_FIELDS.get(tag.name)?.(state.draft, state.text);
      break;
    case "shape":
      finishShape(state);
      break;
    default:
      break;
  }

  state.stack.pop();
  state.text = "";
}

function finishShape(state: ParseState): void {
  const builder = state.builder;
  state.builder = null;
  if (builder !== null) {
    state.shapes.push(builder.build());
  }
}

/**
 * saxes is a strict parser; the protocol's own envelope carries an unquoted
 * attribute (`version=1`) and truncated messages leave elements open.
 */
function isToleratedXmlError(message: string): boolean {
  return message.endsWith("unquoted attribute value.") || message.includes("unclosed tag: ");
}

/**
 * Parses one inbound payload. Scalar channels and depth default to
 * `fallback` (the request that was sent) so a response without a
 * `<result>` echoes the request.
 */
export function parseResponse(xml: string, fallback: Color): MeasurementResult {
  const state: ParseState = {
    stack: [],
    commands: new Set(),
    shapes: [],
    draft: {
      red: fallback.red,
      green: fallback.green,
      blue: fallback.blue,
      depthBits: fallback.depthBits,
      x: null,
      y: null,
      yLum: null,
    },
    inResult: false,
    builder: null,
    text: "",
  };

  if (xml.trim() !== "") {
    const parser = new SaxesParser();

    parser.on("error", (err) => {
      if (isToleratedXmlError(err.message)) return;
      throw new LinkError("MalformedXml", `Malformed XML: ${err.message}`, { cause: err });
    });
    parser.on("opentag", (tag) => onOpenTag(tag, state));
    parser.on("closetag", (tag) => onCloseTag(tag, state));
    parser.on("text", (text) => {
      state.text += text;
    });

    try {
      // The declaration must open the document; tolerate leading whitespace
      parser.write(xml.trimStart()).close();
    } catch (err: unknown) {
      if (err instanceof LinkError) throw err;
      throw new LinkError("MalformedXml", `Malformed XML: ${describeError(err)}`, { cause: err });
    }

    // Unterminated shape element at end of input
    finishShape(state);
  }

  const { draft } = state;

  return {
    red: clampChannel(draft.red, draft.depthBits),
    green: clampChannel(draft.green, draft.depthBits),
    blue: clampChannel(draft.blue, draft.depthBits),
    depthBits: draft.depthBits,
    x: draft.x,
    y: draft.y,
    yLum: draft.yLum,
    shapes: state.shapes,
  };
}
