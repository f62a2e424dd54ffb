/** Supported channel bit depths */
export type BitDepth = 8 | 10 | 12 | 16;

/** RGB color; all three channels share one depth */
export interface Color {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
  readonly depthBits: BitDepth;
}

/** Normalized (0-1) point on the display surface */
export interface NormalizedPoint {
  readonly x: number;
  readonly y: number;
}

/** Normalized footprint of a shape; center is null when the shape is centered */
export interface Geometry {
  readonly width: number;
  readonly height: number;
  readonly center: NormalizedPoint | null;
}

export interface RectangleShape {
  readonly kind: "rectangle";
  readonly color: Color;
  readonly geometry: Geometry;
}

export type ShapeInstruction = RectangleShape;

export type ShapeKind = ShapeInstruction["kind"];

/** One parsed response from the instrument */
export interface MeasurementResult {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
  readonly depthBits: BitDepth;
  /** Tristimulus readings; null when not reported in this message */
  readonly x: number | null;
  readonly y: number | null;
  readonly yLum: number | null;
  readonly shapes: readonly ShapeInstruction[];
}

/** Which shape supplies the measured color when a response carries shapes */
export type ShapeColorPriority = "first" | "smallest-area";

export type LinkFaultCode = "DuplicateCommand" | "IncompleteShape" | "MalformedXml" | "InvalidPayload";

/** Unrecoverable protocol violation that stopped the worker */
export interface LinkFault {
  readonly code: LinkFaultCode;
  readonly message: string;
  readonly at: number;
}

/** Point-in-time copy of the shared link state */
export interface LinkSnapshot {
  readonly connected: boolean;
  readonly shapes: readonly ShapeInstruction[];
  readonly measuredColor: Color;
  readonly requestedColor: Color;
  readonly lastMeasurement: MeasurementResult | null;
  readonly lastError: string | null;
  readonly fault: LinkFault | null;
}

/** PUT /request-color request body */
export interface RequestColorPayload {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
  readonly bits?: BitDepth;
}

/** GET /health response */
export interface HealthResponse {
  readonly status: "ok" | "degraded";
  readonly remote: string;
  readonly connected: boolean;
  readonly uptime: number;
  readonly lastError: string | null;
  readonly fault: LinkFaultCode | null;
}

/** GET /state response */
export interface StateResponse extends LinkSnapshot {
  readonly measuredColor8: Color;
}
