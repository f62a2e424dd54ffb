import type { Color } from "../types/protocol.js";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" ?>';

function envelope(body: string): string {
  return `${XML_DECLARATION}\n<CS_RMC version=1>${body}</CS_RMC>`;
}

/** Handshake sent once per connection, before any measurement request */
export function buildInitProfileCommand(): string {
  return envelope("<command>init profile</command>");
}

export function buildMeasurementCommand(color: Color): string {
  return envelope(
    "<measurement>" +
      `<red>${color.red}</red>` +
      `<green>${color.green}</green>` +
      `<blue>${color.blue}</blue>` +
      "</measurement>",
  );
}
