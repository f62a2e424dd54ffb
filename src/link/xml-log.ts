import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { SaxesParser, type SaxesTagPlain } from "saxes";
import type { LinkLogger } from "./link-worker.js";
import { describeError } from "./errors.js";

const INDENT = "  ";

export interface XmlMessageLog {
  /** Appends one received payload; never rejects */
  readonly record: (xml: string) => Promise<void>;
}

export interface XmlMessageLogOptions {
  readonly path: string;
  readonly logger?: LinkLogger;
  readonly now?: () => number;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/"/g, "&quot;");
}

function formatTag(tag: SaxesTagPlain, close: ">" | " />"): string {
  const attributes = Object.entries(tag.attributes)
    .map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`)
    .join("");
  return `<${tag.name}${attributes}${close}`;
}

/**
 * Re-indents a payload for reading: one element, text run or comment per
 * line, two spaces per level. Throws on XML the parser cannot follow.
 */
export function prettyPrintXml(xml: string): string {
  const lines: string[] = [];
  const parser = new SaxesParser();
  let depth = 0;
  let skipClose = false;

  function push(line: string): void {
    lines.push(INDENT.repeat(depth) + line);
  }

  parser.on("error", (err) => {
    if (err.message.endsWith("unquoted attribute value.")) return;
    throw err;
  });

  parser.on("xmldecl", (decl) => {
    let line = "<?xml";
    if (decl.version) line += ` version="${decl.version}"`;
    if (decl.encoding) line += ` encoding="${decl.encoding}"`;
    if (decl.standalone) line += ` standalone="${decl.standalone}"`;
    push(`${line}?>`);
  });

  parser.on("processinginstruction", (pi) => {
    push(`<?${pi.target} ${pi.body.trim()}?>`);
  });

  parser.on("opentag", (tag) => {
    if (tag.isSelfClosing) {
      push(formatTag(tag, " />"));
      skipClose = true;
      return;
    }
    push(formatTag(tag, ">"));
    depth += 1;
  });

  parser.on("closetag", (tag) => {
    if (skipClose) {
      skipClose = false;
      return;
    }
    depth = Math.max(0, depth - 1);
    push(`</${tag.name}>`);
  });

  parser.on("text", (text) => {
    const trimmed = text.trim();
    if (trimmed !== "") push(trimmed);
  });

  parser.on("cdata", (data) => {
    push(`<![CDATA[${data.trim()}]]>`);
  });

  parser.on("comment", (comment) => {
    push(`<!--${comment.trim()}-->`);
  });

  parser.write(xml).close();

  return lines.map((line) => `${line}\n`).join("");
}

export function createXmlMessageLog(options: XmlMessageLogOptions): XmlMessageLog {
  const now = options.now ?? Date.now;
  const log = options.logger;
  let appendChain: Promise<void> = Promise.resolve();

  function formatEntry(xml: string): string {
    let body: string;
    try {
      body = prettyPrintXml(xml);
    } catch (err: unknown) {
      log?.warn(`Failed to pretty print XML: ${describeError(err)}`);
      body = xml;
    }

    const timestamp = (now() / 1000).toFixed(3);
    const newline = body.endsWith("\n") ? "" : "\n";
    return `----- Received at ${timestamp} -----\n${body}${newline}----- End -----\n`;
  }

  return {
    record(xml: string): Promise<void> {
      const entry = formatEntry(xml);

      appendChain = appendChain.then(async () => {
        try {
          await mkdir(dirname(options.path), { recursive: true });
          await appendFile(options.path, entry, "utf-8");
        } catch (err: unknown) {
          log?.warn(`Failed to log received XML to ${options.path}: ${describeError(err)}`);
        }
      });

      return appendChain;
    },
  };
}
