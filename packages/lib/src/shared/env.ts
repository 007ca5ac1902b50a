/**
 * .env file helpers.
 *
 * STARTUP loading goes through dotenv.parse(), which understands inline
 * comments, both quote styles and multi-line values.
 *
 * The line helpers below back the config editor: they work on the raw line
 * sequence so untouched lines (comments, blanks, ordering, CR endings)
 * survive a rewrite byte for byte.
 */
import { parse as dotenvParse } from "dotenv";
import { existsSync, readFileSync } from "node:fs";

// ── Startup loading ─────────────────────────────────────────────────

/** Read and parse a .env file with dotenv. Returns an empty record if the file doesn't exist. */
export function loadDotenvFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) return {};
  return dotenvParse(readFileSync(filePath, "utf8"));
}

// ── Line helpers ────────────────────────────────────────────────────

const UNQUOTED_SAFE = /^[A-Za-z0-9_.\-/:]+$/;

/**
 * Parse one line into a key/value pair.
 * Blank lines, `#` comments and lines without `=` yield null.
 */
export function parseEnvLine(line: string): [key: string, value: string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  const eq = trimmed.indexOf("=");
  if (eq === -1) return null;
  const key = trimmed.slice(0, eq).trim();
  const value = trimmed.slice(eq + 1).trim();
  return [key, unquoteEnvValue(value)];
}

const ESCAPED: Record<string, string> = { n: "\n", r: "\r" };

/** Undo serializeEnvValue() quoting. Single-quoted values are taken literally. */
export function unquoteEnvValue(value: string): string {
  if (value.length >= 2 && value.startsWith("\"") && value.endsWith("\"")) {
    return value.slice(1, -1).replace(/\\(["\\nr])/g, (_, ch: string) => ESCAPED[ch] ?? ch);
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Quote a value unless it is empty or made only of `[A-Za-z0-9_.-/:]`.
 * Line breaks become `\n` / `\r` so a value always stays on one line.
 */
export function serializeEnvValue(value: string): string {
  if (value.length === 0 || UNQUOTED_SAFE.test(value)) return value;
  const escaped = value.replace(/[\\"\n\r]/g, (ch) => (ch === "\n" ? "\\n" : ch === "\r" ? "\\r" : `\\${ch}`));
  return `"${escaped}"`;
}

export function formatEnvLine(key: string, value: string): string {
  return `${key}=${serializeEnvValue(value)}`;
}

export type LineEnding = "\n" | "\r\n";

/** CRLF when the first line break is one, LF otherwise. */
export function detectLineEnding(content: string): LineEnding {
  const lf = content.indexOf("\n");
  return lf > 0 && content[lf - 1] === "\r" ? "\r\n" : "\n";
}

/**
 * Split content on `\n`. A CRLF line keeps its `\r`; the empty piece after
 * a final newline is not a line.
 */
export function splitEnvLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** New text for an existing line, keeping its `\r`. */
export function replaceEnvLine(previous: string, next: string): string {
  return previous.endsWith("\r") ? `${next}\r` : next;
}

/** Append a line in the file's line ending, terminating an unterminated last line first. */
export function appendEnvLine(lines: string[], line: string, eol: LineEnding): void {
  const cr = eol === "\r\n" ? "\r" : "";
  const last = lines.length - 1;
  if (cr && last >= 0 && !lines[last]?.endsWith("\r")) lines[last] += cr;
  lines.push(line + cr);
}

/** Join split lines back into content that ends with a line break. */
export function joinEnvLines(lines: string[], eol: LineEnding = "\n"): string {
  if (lines.length === 0) return "";
  const content = lines.join("\n");
  return content.endsWith("\r") ? `${content}\n` : content + eol;
}

/** Parse raw content into a key/value record; the last duplicate wins. */
export function parseEnvContent(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const parsed = parseEnvLine(line);
    if (!parsed) continue;
    out[parsed[0]] = parsed[1];
  }
  return out;
}

/** Map each key to the index of its last line. */
export function indexEnvLines(lines: string[]): Map<string, number> {
  const index = new Map<string, number>();
  lines.forEach((line, position) => {
    const parsed = parseEnvLine(line);
    if (parsed) index.set(parsed[0], position);
  });
  return index;
}
