/**
 * Field Parser
 *
 * Classifies a protocol line:
 *
 *   <blank>          message boundary
 *   : text           comment (keep-alive)
 *   key: value       field, at most one space after the colon is dropped
 *   key              field with no value
 */

const COLON = 0x3a;
const SPACE = 0x20;

const EMPTY: Uint8Array = new Uint8Array(0);

export type FieldName = "id" | "event" | "data" | "retry";

const encoder = new TextEncoder();

const FIELD_NAMES: ReadonlyArray<readonly [FieldName, Uint8Array]> = (
  ["id", "event", "data", "retry"] as const
).map((name) => [name, encoder.encode(name)] as const);

export interface SplitLine {
  key: Uint8Array;
  /** `undefined` when the line has no colon. */
  value: Uint8Array | undefined;
}

export type ParsedLine =
  | { kind: "blank" }
  | { kind: "comment"; text: Uint8Array }
  | { kind: "field"; name: FieldName; value: Uint8Array }
  | { kind: "ignored"; name: Uint8Array };

/**
 * Split a line on its first colon. Both parts are views into `line`.
 */
export function splitLine(line: Uint8Array): SplitLine {
  const colon = line.indexOf(COLON);
  if (colon === -1) {
    return { key: line, value: undefined };
  }
  const start = line[colon + 1] === SPACE ? colon + 2 : colon + 1;
  return { key: line.subarray(0, colon), value: line.subarray(start) };
}

export function parseLine(line: Uint8Array): ParsedLine {
  if (line.length === 0) {
    return { kind: "blank" };
  }

  const { key, value } = splitLine(line);
  if (key.length === 0) {
    return { kind: "comment", text: value ?? EMPTY };
  }

  const name = matchFieldName(key);
  if (name === undefined) {
    return { kind: "ignored", name: key };
  }
  return { kind: "field", name, value: value ?? EMPTY };
}

function matchFieldName(key: Uint8Array): FieldName | undefined {
  for (const [name, bytes] of FIELD_NAMES) {
    if (bytesEqual(key, bytes)) {
      return name;
    }
  }
  return undefined;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}
