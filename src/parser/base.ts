import type { JsonFeeder } from "./feeder";

export class JsonParserError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "JsonParserError";
  }
}

export type JsonFeedParserErrorKind = "structure" | "lexical" | "depth" | "trailing";

const formatByte = (c: number | undefined) => {
  if (c === undefined) return "EOF";
  if (c >= 0x20 && c < 0x7f) return `'${String.fromCharCode(c)}'`;
  return `0x${c.toString(16).toUpperCase().padStart(2, "0")}`;
};

export class JsonFeedParserError extends JsonParserError {
  kind: JsonFeedParserErrorKind;
  reason: string;
  /** the offending byte, `undefined` when the input ended too early */
  byte: number | undefined;
  position: number;

  constructor(kind: JsonFeedParserErrorKind, reason: string, byte: number | undefined, position: number) {
    super(`At ${position}, ${formatByte(byte)} - ${reason}`);
    this.name = "JsonFeedParserError";
    this.kind = kind;
    this.reason = reason;
    this.byte = byte;
    this.position = position;
  }
}

export type JsonFeederErrorCode = "capacity_exceeded" | "already_closed" | "invalid_byte" | "invalid_capacity" | "empty";

export class JsonFeederError extends JsonParserError {
  code: JsonFeederErrorCode;

  constructor(code: JsonFeederErrorCode, msg: string) {
    super(msg);
    this.name = "JsonFeederError";
    this.code = code;
  }
}

export const DEFAULT_MAX_DEPTH = 2048;
export const DEFAULT_FEEDER_CAPACITY = 1024;

export type JsonFeedParserOption = {
  /**
   * maximum number of arrays and objects open at the same time
   * @default 2048
   */
  maxDepth?: number;
  /**
   * the feeder to read bytes from, a new one is created when omitted
   */
  feeder?: JsonFeeder;
  /**
   * capacity of the feeder created for the parser, ignored when `feeder` is given
   * @default 1024
   */
  feederCapacity?: number;
  /**
   * whether to accept a string, number or literal as the whole JSON text,
   * otherwise it must be an object or array
   * @example '"a"', '12', 'true'
   */
  acceptTopLevelScalar?: boolean;
  /**
   * whether to accept several top-level values, separated by optional whitespace;
   * a number is ended by whitespace or by the `[`, `{` or `"` starting the next value
   * @example '{"a":1} {"a":2}', '[1][2]', '1 2 3' (with `acceptTopLevelScalar`)
   */
  acceptMultipleValues?: boolean;
};

export const parseJsonNumber = (str: string): number => Number(str);
export const parseJsonInteger = (str: string): bigint | undefined => {
  try {
    return BigInt(str);
  } catch (e) {
    return undefined;
  }
};

export const toJsonBytes = (input: string | Uint8Array): Uint8Array =>
  typeof input === "string" ? Buffer.from(input, "utf8") : input;
