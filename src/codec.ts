/**
 * Value codec: pure conversions between raw 16-bit register words and typed
 * values, driven entirely by a {@link RegisterDescriptor}.
 */

import { DecodeError, EncodeError, NotWritableError } from "./errors";
import type { DataType, RegisterDescriptor, Scale } from "./registers";

export type RawWords = readonly number[];

export interface BitfieldValue {
  /** Labels of the known bits that are set, in ascending bit order. */
  readonly flags: readonly string[];
  /** Set bits without a label, kept so that encoding is lossless. */
  readonly unrecognized: number;
}

export type DecodedValue = number | string | Date | BitfieldValue;

export interface TypedValue<V extends DecodedValue = DecodedValue> {
  readonly name: string;
  readonly value: V;
  readonly unit: string;
  readonly scale: Scale;
  readonly raw: RawWords;
}

// ---------- Word helpers ----------

/** Words in most-significant-first order, whatever the descriptor's order. */
function orderWords(descriptor: RegisterDescriptor, words: RawWords): RawWords {
  return descriptor.wordOrder === "little" ? [...words].reverse() : words;
}

export function wordsToBigInt(words: RawWords): bigint {
  let result = 0n;
  for (const word of words) {
    result = (result << 16n) | BigInt(word);
  }
  return result;
}

export function bigIntToWords(value: bigint, count: number): number[] {
  const words = new Array<number>(count);
  let rest = value;
  for (let i = count - 1; i >= 0; i--) {
    words[i] = Number(rest & 0xffffn);
    rest >>= 16n;
  }
  return words;
}

function bitsOf(type: DataType): bigint {
  return BigInt(type.kind === "string" ? type.length * 16 : type.width * 16);
}

/** Round half away from zero. */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

// ---------- Decode ----------

function decodeInteger(descriptor: RegisterDescriptor, words: RawWords): bigint {
  const unsigned = wordsToBigInt(orderWords(descriptor, words));
  if (descriptor.type.kind !== "int") return unsigned;
  const bits = bitsOf(descriptor.type);
  const signBit = 1n << (bits - 1n);
  return unsigned & signBit ? unsigned - (1n << bits) : unsigned;
}

function toSafeNumber(descriptor: RegisterDescriptor, value: bigint): number {
  if (
    value > BigInt(Number.MAX_SAFE_INTEGER) ||
    value < BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    throw new DecodeError(descriptor.name, `value ${value} exceeds the safe integer range`);
  }
  return Number(value);
}

function applyScale(raw: number, scale: Scale): number {
  if (scale.numerator === 1 && scale.denominator === 1) return raw;
  return (raw * scale.numerator) / scale.denominator;
}

function decodeString(descriptor: RegisterDescriptor, words: RawWords): string {
  const bytes: number[] = [];
  for (const word of words) {
    bytes.push(word >> 8, word & 0xff);
  }
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end--;
  const content = bytes.slice(0, end);
  const bad = content.find((b) => b > 0x7f);
  if (bad !== undefined) {
    throw new DecodeError(
      descriptor.name,
      `byte 0x${bad.toString(16)} is not ASCII`
    );
  }
  return String.fromCharCode(...content);
}

function decodeValue(descriptor: RegisterDescriptor, words: RawWords): DecodedValue {
  const { type } = descriptor;
  switch (type.kind) {
    case "uint":
    case "int":
      return applyScale(
        toSafeNumber(descriptor, decodeInteger(descriptor, words)),
        descriptor.scale
      );
    case "bitfield": {
      const raw = Number(wordsToBigInt(orderWords(descriptor, words)));
      const flags: string[] = [];
      let known = 0;
      for (const [bit, label] of [...type.flags].sort(([a], [b]) => a - b)) {
        const mask = 2 ** bit;
        if (Math.floor(raw / mask) % 2 === 1) {
          flags.push(label);
          known += mask;
        }
      }
      return Object.freeze({ flags: Object.freeze(flags), unrecognized: raw - known });
    }
    case "enum": {
      const code = Number(wordsToBigInt(orderWords(descriptor, words)));
      const label = type.mapping.get(code);
      if (label === undefined) {
        throw new DecodeError(
          descriptor.name,
          `code ${code} (0x${code.toString(16)}) has no label`
        );
      }
      return label;
    }
    case "string":
      return decodeString(descriptor, words);
    case "timestamp": {
      const ticks = toSafeNumber(descriptor, decodeInteger(descriptor, words));
      const date = new Date((type.epochBase + ticks * type.resolution) * 1000);
      if (Number.isNaN(date.getTime())) {
        throw new DecodeError(descriptor.name, `invalid timestamp ${ticks}`);
      }
      return date;
    }
  }
}

/**
 * Decode the exact raw words of a register into a typed value.
 *
 * @throws DecodeError
 */
export function decode(descriptor: RegisterDescriptor, raw: RawWords): TypedValue {
  if (raw.length !== descriptor.length) {
    throw new DecodeError(
      descriptor.name,
      `expected ${descriptor.length} registers, got ${raw.length}`
    );
  }
  for (const word of raw) {
    if (!Number.isInteger(word) || word < 0 || word > 0xffff) {
      throw new DecodeError(descriptor.name, `${word} is not a 16-bit register value`);
    }
  }
  return Object.freeze({
    name: descriptor.name,
    value: decodeValue(descriptor, raw),
    unit: descriptor.unit,
    scale: descriptor.scale,
    raw: Object.freeze([...raw]),
  });
}

// ---------- Encode ----------

function integerRange(type: DataType): [bigint, bigint] {
  const bits = bitsOf(type);
  if (type.kind === "int") {
    return [-(1n << (bits - 1n)), (1n << (bits - 1n)) - 1n];
  }
  return [0n, (1n << bits) - 1n];
}

function encodeInteger(
  descriptor: RegisterDescriptor,
  value: bigint
): number[] {
  const [min, max] = integerRange(descriptor.type);
  if (value < min || value > max) {
    throw new EncodeError(
      descriptor.name,
      `${value} is outside ${min}..${max} for ${descriptor.length} register(s)`
    );
  }
  const bits = bitsOf(descriptor.type);
  const unsigned = value < 0n ? value + (1n << bits) : value;
  return [...orderWords(descriptor, bigIntToWords(unsigned, descriptor.length))];
}

function unscale(descriptor: RegisterDescriptor, value: number): bigint {
  const { numerator, denominator } = descriptor.scale;
  const raw = roundHalfAwayFromZero((value * denominator) / numerator);
  if (!Number.isSafeInteger(raw)) {
    throw new EncodeError(descriptor.name, `${value} cannot be represented exactly`);
  }
  return BigInt(raw);
}

function encodeString(descriptor: RegisterDescriptor, value: string): number[] {
  const capacity = descriptor.length * 2;
  const trimmed = value.replace(/\0+$/, "");
  if (trimmed.length > capacity) {
    throw new EncodeError(
      descriptor.name,
      `string of ${trimmed.length} characters does not fit in ${capacity} bytes`
    );
  }
  const bytes = new Array<number>(capacity).fill(0);
  for (let i = 0; i < trimmed.length; i++) {
    const code = trimmed.charCodeAt(i);
    if (code > 0x7f) {
      throw new EncodeError(descriptor.name, `character ${JSON.stringify(trimmed[i])} is not ASCII`);
    }
    bytes[i] = code;
  }
  const words: number[] = [];
  for (let i = 0; i < capacity; i += 2) {
    words.push((bytes[i] << 8) | bytes[i + 1]);
  }
  return words;
}

function isBitfieldValue(value: unknown): value is BitfieldValue {
  if (typeof value !== "object" || value === null) return false;
  if (!("flags" in value) || !("unrecognized" in value)) return false;
  return (
    Array.isArray(value.flags) &&
    value.flags.every((flag: unknown) => typeof flag === "string") &&
    typeof value.unrecognized === "number"
  );
}

function expectNumber(descriptor: RegisterDescriptor, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new EncodeError(descriptor.name, `expected a finite number, got ${String(value)}`);
  }
  return value;
}

function encodeValue(descriptor: RegisterDescriptor, value: unknown): number[] {
  const { type } = descriptor;
  switch (type.kind) {
    case "uint":
    case "int":
      return encodeInteger(descriptor, unscale(descriptor, expectNumber(descriptor, value)));
    case "bitfield": {
      if (!isBitfieldValue(value)) {
        throw new EncodeError(descriptor.name, "expected { flags, unrecognized }");
      }
      const bitsByLabel = new Map([...type.flags].map(([bit, label]) => [label, bit]));
      let raw = 0n;
      for (const flag of value.flags) {
        const bit = bitsByLabel.get(flag);
        if (bit === undefined) {
          throw new EncodeError(descriptor.name, `unknown flag "${flag}"`);
        }
        raw |= 1n << BigInt(bit);
      }
      if (!Number.isSafeInteger(value.unrecognized) || value.unrecognized < 0) {
        throw new EncodeError(descriptor.name, "unrecognized bits must be a non-negative integer");
      }
      const residual = BigInt(value.unrecognized);
      let labelled = 0n;
      for (const bit of type.flags.keys()) labelled |= 1n << BigInt(bit);
      if ((residual & labelled) !== 0n) {
        throw new EncodeError(descriptor.name, "unrecognized bits overlap named flags");
      }
      return encodeInteger(descriptor, raw | residual);
    }
    case "enum": {
      let code: number | undefined;
      if (typeof value === "string") {
        code = [...type.mapping].find(([, label]) => label === value)?.[0];
      } else if (typeof value === "number" && type.mapping.has(value)) {
        code = value;
      }
      if (code === undefined) {
        throw new EncodeError(descriptor.name, `${JSON.stringify(value)} is not a known label`);
      }
      return encodeInteger(descriptor, BigInt(code));
    }
    case "string":
      if (typeof value !== "string") {
        throw new EncodeError(descriptor.name, "expected a string");
      }
      return encodeString(descriptor, value);
    case "timestamp": {
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        throw new EncodeError(descriptor.name, "expected a valid Date");
      }
      const seconds = value.getTime() / 1000 - type.epochBase;
      const ticks = seconds / type.resolution;
      if (!Number.isInteger(ticks)) {
        throw new EncodeError(
          descriptor.name,
          `${value.toISOString()} is not a whole multiple of ${type.resolution}s`
        );
      }
      return encodeInteger(descriptor, BigInt(ticks));
    }
  }
}

/**
 * Encode a value for writing.
 *
 * @throws NotWritableError when the register is read-only
 * @throws EncodeError when the value does not fit the register
 */
export function encode(descriptor: RegisterDescriptor, value: unknown): RawWords {
  if (!descriptor.writable) {
    throw new NotWritableError(descriptor.name);
  }
  return Object.freeze(encodeValue(descriptor, value));
}
