/**
 * Text conversions used by the command-line interface.
 */

import type { BitfieldValue, DecodedValue, TypedValue } from "./codec";
import { EncodeError } from "./errors";
import type { RegisterDescriptor } from "./registers";

export type PlainValue = number | string | { flags: string[]; unrecognized: number };

function plain(value: DecodedValue): PlainValue {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") {
    return { flags: [...value.flags], unrecognized: value.unrecognized };
  }
  return value;
}

/** JSON-friendly view of decoded readings: `{ name: { value, unit } }`. */
export function formatReadings(
  readings: Record<string, TypedValue>
): Record<string, { value: PlainValue; unit: string }> {
  const out: Record<string, { value: PlainValue; unit: string }> = {};
  for (const [name, reading] of Object.entries(readings)) {
    out[name] = { value: plain(reading.value), unit: reading.unit };
  }
  return out;
}

/** One line of `list` output. */
export function describeRegister(descriptor: RegisterDescriptor): string {
  const access = descriptor.writable ? "rw" : "r";
  const alias = descriptor.aliasOf ? ` (alias of ${descriptor.aliasOf})` : "";
  const unit = descriptor.unit ? ` [${descriptor.unit}]` : "";
  return `${descriptor.name}\t${descriptor.address}\t${descriptor.length}\t${access}${unit}${alias}`;
}

/**
 * Turn a command-line argument into the value shape the register expects.
 * Bitfields take a comma separated list of flag labels.
 *
 * @throws EncodeError when the text cannot be read as such a value
 */
export function parseValue(descriptor: RegisterDescriptor, text: string): DecodedValue {
  const { type } = descriptor;
  switch (type.kind) {
    case "uint":
    case "int": {
      const value = Number(text);
      if (text.trim() === "" || !Number.isFinite(value)) {
        throw new EncodeError(descriptor.name, `"${text}" is not a number`);
      }
      return value;
    }
    case "enum": {
      const code = Number(text);
      return text.trim() !== "" && Number.isInteger(code) ? code : text;
    }
    case "string":
      return text;
    case "timestamp": {
      const date = new Date(text);
      if (Number.isNaN(date.getTime())) {
        throw new EncodeError(descriptor.name, `"${text}" is not a date`);
      }
      return date;
    }
    case "bitfield": {
      const flags = text
        .split(",")
        .map((flag) => flag.trim())
        .filter((flag) => flag.length > 0);
      const value: BitfieldValue = { flags, unrecognized: 0 };
      return value;
    }
  }
}
