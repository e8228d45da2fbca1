/**
 * Register descriptor table.
 *
 * Definitions arrive loosely typed (a JSON catalog, or objects written by a
 * caller) and are validated once into frozen descriptors. After
 * construction the table is read-only and safe to share between callers.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { RegisterTableError, UnknownRegisterError } from "./errors";

// ---------- Descriptor types ----------

export type RegisterSpace = "holding" | "input";
export type WordOrder = "big" | "little";

/** Exact rational multiplier applied to the raw integer. */
export interface Scale {
  readonly numerator: number;
  readonly denominator: number;
}

export const UNIT_SCALE: Scale = Object.freeze({ numerator: 1, denominator: 1 });

export type DataType =
  | { readonly kind: "uint"; readonly width: number }
  | { readonly kind: "int"; readonly width: number }
  | {
      readonly kind: "bitfield";
      readonly width: number;
      /** bit index → flag label */
      readonly flags: ReadonlyMap<number, string>;
    }
  | {
      readonly kind: "enum";
      readonly width: number;
      /** raw code → label */
      readonly mapping: ReadonlyMap<number, string>;
    }
  | { readonly kind: "string"; readonly length: number }
  | {
      readonly kind: "timestamp";
      readonly width: number;
      /** Unix time, in seconds, of raw value 0. */
      readonly epochBase: number;
      /** Seconds per raw tick. */
      readonly resolution: number;
    };

export interface RegisterDescriptor {
  readonly name: string;
  readonly address: number;
  /** Number of 16-bit registers. */
  readonly length: number;
  readonly type: DataType;
  readonly scale: Scale;
  readonly unit: string;
  readonly writable: boolean;
  readonly space: RegisterSpace;
  readonly wordOrder: WordOrder;
  readonly aliasOf?: string;
}

/** Register count occupied by a data type. */
export function typeWidth(type: DataType): number {
  return type.kind === "string" ? type.length : type.width;
}

// ---------- Definition schema ----------

const integerKey = (max: number) =>
  z.string().transform((key, ctx) => {
    const value = Number(key);
    if (!Number.isInteger(value) || value < 0 || value > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `key ${key} must be an integer between 0 and ${max}`,
      });
      return z.NEVER;
    }
    return value;
  });

const labelTable = (max: number) =>
  z
    .record(z.string().min(1))
    .transform((record, ctx) => {
      const table = new Map<number, string>();
      const labels = new Set<string>();
      for (const [key, label] of Object.entries(record)) {
        const parsed = integerKey(max).safeParse(key);
        if (!parsed.success) {
          for (const issue of parsed.error.issues) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message });
          }
          continue;
        }
        if (labels.has(label)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `label "${label}" is used twice`,
          });
        }
        labels.add(label);
        table.set(parsed.data, label);
      }
      return table;
    });

const width = z.number().int().min(1).max(4);
const narrowWidth = z.number().int().min(1).max(2);

const dataTypeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("uint"), width }),
  z.object({ kind: z.literal("int"), width }),
  z.object({
    kind: z.literal("bitfield"),
    width: narrowWidth,
    flags: labelTable(31),
  }),
  z.object({
    kind: z.literal("enum"),
    width: narrowWidth,
    mapping: labelTable(0xffffffff),
  }),
  z.object({
    kind: z.literal("string"),
    length: z.number().int().min(1).max(125),
  }),
  z.object({
    kind: z.literal("timestamp"),
    width: width.default(2),
    epochBase: z.number().int().default(0),
    resolution: z.number().int().positive().default(1),
  }),
]);

const scaleSchema = z
  .union([
    z.number().int().positive(),
    z.tuple([z.number().int().positive(), z.number().int().positive()]),
  ])
  .transform((scale): Scale =>
    typeof scale === "number"
      ? { numerator: scale, denominator: 1 }
      : { numerator: scale[0], denominator: scale[1] }
  );

export const registerDefinitionSchema = z.object({
  name: z.string().min(1),
  address: z.number().int().min(0).max(0xffff),
  length: z.number().int().positive().optional(),
  type: dataTypeSchema,
  /** Integer multiplier, or `[numerator, denominator]`. */
  scale: scaleSchema.optional(),
  unit: z.string().default(""),
  writable: z.boolean().default(false),
  space: z.enum(["holding", "input"]).default("holding"),
  wordOrder: z.enum(["big", "little"]).default("big"),
  aliasOf: z.string().min(1).optional(),
});

/** Shape accepted by {@link RegisterTable.fromDefinitions}. */
export type RegisterDefinition = z.input<typeof registerDefinitionSchema>;

function formatIssues(index: number, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "definition";
    return `#${index} ${path}: ${issue.message}`;
  });
}

// ---------- Table ----------

export class RegisterTable implements Iterable<RegisterDescriptor> {
  private readonly byName: ReadonlyMap<string, RegisterDescriptor>;

  private constructor(descriptors: readonly RegisterDescriptor[]) {
    this.byName = new Map(descriptors.map((d) => [d.name, d]));
  }

  /**
   * Validate definitions and build an immutable table.
   *
   * @throws RegisterTableError listing every problem found
   */
  static fromDefinitions(definitions: readonly unknown[]): RegisterTable {
    const issues: string[] = [];
    const descriptors: RegisterDescriptor[] = [];
    const seen = new Set<string>();

    definitions.forEach((definition, index) => {
      const parsed = registerDefinitionSchema.safeParse(definition);
      if (!parsed.success) {
        issues.push(...formatIssues(index, parsed.error));
        return;
      }
      const def = parsed.data;
      const length = typeWidth(def.type);

      if (seen.has(def.name)) {
        issues.push(`${def.name}: duplicate register name`);
        return;
      }
      seen.add(def.name);

      if (def.length !== undefined && def.length !== length) {
        issues.push(
          `${def.name}: length ${def.length} does not match its type width ${length}`
        );
        return;
      }
      if (def.address + length > 0x10000) {
        issues.push(`${def.name}: registers run past address 65535`);
        return;
      }
      if (def.writable && def.space === "input") {
        issues.push(`${def.name}: input registers cannot be writable`);
      }
      if (def.type.kind === "bitfield") {
        const bits = def.type.width * 16;
        for (const bit of def.type.flags.keys()) {
          if (bit >= bits) issues.push(`${def.name}: flag bit ${bit} exceeds ${bits} bits`);
        }
      }
      if (def.type.kind === "enum") {
        const limit = 2 ** (def.type.width * 16);
        for (const code of def.type.mapping.keys()) {
          if (code >= limit) issues.push(`${def.name}: enum code ${code} does not fit`);
        }
      }

      descriptors.push(
        Object.freeze({
          name: def.name,
          address: def.address,
          length,
          type: Object.freeze(def.type),
          scale: Object.freeze(def.scale ?? UNIT_SCALE),
          unit: def.unit,
          writable: def.writable,
          space: def.space,
          wordOrder: def.wordOrder,
          aliasOf: def.aliasOf,
        })
      );
    });

    issues.push(...RegisterTable.checkLayout(descriptors));

    if (issues.length > 0) {
      throw new RegisterTableError(issues);
    }
    return new RegisterTable(descriptors);
  }

  /** Aliases must mirror their target; everything else must not overlap. */
  private static checkLayout(descriptors: readonly RegisterDescriptor[]): string[] {
    const issues: string[] = [];
    const byName = new Map(descriptors.map((d) => [d.name, d]));

    for (const d of descriptors) {
      if (d.aliasOf === undefined) continue;
      const target = byName.get(d.aliasOf);
      if (!target) {
        issues.push(`${d.name}: alias target ${d.aliasOf} does not exist`);
      } else if (target.aliasOf !== undefined) {
        issues.push(`${d.name}: alias target ${d.aliasOf} is itself an alias`);
      } else if (
        target.address !== d.address ||
        target.length !== d.length ||
        target.space !== d.space
      ) {
        issues.push(`${d.name}: alias must cover the same registers as ${d.aliasOf}`);
      }
    }

    const primaries = descriptors
      .filter((d) => d.aliasOf === undefined)
      .sort((a, b) => (a.space === b.space ? a.address - b.address : a.space < b.space ? -1 : 1));

    for (let i = 1; i < primaries.length; i++) {
      const prev = primaries[i - 1];
      const cur = primaries[i];
      if (prev.space === cur.space && cur.address < prev.address + prev.length) {
        issues.push(
          `${cur.name}: overlaps ${prev.name} at ${cur.space} register ${cur.address}`
        );
      }
    }
    return issues;
  }

  /** @throws UnknownRegisterError */
  lookup(name: string): RegisterDescriptor {
    const descriptor = this.byName.get(name);
    if (!descriptor) {
      throw new UnknownRegisterError(name);
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  get size(): number {
    return this.byName.size;
  }

  [Symbol.iterator](): Iterator<RegisterDescriptor> {
    return this.byName.values();
  }
}

// ---------- Bundled catalog ----------

const CATALOG_FILE = join("catalog", "inverter-registers.json");

// Sources sit one level below the package root, compiled output two.
export const DEFAULT_CATALOG_PATH =
  [join(__dirname, "..", CATALOG_FILE), join(__dirname, "..", "..", CATALOG_FILE)].find((candidate) =>
    existsSync(candidate)
  ) ?? join(__dirname, "..", CATALOG_FILE);

/** Load a table from a JSON array of register definitions. */
export function loadTableFromFile(path: string): RegisterTable {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new RegisterTableError([`${path}: expected an array of definitions`]);
  }
  return RegisterTable.fromDefinitions(parsed);
}

let defaultTable: RegisterTable | null = null;

/** The inverter catalog shipped with the package, loaded once. */
export function loadDefaultTable(): RegisterTable {
  if (defaultTable === null) {
    defaultTable = loadTableFromFile(DEFAULT_CATALOG_PATH);
  }
  return defaultTable;
}
