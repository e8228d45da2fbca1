import { z } from "zod";
import { ConfigError } from "./errors";
import type { Endpoint } from "./transport";

export const sessionOptionsSchema = z
  .object({
    /** Modbus unit (slave) id used when a call does not name one. */
    unitId: z.number().int().min(0).max(255).default(1),
    maxRegistersPerRequest: z.number().int().min(1).max(125).default(125),
    coalesceGapThreshold: z.number().int().min(0).max(124).default(0),
    retryAttempts: z.number().int().min(1).max(20).default(5),
    retryBaseDelayMs: z.number().int().min(0).default(250),
    retryMaxDelayMs: z.number().int().min(0).default(4000),
    /** Per-request wire timeout, also used when connecting. */
    requestTimeoutMs: z.number().int().positive().default(5000),
    /** Default bound on waiting for the lock plus executing a call. */
    operationTimeoutMs: z.number().int().positive().default(30000),
    /** Quiet time kept after each transaction before the next one starts. */
    cooldownMs: z.number().int().min(0).default(50),
    autoReconnect: z.boolean().default(false),
  })
  .strict()
  .refine((options) => options.retryMaxDelayMs >= options.retryBaseDelayMs, {
    message: "retryMaxDelayMs must not be below retryBaseDelayMs",
    path: ["retryMaxDelayMs"],
  });

/** Options as written by a caller; every field is optional. */
export type SessionOptionsInput = z.input<typeof sessionOptionsSchema>;
export type SessionOptions = z.output<typeof sessionOptionsSchema>;

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Apply defaults and validate.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveOptions(input: unknown = {}): SessionOptions {
  const parsed = sessionOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}

export const endpointSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("tcp"),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).default(502),
  }),
  z.object({
    type: z.literal("serial"),
    path: z.string().min(1),
    baudRate: z.number().int().positive().default(9600),
    dataBits: z.union([z.literal(5), z.literal(6), z.literal(7), z.literal(8)]).optional(),
    stopBits: z.union([z.literal(1), z.literal(2)]).optional(),
    parity: z.enum(["none", "even", "odd"]).optional(),
  }),
]);

export type EndpointInput = z.input<typeof endpointSchema>;

/** @throws ConfigError */
export function resolveEndpoint(input: unknown): Endpoint {
  const parsed = endpointSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}
