#!/usr/bin/env node

/**
 * invreg CLI: read and write named inverter registers from the command line.
 */

import { Command } from "commander";
import type { EndpointInput } from "./config";
import { ConfigError } from "./errors";
import { describeRegister, formatReadings, parseValue } from "./format";
import { loadDefaultTable, loadTableFromFile } from "./registers";
import type { RegisterTable } from "./registers";
import { Session } from "./session";

interface ConnectionFlags {
  host?: string;
  port: number;
  serialPath?: string;
  baudRate: number;
  unitId: number;
  timeout: number;
  catalog?: string;
  verbose: boolean;
}

const int = (v: string) => parseInt(v, 10);

function withConnectionOptions(command: Command): Command {
  return command
    .option("-H, --host <host>", "Modbus TCP host of the inverter or its gateway")
    .option("-p, --port <number>", "Modbus TCP port", int, 502)
    .option("-s, --serial-path <path>", "Serial device for Modbus RTU")
    .option("-b, --baud-rate <number>", "Serial baud rate", int, 9600)
    .option("-u, --unit-id <number>", "Modbus unit id", int, 1)
    .option("-t, --timeout <number>", "Request timeout in milliseconds", int, 5000)
    .option("-c, --catalog <path>", "Register catalog JSON file")
    .option("-v, --verbose", "Enable verbose logging", false);
}

function endpointFrom(flags: ConnectionFlags): EndpointInput {
  if (flags.host) return { type: "tcp", host: flags.host, port: flags.port };
  if (flags.serialPath) {
    return { type: "serial", path: flags.serialPath, baudRate: flags.baudRate };
  }
  throw new ConfigError(["either --host or --serial-path is required"]);
}

function tableFrom(flags: { catalog?: string }): RegisterTable {
  return flags.catalog ? loadTableFromFile(flags.catalog) : loadDefaultTable();
}

/** Open a session, run `work`, always close, and report failures. */
async function withSession(
  flags: ConnectionFlags,
  work: (session: Session) => Promise<unknown>
): Promise<void> {
  let session: Session | undefined;
  try {
    session = await Session.connect(endpointFrom(flags), {
      table: tableFrom(flags),
      unitId: flags.unitId,
      requestTimeoutMs: flags.timeout,
      verbose: flags.verbose,
    });
    const result = await work(session);
    console.log(JSON.stringify(result));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    await session?.close();
  }
}

const program = new Command();

program
  .name("invreg")
  .description("Typed access to the Modbus registers of a solar inverter")
  .version("0.1.0");

// ---------- list ----------

program
  .command("list")
  .description("List the registers of the catalog")
  .option("-c, --catalog <path>", "Register catalog JSON file")
  .option("-w, --writable", "Only show writable registers", false)
  .action((opts: { catalog?: string; writable: boolean }) => {
    try {
      for (const descriptor of tableFrom(opts)) {
        if (opts.writable && !descriptor.writable) continue;
        console.log(describeRegister(descriptor));
      }
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

// ---------- get ----------

withConnectionOptions(
  program
    .command("get")
    .description("Read one or more registers by name")
    .argument("<names...>", "Register names")
).action(async (names: string[], opts: ConnectionFlags) => {
  await withSession(opts, async (session) => formatReadings(await session.get(names)));
});

// ---------- set ----------

withConnectionOptions(
  program
    .command("set")
    .description("Write a register by name")
    .argument("<name>", "Register name")
    .argument("<value>", "Value; bitfields take comma separated flags")
    .option("--verify", "Read the register back after writing", false)
).action(async (name: string, value: string, opts: ConnectionFlags & { verify: boolean }) => {
  await withSession(opts, (session) =>
    session.set(name, parseValue(session.table.lookup(name), value), { verify: opts.verify })
  );
});

// ---------- heartbeat ----------

withConnectionOptions(
  program.command("heartbeat").description("Send the keep-alive write once")
).action(async (opts: ConnectionFlags) => {
  await withSession(opts, async (session) => {
    const ok = await session.heartbeat();
    if (!ok) process.exitCode = 1;
    return { ok };
  });
});

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
