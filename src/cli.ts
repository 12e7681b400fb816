#!/usr/bin/env node

/**
 * lxp-modbus CLI – command-line interface for LuxPower inverters reached
 * through a WiFi dongle (TCP) or an RS-485 adapter (RTU).
 */

import { Command, InvalidArgumentError } from "commander";
import { createClient, probeModel, type InverterClient } from "./client.js";
import { createConfig, type ConfigInput, type InverterConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { describeFrame } from "./inspect.js";
import { resolveLogger, type Logger } from "./logger.js";
import { Poller } from "./poller.js";
import { withTransport } from "./session.js";

interface ConnectionOptions {
  protocol: string;
  host?: string;
  port: number;
  dongleSerial?: string;
  inverterSerial?: string;
  serialPort?: string;
  baudRate: number;
  parity: string;
  stopBits: number;
  byteSize: number;
  slaveId: number;
  timeout: number;
  retries: number;
  readOnly: boolean;
  verbose: boolean;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, value.startsWith("0x") ? 16 : 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

/** Options shared by every command that talks to an inverter */
function connectionOptions(command: Command): Command {
  return command
    .option("--protocol <type>", "Connection type: tcp or rtu", "tcp")
    .option("-a, --host <ip>", "IP address of the WiFi dongle")
    .option("-p, --port <number>", "Dongle TCP port", parseInteger, 8000)
    .option("-d, --dongle-serial <serial>", "Serial number of the WiFi dongle")
    .option("-i, --inverter-serial <serial>", "Serial number of the inverter")
    .option("-s, --serial-port <path>", "Serial device, e.g. /dev/ttyUSB0")
    .option("--baud-rate <number>", "Serial baud rate", parseInteger, 19200)
    .option("--parity <N|E|O>", "Serial parity", "N")
    .option("--stop-bits <number>", "Serial stop bits", parseInteger, 1)
    .option("--byte-size <number>", "Serial byte size", parseInteger, 8)
    .option("-m, --slave-id <number>", "Modbus slave ID", parseInteger, 1)
    .option("-t, --timeout <number>", "Response timeout in seconds", parseInteger, 5)
    .option("--retries <number>", "Attempts per request", parseInteger, 3)
    .option("--read-only", "Refuse register writes", false)
    .option("-v, --verbose", "Enable verbose logging", false);
}

function toConfigInput(opts: ConnectionOptions): ConfigInput {
  return {
    protocol: opts.protocol,
    host: opts.host,
    port: opts.port,
    dongleSerial: opts.dongleSerial,
    inverterSerial: opts.inverterSerial,
    serialPort: opts.serialPort,
    baudRate: opts.baudRate,
    parity: opts.parity,
    stopBits: opts.stopBits,
    byteSize: opts.byteSize,
    slaveId: opts.slaveId,
    requestTimeout: opts.timeout,
    connectionRetries: opts.retries,
    readOnly: opts.readOnly,
  };
}

function loadConfig(opts: ConnectionOptions, extra: ConfigInput = {}): InverterConfig | undefined {
  const result = createConfig({ ...toConfigInput(opts), ...extra });
  if (!result.ok) {
    for (const issue of result.issues) {
      console.error(`Error: ${issue.message}`);
    }
    process.exitCode = 1;
    return undefined;
  }
  return result.config;
}

/** Connect, run `fn` and disconnect; failures set a non-zero exit code */
async function withClient(
  opts: ConnectionOptions,
  fn: (client: InverterClient, logger: Logger) => Promise<void>
): Promise<void> {
  const config = loadConfig(opts);
  if (!config) return;
  const logger = resolveLogger({ verbose: opts.verbose });
  const client = createClient(config, { logger });
  try {
    await withTransport(client.transport, () => fn(client, logger));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("lxp-modbus")
  .description("CLI for reading and writing LuxPower inverter registers")
  .version("1.0.0");

// ---------- read-holding / read-input ----------

for (const [name, bank, description] of [
  ["read-holding", "hold", "Read holding registers (Modbus FC 3)"],
  ["read-input", "input", "Read input registers (Modbus FC 4)"],
] as const) {
  connectionOptions(
    program
      .command(name)
      .description(description)
      .requiredOption("-r, --register <number>", "Start register address", parseInteger)
      .requiredOption("-q, --quantity <number>", "Number of registers to read", parseInteger)
  ).action((opts: ConnectionOptions & { register: number; quantity: number }) =>
    withClient(opts, async (client) => {
      const registers = await client.readRegisters(bank, opts.register, opts.quantity);
      console.log(JSON.stringify([...registers.values()]));
    })
  );
}

// ---------- write-holding ----------

connectionOptions(
  program
    .command("write-holding")
    .description("Write a single holding register (Modbus FC 6)")
    .requiredOption("-r, --register <number>", "Register address", parseInteger)
    .requiredOption("-V, --value <number>", "Value to write", parseInteger)
).action((opts: ConnectionOptions & { register: number; value: number }) =>
  withClient(opts, async (client) => {
    const written = await client.writeRegister(opts.register, opts.value);
    console.log(JSON.stringify({ register: opts.register, written }));
  })
);

// ---------- write-multiple ----------

connectionOptions(
  program
    .command("write-multiple")
    .description("Write multiple holding registers (Modbus FC 16)")
    .requiredOption("-r, --register <number>", "Start register address", parseInteger)
    .requiredOption("--values <numbers...>", "Values to write (space separated)")
).action((opts: ConnectionOptions & { register: number; values: string[] }) =>
  withClient(opts, async (client) => {
    const written = await client.writeRegisters(opts.register, opts.values.map(parseInteger));
    console.log(JSON.stringify({ register: opts.register, written }));
  })
);

// ---------- model ----------

connectionOptions(
  program.command("model").description("Identify the inverter from its device type code")
).action(async (opts: ConnectionOptions) => {
  const config = loadConfig(opts);
  if (!config) return;
  const result = await probeModel(config, { logger: resolveLogger({ verbose: opts.verbose }) });
  if (result.ok) {
    console.log(`Model: ${result.model}${result.family ? ` (${result.family})` : ""}`);
  } else {
    console.error(`Error (${result.failure}): ${result.message}`);
    process.exitCode = 1;
  }
});

// ---------- poll ----------

connectionOptions(
  program
    .command("poll")
    .description("Read and decode both register banks periodically")
    .option("--interval <seconds>", "Seconds between poll cycles", parseInteger, 60)
    .option("--rated-power <watts>", "Rated inverter power in W", parseInteger, 5000)
    .option("--once", "Run a single cycle and exit", false)
).action(
  async (opts: ConnectionOptions & { interval: number; ratedPower: number; once: boolean }) => {
    const config = loadConfig(opts, { pollInterval: opts.interval, ratedPower: opts.ratedPower });
    if (!config) return;
    const logger = resolveLogger({ verbose: opts.verbose });
    const poller = new Poller(createClient(config, { logger }), { logger });

    poller.on("snapshot", (result) => {
      console.log(JSON.stringify({ capturedAt: result.snapshot.capturedAt, ...result.values }));
    });
    poller.on("cycleError", (err) => {
      console.error(`Error: ${err.message}`);
    });

    if (opts.once) {
      const result = await poller.poll();
      await poller.stop();
      if (!result) process.exitCode = 1;
      return;
    }

    process.once("SIGINT", () => {
      poller.stop().catch((err: unknown) => {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
      });
    });
    poller.start();
  }
);

// ---------- decode ----------

program
  .command("decode")
  .description("Describe a captured dongle or Modbus RTU frame")
  .argument("<hex...>", "Hex bytes of the frame (e.g. a1 1a 01 00 ...)")
  .action((hexBytes: string[]) => {
    try {
      console.log(describeFrame(hexBytes));
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
