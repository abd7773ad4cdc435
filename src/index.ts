import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { zodToJsonSchema } from "zod-to-json-schema";

import { parseScenario, ScenarioConfig } from "./contracts";
import { toCSV, toLongFormat } from "./export";
import { toDot } from "./render";
import { runScenario } from "./sim";

type CLIOptions = Record<string, string | boolean>;

type ParsedArgs = {
  command: string | undefined;
  options: CLIOptions;
};

export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const options: CLIOptions = {};
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token.startsWith("--")) continue;
    const eqIdx = token.indexOf("=");
    if (eqIdx > 0) {
      options[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
      continue;
    }
    const key = token.slice(2);
    const next = rest[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      options[key] = next;
      i++;
    } else {
      options[key] = true;
    }
  }
  return { command, options };
}

function printUsage(): void {
  console.log(
    `Usage:\n` +
      `  contagion-sim simulate [--config PATH --out PATH --format json|csv --verbose]\n` +
      `  contagion-sim render [--config PATH --out PATH --days N --verbose]\n` +
      `  contagion-sim schema`
  );
}

async function loadScenario(options: CLIOptions): Promise<ScenarioConfig> {
  if (typeof options.config !== "string") return parseScenario({});
  const data = await readFile(options.config, "utf-8");
  return parseScenario(JSON.parse(data), options.config);
}

async function emit(text: string, outPath: string | boolean | undefined) {
  if (typeof outPath !== "string") {
    process.stdout.write(text);
    return;
  }
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, text);
  console.error(`wrote ${outPath}`);
}

const verboseLogger = (options: CLIOptions) =>
  options.verbose === true || options.verbose === "true" ? (msg: string) => console.error(msg) : undefined;

async function handleSimulate(options: CLIOptions) {
  const config = await loadScenario(options);
  const { monitor } = runScenario(config, { logger: verboseLogger(options) });
  const format = options.format ?? "json";
  if (format === "csv") {
    await emit(toCSV(toLongFormat(monitor)), options.out);
    return;
  }
  if (format !== "json") throw new Error(`unknown format: ${String(format)}`);
  const peak = monitor.peakSick();
  await emit(JSON.stringify({ peak, series: monitor }, null, 2) + "\n", options.out);
}

async function handleRender(options: CLIOptions) {
  const config = await loadScenario(options);
  const days = options.days;
  const ndays = typeof days === "string" ? Number(days) : config.ndays;
  if (!Number.isInteger(ndays) || ndays < 0) throw new Error(`--days must be a non-negative integer (got ${String(days)})`);
  const { population } = runScenario({ ...config, ndays }, { logger: verboseLogger(options) });
  await emit(toDot(population), options.out);
}

function handleSchema() {
  const schema = zodToJsonSchema(ScenarioConfig, "ScenarioConfig");
  process.stdout.write(JSON.stringify(schema, null, 2) + "\n");
}

export async function main(argv: string[]) {
  const { command, options } = parseArgs(argv);
  if (!command) {
    printUsage();
    return;
  }

  if (command === "simulate") {
    await handleSimulate(options);
    return;
  }

  if (command === "render") {
    await handleRender(options);
    return;
  }

  if (command === "schema") {
    handleSchema();
    return;
  }

  printUsage();
  process.exitCode = 1;
}
