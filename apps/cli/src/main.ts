#!/usr/bin/env -S node --import tsx
/**
 * tensorpeer CLI entry point.
 *
 * Commands: serve, config
 */
import { readFileSync } from "node:fs";
import { parseEnvFile } from "./parse.js";
import { serveCmd } from "./commands/serve.js";
import { configCmd } from "./commands/config.js";

function loadEnvLocal(): void {
  let content: string;
  try {
    content = readFileSync(".env.local", "utf8");
  } catch (e) {
    // .env.local is optional
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return;
    throw e;
  }
  for (const [key, val] of Object.entries(parseEnvFile(content))) {
    if (!process.env[key]) process.env[key] = val;
  }
}

const USAGE = `
tensorpeer: a training and serving peer for a block-clocked network

Commands:
  serve            Run the neuron: axon, epoch loop, weight commits
  config           Print the resolved configuration and exit

Options:
  --config=<file>  JSON config merged over the defaults
  --<key>=<value>  Override any config key (dotted for nested keys)
  --help, -h       Show this help

Environment:
  TENSORPEER_METRICS_SECRET  Bearer token for the remote metrics sink

Examples:
  tensorpeer serve --config=neuron.json --hotkey=5F...abc
  tensorpeer serve --config=neuron.json --localTrain=true --corpusPath=data/corpus.txt
  tensorpeer config --config=neuron.json --blacklist.enabled=true --blacklist.time.enabled=true
`.trim();

async function main() {
  loadEnvLocal();
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "serve") {
    await serveCmd(args.slice(1));
  } else if (command === "config") {
    await configCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : err);
  process.exit(1);
});
