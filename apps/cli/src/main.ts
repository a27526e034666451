#!/usr/bin/env node
/**
 * valuegraph CLI — the main entry point.
 */
import { trainCmd } from "./commands/train.js";

const USAGE = `
valuegraph — scalar autograd and a tiny MLP

Commands:
  train            Train an MLP with SGD on a JSON sample file

Options:
  --data=PATH            Samples: [{ "x": number[], "y": number | number[] }]
  --layers=4,4,1         Layer widths (input width comes from the data)
  --activation=tanh      tanh | relu | linear
  --outputActivation=..  Activation of the last layer
  --iters=100 --lr=0.05 --batch=0 --seed=42
  --log=info             debug | info | warn | error
  --logInterval=10
  --config=PATH          JSON file of the options above (CLI wins)
  --help, -h             Show this help

Examples:
  valuegraph train
  valuegraph train --data=data/xor.json --layers=8,1 --iters=500 --lr=0.1
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "train") {
    await trainCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
