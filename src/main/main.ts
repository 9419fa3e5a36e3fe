#!/usr/bin/env node
import { type CliResult, run } from "./cli.js";

async function main(): Promise<void> {
  const result: CliResult = run(process.argv.slice(2));
  console.log(JSON.stringify(result, null, 2));
}

main()
  .catch((err: Error): never => {
    console.error(err.stack);
    process.exit(1);
  });
