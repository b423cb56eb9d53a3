#!/usr/bin/env node
import "dotenv/config";
import { createCli } from "./cli.js";

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
