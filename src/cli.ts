#!/usr/bin/env node
import { resolve } from "node:path";
import dotenv from "dotenv";
import { runCli } from "./main";

dotenv.config({ path: resolve(process.cwd(), ".env") });

runCli(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
