#!/usr/bin/env node
import { logger } from "../observability/logger.js";
import { main } from "./main.js";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ error: err }, "docdelta failed");
    process.exitCode = 1;
  });
