#!/usr/bin/env node
import { main } from "../cli";
import { EXIT_CODES } from "../runner/run";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(e);
    process.exitCode = EXIT_CODES.runtime;
  });
