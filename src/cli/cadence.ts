#!/usr/bin/env node
import { runCadenceCli } from "../cadence/cli";

runCadenceCli(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch(err => {
    console.error(err);
    process.exit(1);
  });
