#!/usr/bin/env tsx
import { ExtractPipeline } from "@casetable/core";
import { CLI } from "./cli";

const cli = new CLI(new ExtractPipeline());
const exitCode = await cli.run(process.argv.slice(2));
process.exit(exitCode);
