#!/usr/bin/env node
import { Command } from "commander";
import { createSubsystemLogger } from "../logging.js";
import { registerTopologyCli } from "./cli.js";

const program = new Command();
program
  .name("cloud-topology")
  .description("Network topology diagrams from a cloud inventory")
  .version("1.0.0");

registerTopologyCli({ program, logger: createSubsystemLogger("cloud-topology") });

await program.parseAsync(process.argv);
