#!/usr/bin/env tsx
import cac from "cac";
import { version } from "../package.json";
import { simulate } from "./commands/simulate";
import { validate } from "./commands/validate";

const cli = cac("casement");

cli.command("simulate <scenario>", "Run a window lifecycle scenario tick by tick")
    .option("--max-ticks <n>", "Stop after this many ticks (default: the scenario's maxTicks)")
    .option("-l, --log-level <level>", "Log level (info | warn | error | silent)")
    .action(simulate);

cli.command("validate <scenario>", "Validate a scenario file without running it")
    .option("-l, --log-level <level>", "Log level (info | warn | error | silent)")
    .action(validate);

cli.help();
cli.version(version);
cli.parse();
