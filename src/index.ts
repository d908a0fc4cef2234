#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

const main = createCliMain(createProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

export { main, isCliInvocation };
export { createProgram };
export type { CliDependencies } from "./cli/program.js";
