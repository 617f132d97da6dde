#!/usr/bin/env node
import { buildProgram, reportFailure } from "./program.js";

const abortController = new AbortController();
process.on("SIGINT", () => abortController.abort("SIGINT received"));
process.on("SIGTERM", () => abortController.abort("SIGTERM received"));

await buildProgram(abortController.signal).parseAsync(process.argv).catch(reportFailure);
