#!/usr/bin/env tsx
import { runCli } from "../program.js"
import { createDefaultDeps, exitOnInterrupt } from "./deps.js"

exitOnInterrupt()
process.exitCode = await runCli(process.argv.slice(2), createDefaultDeps())
