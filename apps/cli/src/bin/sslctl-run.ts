#!/usr/bin/env tsx
import { runPositional } from "../run.js"
import { createDefaultDeps, exitOnInterrupt } from "./deps.js"

exitOnInterrupt()
process.exitCode = await runPositional(process.argv.slice(2), createDefaultDeps())
