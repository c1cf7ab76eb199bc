#!/usr/bin/env node
import { nodeToolIO, runTool } from "../cli/tools.js";

process.exitCode = runTool("escape", process.argv.slice(2), nodeToolIO());
