#!/usr/bin/env node
import { nodeToolIO, runTool } from "../cli/tools.js";

process.exitCode = runTool("strip", process.argv.slice(2), nodeToolIO());
