#!/usr/bin/env node

/**
 * combjson CLI -- parse a JSON document and print it back
 *
 * Usage:
 *   combjson [--format json|debug] [--out file] [--max-depth n] [--verbose] [file]
 */

import { nodeIO, run } from "./run.js";

process.exitCode = run(process.argv.slice(2), nodeIO());
