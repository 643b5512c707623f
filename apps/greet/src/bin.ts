#!/usr/bin/env node

/**
 * greet entry point.
 */

import { run } from "./cli.js";

process.exit(run(console));
