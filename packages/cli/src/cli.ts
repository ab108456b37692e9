#!/usr/bin/env node

/**
 * pbrtkit CLI
 *
 * Usage:
 *   pbrtkit dump scene.pbrt [--json] [--log-level debug]
 *   pbrtkit tokens scene.pbrt [--no-comments]
 */

import { run } from "./program.js";

run(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
