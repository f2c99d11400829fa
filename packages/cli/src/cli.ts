#!/usr/bin/env -S node --import tsx
// ============================================================================
// @fimsmith/cli — Fill-In-the-Middle dataset construction
// ============================================================================
// Commands:
//   fimsmith eval     --input <f> --output <f>        → FIM-only eval set
//   fimsmith mix      --inputs <f...> --fim-percent P → originals + FIM blend
//   fimsmith inspect  <f>                             → output summary
// ============================================================================

import { runCommand } from './commands.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

try {
  process.exitCode = runCommand(process.argv.slice(2));
} catch (error: unknown) {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
}
