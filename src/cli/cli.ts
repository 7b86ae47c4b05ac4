#!/usr/bin/env node
import { main } from '../index.js';

function isMainModule(): boolean {
  // Covers direct execution, the installed bin link and npx
  const mainFile = process.argv[1];
  return Boolean(
    mainFile &&
      (mainFile.endsWith('cli.js') ||
        mainFile.endsWith('cli.ts') ||
        mainFile.includes('mustgather-plan-mcp')),
  );
}

if (isMainModule()) {
  main().catch((error: unknown) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
}
