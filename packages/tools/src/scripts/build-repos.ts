#!/usr/bin/env node
import { buildReposCommand } from '../commands/build-repos';

async function main() {
  process.exitCode = await buildReposCommand();
}

main().catch(error => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
