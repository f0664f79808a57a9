#!/usr/bin/env node
import { updateLockfilesCommand } from '../commands/update-lockfiles';

async function main() {
  process.exitCode = await updateLockfilesCommand(process.argv.slice(2));
}

main().catch(error => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
