#!/usr/bin/env node
import { verifyArtifactsCommand } from '../commands/verify-artifacts';

async function main() {
  process.exitCode = await verifyArtifactsCommand();
}

main().catch(error => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
