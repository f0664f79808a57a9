#!/usr/bin/env node
import { downloadArtifactsCommand } from '../commands/download-artifacts';

async function main() {
  process.exitCode = await downloadArtifactsCommand(process.argv.slice(2));
}

main().catch(error => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
