import { resolveRoot } from '../config/config';
import { BranchOverrideService } from '../services/branch-override.service';
import { createLogger } from '../utils/logger';

const log = createLogger('BranchOverride');

export interface CheckBranchOverrideDeps {
  env: NodeJS.ProcessEnv;
  root: string;
}

export function checkBranchOverrideCommand(deps: Partial<CheckBranchOverrideDeps> = {}): number {
  const root = deps.root ?? resolveRoot(deps.env ?? process.env);
  const { overrideFile, present } = new BranchOverrideService(root).check();

  if (present) {
    log.error('ERROR: .env.ci file detected');
    log.error(`  ${overrideFile} pins pull request or branch artifacts for testing.`);
    log.error('  It must not be merged into main. Remove it from your branch before merging.');
    return 1;
  }

  log.info('No CI override files detected - safe to merge');
  return 0;
}
