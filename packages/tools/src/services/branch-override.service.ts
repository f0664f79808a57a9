import * as fs from 'fs';
import * as path from 'path';
import { CI_OVERRIDE_FILE } from '../config/config';

export interface BranchOverrideCheck {
  overrideFile: string;
  present: boolean;
}

/**
 * `.env.ci` pins PR or branch artifacts for a test run and must never reach main.
 */
export class BranchOverrideService {
  constructor(private readonly root: string) {}

  check(): BranchOverrideCheck {
    const overrideFile = path.join(this.root, CI_OVERRIDE_FILE);
    return { overrideFile, present: fs.existsSync(overrideFile) };
  }
}
