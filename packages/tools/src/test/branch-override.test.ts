import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { checkBranchOverrideCommand } from '../commands/check-branch-override';
import { BranchOverrideService } from '../services/branch-override.service';
import { captureLogs } from './utils/captureLogs';
import { makeTempDir, removeTempDir, writeFile } from './utils/tempDir';

describe('branch override check', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('testsuite-root-');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('passes when no .env.ci exists', () => {
    const output = captureLogs('log', 'info');
    try {
      expect(checkBranchOverrideCommand({ root })).toBe(0);
      expect(output.lines()).toEqual(['[BranchOverride] No CI override files detected - safe to merge']);
    } finally {
      output.restore();
    }
  });

  it('fails when .env.ci is present', () => {
    writeFile(root, '.env.ci', 'PIXI_PR_NUMBER=12\n');
    const errors = captureLogs('error');
    try {
      expect(new BranchOverrideService(root).check()).toEqual({
        overrideFile: path.join(root, '.env.ci'),
        present: true
      });
      expect(checkBranchOverrideCommand({ root })).toBe(1);
      expect(errors.lines()[0]).toBe('[BranchOverride] ERROR: .env.ci file detected');
    } finally {
      errors.restore();
    }
  });
});
