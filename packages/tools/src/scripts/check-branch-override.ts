#!/usr/bin/env node
import { checkBranchOverrideCommand } from '../commands/check-branch-override';

process.exitCode = checkBranchOverrideCommand();
