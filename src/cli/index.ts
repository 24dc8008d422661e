#!/usr/bin/env node

import { createProgram } from './program';
import { reportError } from './commands/build';

// 파싱 및 실행
createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.exit(reportError(error));
  });
