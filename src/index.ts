#!/usr/bin/env node

import { main } from './cli';
import { errorMessage } from './helpers/errors';

main().then(code => process.exit(code), (error: unknown) => {
  console.error(`❌ Error: ${errorMessage(error)}`);
  process.exit(1);
});
