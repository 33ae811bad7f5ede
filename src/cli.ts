#!/usr/bin/env node

import { basename } from 'path';
import { PoznoteCli } from './index.js';

const cli = new PoznoteCli({
  commandName: process.argv[1] ? basename(process.argv[1]) : 'poznote',
});

cli
  .run(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('[Fatal] Unexpected failure:', error);
    process.exit(1);
  });
