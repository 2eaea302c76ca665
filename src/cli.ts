#!/usr/bin/env node

import pc from 'picocolors';
import { formatFatal, main } from './main.js';

main(process.argv, process.cwd(), pc.isColorSupported).then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(formatFatal(err));
    process.exit(1);
  },
);
