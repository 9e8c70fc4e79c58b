#!/usr/bin/env node
import 'dotenv/config';
import { createProgram, runChunker } from './cli/run.js';

const program = createProgram((source, output, options) => {
  process.exitCode = runChunker(source, output, options);
});

program.parse(process.argv);
