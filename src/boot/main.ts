import * as path from 'path';
import * as dotenv from 'dotenv';

import { now } from '@utils/time';

import { createProgram } from './cli';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const program = createProgram({
  stdout: function(line: string) {
    process.stdout.write(line + '\n');
  },
  stderr: function(line: string) {
    process.stderr.write(line + '\n');
  },
  useColor: process.stderr.isTTY === true,
  clock: now
}, process.env, function(code: number) {
  process.exitCode = code;
});

program.parseAsync(process.argv).catch(function(error: unknown) {
  process.stderr.write('FATAL: ' + (error instanceof Error ? error.message : String(error)) + '\n');
  process.exitCode = 1;
});
