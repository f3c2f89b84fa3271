#!/usr/bin/env node
import { config } from 'dotenv';
import { runExportCommand } from './export-command.js';

config();

runExportCommand(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
