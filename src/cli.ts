#!/usr/bin/env node
import { readFile } from 'fs/promises';
import { runCli } from './apps/cli/index.js';
import type { CliIO } from './apps/cli/index.js';

const io: CliIO = {
    stdout: text => console.log(text),
    stderr: text => console.error(text),
    readFile: path => readFile(path, 'utf-8'),
    colorSupported: Boolean(process.stdout.isTTY),
};

runCli(process.argv.slice(2), io)
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        console.error('Unexpected failure:', error);
        process.exitCode = 1;
    });
