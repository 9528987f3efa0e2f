#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { main } from './main';

main(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    readFile: path => readFile(path, 'utf8')
}).then(
    code => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error(err);
        process.exitCode = 1;
    }
);
