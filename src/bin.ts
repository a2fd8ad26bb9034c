#!/usr/bin/env node
import { main } from './cli.js';
import { runMain } from './main.js';

await runMain(() => main(process.argv.slice(2)));
