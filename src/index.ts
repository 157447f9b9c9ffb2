#!/usr/bin/env node
import { runCli } from './core/cli.js';

void runCli(process.argv.slice(2));
