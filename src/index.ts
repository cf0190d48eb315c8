#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli/run.js';
import { loadSettings } from './config/settings.js';

dotenv.config();

const output = await runCli(process.argv.slice(2), loadSettings());
console.log(output);
