#!/usr/bin/env node
/**
 * relnotes CLI entry point
 */

import { closeHttpAgents } from '../config/httpClient.js';
import { runCli } from './program.js';

const exitCode = await runCli(process.argv.slice(2));
closeHttpAgents();
process.exitCode = exitCode;
