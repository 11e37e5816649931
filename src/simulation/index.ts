// src/simulation/index.ts

import { createLogger } from '../utils/logger';
import { runDeskSimulation } from './runDeskSimulation';

const logger = createLogger({ level: 'info', pretty: process.stdout.isTTY });

const { violations } = runDeskSimulation(logger);
process.exitCode = violations.length === 0 ? 0 : 1;
