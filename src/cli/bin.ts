#!/usr/bin/env node
import { runCLI } from './index.js';
import { setLogLevel } from '../utils/logger.js';

// stderr stays quiet unless asked for more
if (!process.env.EXPEDITION_LOG_LEVEL) {
    setLogLevel('warn');
}

runCLI(process.argv).then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    }
);
