#!/usr/bin/env node

import readline from 'readline';
import { loadConfig } from './src/config.js';
import { diagnostic, ErrorCode, formatDiagnostic } from './src/errors.js';
import { createLogger } from './src/logging.js';
import { SessionManager } from './src/session-manager.js';
import type { ServerMessage } from './src/types.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);
const sessions = new SessionManager(config.maxSourceLength);

// One NDJSON frame per line on stdout.
function write(message: ServerMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    process.stdout.write(`${JSON.stringify(message)}\n`, (error) => (error ? reject(error) : resolve()));
  });
}

const sessionId = sessions.openSession(write);
const input = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });

input.on('line', (line) => {
  if (line.trim() === '') {
    return;
  }
  logger.debug(`Received ${line.length} characters`);
  sessions.handleMessage(sessionId, line).catch((error) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(formatDiagnostic(diagnostic(ErrorCode.WsBroadcastError, `Failed to send frame: ${message}`)));
  });
});

input.on('close', () => {
  sessions.closeSession(sessionId);
  logger.info('Input closed, shutting down');
});

process.stdin.on('error', (error) => {
  logger.error(formatDiagnostic(diagnostic(ErrorCode.WsConnectionError, `Input error: ${error.message}`)));
  process.exit(1);
});

logger.info(`glyphscript live server ready (session ${sessionId})`);
