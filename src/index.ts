/**
 * docmeta CLI entry
 *
 * Loads .env, wires process signals to an AbortController and runs the CLI.
 * stdout carries only the report; every log line goes to stderr.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. DOCMETA_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.DOCMETA_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

import { runCli } from './cli.js';

const controller = new AbortController();

function handleShutdown(signal: NodeJS.Signals): void {
  if (controller.signal.aborted) {
    console.error(`[Shutdown] Received ${signal} again, exiting`);
    process.exit(1);
  }
  console.error(`[Shutdown] Received ${signal}, cancelling the run...`);
  process.exitCode = 1;
  controller.abort(new Error(`Received ${signal}`));
  // Force exit if cancellation hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', handleShutdown);
process.on('SIGINT', handleShutdown);

runCli(process.argv.slice(2), process.env, {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (line) => console.error(line),
  signal: controller.signal,
})
  .then((code) => {
    process.exitCode = controller.signal.aborted ? 1 : code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
