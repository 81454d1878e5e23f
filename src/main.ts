/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point. SIGINT/SIGTERM cancel any wait in progress
 * so the runner can stop the step promptly.
 */

import { run } from './run';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());
process.once('SIGTERM', () => controller.abort());

void run(controller.signal);
