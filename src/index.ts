#!/usr/bin/env node
import type { Server } from 'node:http';
import { loadConfig, describeConfig, type Config } from './config.js';
import { logger, errorMessage } from './logger.js';
import { AuthError, ConfigError, PatternFormatError } from './errors.js';
import { CredentialManager } from './auth/CredentialManager.js';
import { TokenEndpoint } from './auth/TokenEndpoint.js';
import { CanvasClient } from './canvas/CanvasClient.js';
import { RetryPolicy } from './canvas/RetryPolicy.js';
import { PatternSet } from './patterns/PatternSet.js';
import { BatchScheduler } from './reconcile/BatchScheduler.js';
import { ArtifactWriter } from './artifacts/ArtifactWriter.js';
import { createStatusApp } from './api/statusRoutes.js';

async function main(): Promise<void> {
  logger.info('Starting canvas keeper...');

  const config: Config = loadConfig();
  logger.level = config.logLevel;
  logger.info('Configuration loaded', describeConfig(config));

  // ─── Patterns (fatal on bad input, before anything touches the canvas) ───
  const patterns = await PatternSet.load(config.targets);
  for (const t of patterns.summary()) {
    logger.info(`Target ${t.tier}: ${t.pixels} pixels at (${t.origin.x}, ${t.origin.y}) from ${t.source}`);
  }

  // ─── Canvas authority ───
  const credentials = new CredentialManager(
    config.auth,
    new TokenEndpoint(config.canvas.baseUrl, config.canvas.requestTimeoutMs),
  );
  const client = new CanvasClient({
    baseUrl: config.canvas.baseUrl,
    credentials,
    retry: new RetryPolicy(config.retry),
    requestTimeoutMs: config.canvas.requestTimeoutMs,
  });

  // ─── Scheduler ───
  const scheduler = new BatchScheduler(client, patterns, config.schedule);

  if (config.artifacts.enabled) {
    new ArtifactWriter(config.artifacts.dir).attach(scheduler);
  }

  let statusServer: Server | null = null;
  if (config.status.enabled) {
    const app = createStatusApp({ scheduler, startedAt: Date.now() });
    statusServer = app.listen(config.status.port, () => {
      logger.info(`Status API listening on http://localhost:${config.status.port}/api/status`);
    });
    statusServer.on('error', (err) => {
      logger.warn('Status API failed; reconciliation continues without it', { error: errorMessage(err) });
    });
  }

  // ─── Shutdown ───
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping...`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await scheduler.run(controller.signal);
  } finally {
    statusServer?.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError || err instanceof PatternFormatError) {
    logger.error(err.message);
  } else if (err instanceof AuthError) {
    logger.error(`Authentication failed and cannot recover: ${err.message}`);
  } else {
    logger.error('Fatal error', { error: errorMessage(err), stack: err instanceof Error ? err.stack : undefined });
  }
  process.exitCode = 1;
});
