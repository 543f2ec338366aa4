/**
 * tact: auto-response decision engine.
 *
 * Entry point. Loads data, opens the store, seeds patterns,
 * creates the responder, starts the server. One process, one port.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { resolve } from 'node:path';

import * as store from './store/index.js';
import { applyEnv, loadData } from './core/data-loader.js';
import { PatternRegistry } from './core/registry.js';
import { RateLoopGuard } from './core/guard.js';
import { StatsRecorder } from './core/stats.js';
import { createResponder } from './core/responder.js';
import { createAPI } from './server/api.js';

const DATA_DIR = process.env.TACT_DATA_DIR ?? resolve(process.cwd(), 'data');
const STORE_DIR = process.env.TACT_STORE_DIR ?? resolve(process.cwd(), 'store');

/** Stats older than this are not loaded back into memory */
const HYDRATE_DAYS = 30;
const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

async function main() {
  console.log('');
  console.log('  ┌─────────────────────────┐');
  console.log('  │         t a c t          │');
  console.log('  │  auto-response decider   │');
  console.log('  └─────────────────────────┘');
  console.log('');

  // 1. Load data
  console.log(`  data:  ${DATA_DIR}`);
  const data = loadData(DATA_DIR);
  const config = applyEnv(data.config);

  // 2. Open the store, seed patterns on first start
  console.log(`  store: ${STORE_DIR}`);
  store.initStore(STORE_DIR);
  if (store.countPatterns() === 0 && data.seedPatterns.length > 0) {
    for (const pattern of data.seedPatterns) store.savePattern(pattern);
    console.log(`  seed:  ${data.seedPatterns.length} pattern(s) from patterns.yaml`);
  }

  // 3. Registry from the store
  const registry = new PatternRegistry(store.createPatternStore());
  const loaded = registry.reload();
  if (!loaded.ok) throw loaded.error;

  // 4. Guard + stats
  const guard = new RateLoopGuard({ rateLimit: config.rateLimit, loop: config.loop });
  const stats = new StatsRecorder(config.stats, store.createStatsSink());
  const since = new Date(Date.now() - HYDRATE_DAYS * 24 * 60 * 60 * 1000).toISOString();
  stats.hydrate(store.loadStatsSince(since, config.stats.retention));
  stats.start();

  const sweeper = setInterval(() => {
    try {
      guard.sweep(Date.now());
    } catch (error) {
      console.warn('[tact] Guard sweep failed:', error);
    }
  }, SWEEP_INTERVAL_MS);
  sweeper.unref();

  // 5. Responder + API
  const responder = createResponder({ config, registry, guard, stats });

  if (!config.admin.token) {
    console.warn('  ⚠  No admin token set. Admin routes will refuse every request.');
  }
  const app = createAPI(responder, config.admin.token);

  // 6. Start
  const { port, host } = config.server;

  const server = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, () => {
    console.log('');
    console.log(`  ✓ listening on http://${host}:${port}`);
    console.log(`  ✓ patterns: ${registry.summary().active} active of ${registry.summary().total}`);
    console.log(`  ✓ rate limit: ${config.rateLimit.maxResponses} per ${config.rateLimit.windowSeconds}s`);
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`[tact] ${signal} received, shutting down`);
    clearInterval(sweeper);
    server.close();
    void stats.stop()
      .catch((error: unknown) => console.error('[tact] Final stats flush failed:', error))
      .finally(() => {
        store.closeStore();
        process.exit(0);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Failed to start tact:', error);
  process.exit(1);
});
