/**
 * Application Entry Point
 * Headline sentiment scoring with an active-learning feedback loop
 */

import { createServer, Server } from 'http';
import config, { Config, validateConfig } from './config/default';
import { createApp } from './api/app';
import { createServices, Services } from './container';
import { SqlPool, createPool } from './database/pool';
import { PostgresSentimentRepository } from './database/postgresRepository';
import { DatabaseMigrator } from './database/migrator';

// =============================================================================
// APPLICATION
// =============================================================================

export class Application {
  private readonly pool: SqlPool;
  private readonly services: Services;
  private readonly server: Server;

  constructor(private readonly cfg: Config = config) {
    validateConfig(cfg);

    this.pool = createPool(cfg.database);
    this.services = createServices(new PostgresSentimentRepository(this.pool), cfg);

    const app = createApp(this.services, {
      corsOrigins: cfg.security.corsOrigins,
      exposeInternalErrors: cfg.server.env !== 'production',
      metricsEnabled: cfg.monitoring.metricsEnabled,
      metricsPath: cfg.monitoring.metricsPath,
    });
    this.server = createServer(app);
  }

  // ---------------------------------------------------------------------------
  // START/STOP
  // ---------------------------------------------------------------------------

  async start(): Promise<void> {
    console.log('[Application] Starting headline sentiment service...');

    if (process.env.RUN_MIGRATIONS !== 'false') {
      console.log('[Application] Running database migrations...');
      const result = await new DatabaseMigrator(this.pool).migrate();

      if (!result.success) {
        console.error('[Application] Migration failed:', result.error);
        if (process.env.REQUIRE_MIGRATIONS !== 'false') {
          throw new Error(`Migration failed: ${result.error}`);
        }
      } else if (result.migrationsRun.length > 0) {
        console.log(`[Application] Ran ${result.migrationsRun.length} migration(s)`);
      } else {
        console.log('[Application] Database is up to date');
      }
    }

    const { host, port, env } = this.cfg.server;
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        console.log(`[Application] Listening on http://${host}:${port} (${env})`);
        console.log(`[Application] LLM annotator: ${this.services.annotator.model}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    console.log('[Application] Shutting down...');

    await new Promise<void>((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close(error => (error ? reject(error) : resolve()));
    });
    await this.pool.end();
    console.log('[Application] Shutdown complete');
  }
}

// =============================================================================
// BOOTSTRAP
// =============================================================================

if (require.main === module) {
  const app = new Application();

  app.start().catch(error => {
    console.error('Failed to start application:', error);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    app.stop()
      .then(() => process.exit(0))
      .catch(error => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
