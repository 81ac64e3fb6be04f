import type { FastifyInstance } from "fastify";
import type { CollectorServerSettings, CollectorSettings } from "../config/types.js";
import { SessionManager } from "../core/SessionManager.js";
import { logger } from "../logger.js";
import { buildApp } from "./app.js";

export { buildApp } from "./app.js";

export interface CollectorHttpServerConfig {
  settings: CollectorSettings;
  listen: CollectorServerSettings;
  /** Provide a manager to share sessions with other code; one is created otherwise. */
  manager?: SessionManager;
}

/**
 * Standalone HTTP server around a SessionManager. run() listens and resolves once
 * SIGINT/SIGTERM has triggered a graceful close. A session still running at
 * shutdown keeps whatever it already appended to its log.
 */
export class CollectorHttpServer {
  private readonly config: CollectorHttpServerConfig;
  private readonly manager: SessionManager;
  private app: FastifyInstance | null = null;
  private signalHandlersAttached = false;

  constructor(config: CollectorHttpServerConfig) {
    this.config = config;
    this.manager = config.manager ?? new SessionManager({ settings: config.settings });
  }

  async start(): Promise<void> {
    const app = buildApp(this.manager);
    const { port, host } = this.config.listen;
    await app.listen({ port, host });
    this.app = app;
    logger.info(
      {
        url: `http://${host}:${port}`,
        sessionsPath: "/api/sessions",
        logsDir: this.config.settings.logsDir,
      },
      "Collector HTTP server listening",
    );
  }

  async run(): Promise<void> {
    await this.start();

    return new Promise<void>((resolve) => {
      const bound = (): void => {
        void (async (): Promise<void> => {
          if (!this.signalHandlersAttached) return;
          this.signalHandlersAttached = false;
          process.off("SIGINT", bound);
          process.off("SIGTERM", bound);
          try {
            await this.stop();
          } catch (err) {
            logger.error({ err }, "Error during shutdown");
          }
          resolve();
        })();
      };
      this.signalHandlersAttached = true;
      process.on("SIGINT", bound);
      process.on("SIGTERM", bound);
    });
  }

  /** Close the HTTP server. Idempotent. */
  async stop(): Promise<void> {
    if (this.manager.isBusy()) {
      logger.warn("Stopping while a collection session is still running");
    }
    if (this.app) {
      await this.app.close();
      this.app = null;
    }
    logger.info("Collector HTTP server stopped");
  }
}
