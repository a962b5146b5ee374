#!/usr/bin/env node
/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { createApp, setDefaultNotFoundHandler } from "./app.js";
import { getEnv } from "./config/env.js";
import { CONNECTION_TIMING, WEBSOCKET_CONFIG } from "./config/constants.js";
import { createRelayServices } from "./container.js";
import { getRelayVersion } from "./utils/version.js";
import { createLogger } from "./infrastructure/logging/pino-logger.js";
import {
  AnonymousIdentityVerifier,
  JwtIdentityVerifier,
} from "./infrastructure/auth/jwt-identity-verifier.js";
import { GoogleTranslationProvider } from "./infrastructure/translation/google-translation-provider.js";
import {
  registerHealthRoute,
  registerTranslationRoutes,
} from "./infrastructure/http/index.js";
import { WebSocketServerWrapper } from "./infrastructure/websocket/index.js";

/**
 * Bootstraps and starts the relay server.
 */
async function bootstrap(): Promise<void> {
  const version = getRelayVersion();

  // Load configuration
  const env = getEnv();

  // Create logger
  const logger = createLogger({
    name: "polyglot-relay",
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === "development",
  });

  logger.info(
    {
      version,
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      trustProxy: env.TRUST_PROXY,
      authentication: env.AUTH_TOKEN_SECRET ? "jwt" : "anonymous",
    },
    "Starting relay server"
  );

  const translationProvider = new GoogleTranslationProvider(
    {
      apiUrl: env.TRANSLATION_API_URL,
      timeoutMs: env.TRANSLATION_TIMEOUT_MS,
    },
    logger
  );

  const identityVerifier = env.AUTH_TOKEN_SECRET
    ? new JwtIdentityVerifier({ secret: env.AUTH_TOKEN_SECRET }, logger)
    : new AnonymousIdentityVerifier();

  const services = createRelayServices(
    {
      maxLanguages: env.MAX_LANGUAGES,
      maxMessageLength: env.MAX_MESSAGE_LENGTH,
      maxDisplayNameLength: env.MAX_DISPLAY_NAME_LENGTH,
    },
    { translationProvider, identityVerifier, logger }
  );

  // Create Fastify app
  const app = await createApp({ env, logger });

  registerHealthRoute(
    app,
    { version },
    {
      connectionRegistry: services.connectionRegistry,
      languageSet: services.languageSet,
    }
  );

  registerTranslationRoutes(app, {
    provider: translationProvider,
    normalizer: services.normalizer,
    logger,
  });

  setDefaultNotFoundHandler(app);

  // Create WebSocket server
  const wsServer = new WebSocketServerWrapper(
    {
      path: env.WS_PATH || WEBSOCKET_CONFIG.PATH,
      heartbeatIntervalMs: CONNECTION_TIMING.HEARTBEAT_INTERVAL_MS,
      maxPayloadBytes: WEBSOCKET_CONFIG.MAX_PAYLOAD_BYTES,
    },
    {
      connectionHandler: services.connectionHandler,
      logger,
    }
  );

  // Start server
  try {
    await app.listen({ port: env.PORT, host: env.HOST });

    // Attach WebSocket server to HTTP server
    wsServer.attach(app.server);

    logger.info(
      {
        address: `http://${env.HOST}:${env.PORT}`,
        wsPath: env.WS_PATH || WEBSOCKET_CONFIG.PATH,
      },
      "Relay server is running"
    );
  } catch (error) {
    logger.fatal({ error }, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown with overall timeout
  const SHUTDOWN_TIMEOUT_MS = 10_000;

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal, sockets: wsServer.connectionCount }, "Shutdown signal received");

    // Force exit after timeout
    const forceExitTimer = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      await wsServer.close(CONNECTION_TIMING.SHUTDOWN_GRACE_MS);
      await app.close();

      clearTimeout(forceExitTimer);
      logger.info("Shutdown complete");
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error({ error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  process.on("unhandledRejection", (reason, promise) => {
    logger.error({ reason, promise }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ error }, "Uncaught exception");
    process.exit(1);
  });
}

// Run the server
bootstrap().catch((error: unknown) => {
  console.error("Failed to bootstrap:", error);
  process.exit(1);
});
