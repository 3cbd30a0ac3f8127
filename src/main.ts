import * as dotenv from "dotenv";
dotenv.config();

import "reflect-metadata";
import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import { Logger, type INestApplication } from "@nestjs/common";
import { AppModule } from "@/app.module";
import { EnhancedLoggerService } from "@/common/logging/enhanced-logger.service";
import { enabledLogLevels } from "@/common/types/logging";
import { asError, errorString } from "@/common/utils/error.utils";
import { ENV } from "@/config/environment.constants";

// Global application instance for graceful shutdown
let app: INestApplication | null = null;
// Bootstrap messages obey LOG_LEVEL before the application logger exists
Logger.overrideLogger(enabledLogLevels(ENV.LOGGING.LOG_LEVEL));
const logger = new Logger("Bootstrap");
let enhancedLogger: EnhancedLoggerService | null = null;

async function bootstrap(): Promise<void> {
  const operationId = `bootstrap_${Date.now()}`;

  try {
    enhancedLogger = new EnhancedLoggerService("Bootstrap");
    enhancedLogger.startPerformanceTimer(operationId, "application_bootstrap", "Bootstrap");

    // Module init validates the configuration and probes the cache root; either failure aborts startup
    app = await NestFactory.create(AppModule, {
      logger: enabledLogLevels(ENV.LOGGING.LOG_LEVEL),
      abortOnError: false,
      bodyParser: false,
    });

    // Binary artifacts and redirects only, so no CSP
    app.use(
      helmet({
        contentSecurityPolicy: false,
        crossOriginResourcePolicy: false,
      })
    );

    setupGracefulShutdown();

    const { HOST, PORT } = ENV.APPLICATION;
    await app.listen(PORT, HOST);

    enhancedLogger.logCriticalOperation("application_startup", "Bootstrap", {
      host: HOST,
      port: PORT,
      nodeVersion: process.version,
      pid: process.pid,
      environment: ENV.APPLICATION.NODE_ENV,
      logLevel: ENV.LOGGING.LOG_LEVEL,
    });
    enhancedLogger.endPerformanceTimer(operationId, true, { port: PORT });
  } catch (error) {
    const errObj = asError(error);

    if (enhancedLogger) {
      enhancedLogger.error(errObj, {
        component: "Bootstrap",
        operation: "application_startup",
        severity: "critical",
      });
      enhancedLogger.endPerformanceTimer(operationId, false, { error: errObj.message });
    } else {
      logger.error("Application startup failed:", errObj.stack, errObj.message);
    }

    if (app) {
      try {
        await app.close();
      } catch (closeError) {
        logger.error("Application cleanup failed:", asError(closeError).stack);
      }
    }

    process.exit(1);
  }
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];
  signals.forEach(signal => {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.log(`Received ${signal} during shutdown, ignoring...`);
        return;
      }
      isShuttingDown = true;
      logger.log(`Received ${signal}, starting graceful shutdown...`);

      gracefulShutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Error during ${signal} shutdown:`, asError(error).stack);
          process.exit(1);
        }
      );
    });
  });

  process.on("uncaughtException", error => {
    logger.error(`Uncaught Exception: ${errorString(error)}`);
    process.exit(1);
  });

  process.on("unhandledRejection", reason => {
    logger.error(`Unhandled Rejection: ${errorString(reason)}`);
    process.exit(1);
  });
}

async function gracefulShutdown(): Promise<void> {
  if (!app) {
    return;
  }

  const timeoutMs = ENV.TIMEOUTS.GRACEFUL_SHUTDOWN_MS;
  const shutdownTimeout = setTimeout(() => {
    logger.error(`Shutdown timeout reached after ${timeoutMs}ms, forcing exit`);
    process.exit(1);
  }, timeoutMs);
  shutdownTimeout.unref();

  const shutdownStartTime = Date.now();
  // Runs onModuleDestroy: stops the sweep timer and every service's managed timers
  await app.close();
  app = null;
  clearTimeout(shutdownTimeout);

  logger.log(`Graceful shutdown completed in ${Date.now() - shutdownStartTime}ms`);
}

void bootstrap();
