/**
 * =============================================================================
 * TERMINAL BACK OFFICE API - MAIN SERVER
 * =============================================================================
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ AUTH       │ Username/password login, JWT tokens, logout blocklist     │
 * │ USERS      │ Admin, staff admin and treasurer accounts                 │
 * │ DRIVERS    │ Driver registry                                           │
 * │ VEHICLES   │ Vehicle registry, QR values, wallets                      │
 * │ ROUTES     │ Transit routes and their base fares                       │
 * │ DEPOSITS   │ Wallet deposits, treasurer requests, approvals, history   │
 * │ TERMINAL   │ Gate scans, fee charging, departure queue, settings       │
 * │ REPORTS    │ Deposit and terminal fee analytics, CSV exports           │
 * │ DASHBOARD  │ Landing figures per role                                  │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * SECURITY:
 * - JWT authentication, revoked on logout
 * - Role-based access control (ADMIN, STAFF_ADMIN, TREASURER)
 * - Input validation using Zod schemas
 * - Rate limiting per IP
 * - Helmet security headers
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { createServer } from 'http';

import { config } from './config/environment';
import { API_PREFIX } from './core/constants';
import { logger } from './shared/services/logger.service';
import { closeSocket, initializeSocket } from './shared/services/socket.service';
import { closeDatabase } from './shared/database/db';

// Middleware
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { apiRateLimiter } from './shared/middleware/rate-limiter.middleware';
import {
  requestIdMiddleware,
  securityHeaders,
  sanitizeInput,
  preventParamPollution
} from './shared/middleware/security.middleware';

// Route modules
import { healthRoutes } from './shared/routes/health.routes';
import { authRouter } from './modules/auth/auth.routes';
import { userRouter } from './modules/user/user.routes';
import { driverRouter } from './modules/driver/driver.routes';
import { vehicleRouter } from './modules/vehicle/vehicle.routes';
import { transitRouteRouter } from './modules/transit-route/transit-route.routes';
import { depositRouter } from './modules/deposit/deposit.routes';
import { terminalRouter } from './modules/terminal/terminal.routes';
import { reportRouter } from './modules/report/report.routes';
import { dashboardRouter } from './modules/dashboard/dashboard.routes';

// =============================================================================
// EXPRESS APP
// =============================================================================

export function createApp(): Express {
  const app = express();

  // Rate limiting keys on the client IP behind one proxy hop
  app.set('trust proxy', 1);

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024,
    filter: (req, res) => {
      if (req.headers['x-no-compression']) return false;
      return compression.filter(req, res);
    }
  }));

  if (config.security.enableHeaders) {
    app.use(securityHeaders);
  }

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['Content-Disposition', 'X-Request-ID'],
    credentials: true,
    maxAge: 86400
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(sanitizeInput);
  app.use(preventParamPollution);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // Health & monitoring (no auth, no rate limit)
  app.use('/', healthRoutes);

  app.use(API_PREFIX, apiRateLimiter);

  app.use(`${API_PREFIX}/auth`, authRouter);
  app.use(`${API_PREFIX}/users`, userRouter);
  app.use(`${API_PREFIX}/drivers`, driverRouter);
  app.use(`${API_PREFIX}/vehicles`, vehicleRouter);
  app.use(`${API_PREFIX}/routes`, transitRouteRouter);
  app.use(`${API_PREFIX}/deposits`, depositRouter);
  app.use(`${API_PREFIX}/terminal`, terminalRouter);
  app.use(`${API_PREFIX}/reports`, reportRouter);
  app.use(`${API_PREFIX}/dashboard`, dashboardRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

// =============================================================================
// START SERVER
// =============================================================================

function start(): void {
  const app = createApp();
  const server = createServer(app);
  initializeSocket(server);

  server.listen(config.port, config.host, () => {
    // keepAliveTimeout must outlast the proxy idle timeout
    server.timeout = 30000;
    server.keepAliveTimeout = 65000;
    server.headersTimeout = 66000;

    logger.info('Server started', {
      url: `http://${config.host}:${config.port}`,
      apiPrefix: API_PREFIX,
      environment: config.nodeEnv,
      database: config.database.driver,
      timeZone: config.timeZone
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      closeSocket()
        .then(() => closeDatabase())
        .then(() => {
          logger.info('Graceful shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error)
          });
          process.exit(1);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', {
      error: reason instanceof Error ? reason.message : String(reason)
    });
    process.exit(1);
  });
}

if (require.main === module) {
  start();
}
