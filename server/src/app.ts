import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { PropertyMarket } from '@estate-escrow/engine';
import { captureRawBody } from './auth';
import type { RequestAuthenticator } from './auth';
import { createRoutes, sendError } from './api/routes';
import type { WebhookDispatcher } from './webhooks/dispatcher';

export interface AppOptions {
  market: PropertyMarket;
  authenticator: RequestAuthenticator;
  /** Accounts allowed to report settlement outcomes */
  callbackAccounts: string[];
  corsOrigins: string[];
  rateLimitRpm: number;
  dispatcher?: WebhookDispatcher;
  webhookAdminToken?: string;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  // Requests without an origin are server-to-server
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      if (options.corsOrigins.includes(origin)) return callback(null, true);
      callback(new Error('Not allowed by CORS'));
    },
  }));
  app.use(express.json({ verify: captureRawBody }));

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: options.rateLimitRpm,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
  app.use('/api', limiter);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      pending_settlements: options.market.pendingSettlements().length,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createRoutes(options.market, {
    authenticate: options.authenticator.middleware(),
    callbackAccounts: options.callbackAccounts,
    dispatcher: options.dispatcher,
    webhookAdminToken: options.webhookAdminToken,
  }));

  // Malformed JSON and CORS rejections land here
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }
    sendError(res, err);
  });

  return app;
}
