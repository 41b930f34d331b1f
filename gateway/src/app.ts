import { randomUUID } from 'crypto';
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { PayableToken } from '@payable-ledger/ledger';
import { LedgerController } from './api/controller';
import { createRouter } from './api/routes';

export const API_PREFIX = '/api/ledger/v1';
export const REQUEST_ID_HEADER = 'x-request-id';

function assignRequestId(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.header(REQUEST_ID_HEADER)?.trim() || randomUUID();
  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  next();
}

export function createApp(token: PayableToken): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(assignRequestId);
  app.use(API_PREFIX, createRouter(new LedgerController(token)));

  return app;
}
