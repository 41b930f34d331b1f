import { Request, Response } from 'express';
import {
  LedgerError,
  LedgerEvent,
  OperationReceipt,
  PayableToken,
  snapshotCounters,
} from '@payable-ledger/ledger';
import { Logger } from '../utils/logger';

export interface TransferAndCallBody {
  caller?: unknown;
  to?: unknown;
  amount?: unknown;
  data?: unknown;
}

export interface TransferFromAndCallBody extends TransferAndCallBody {
  from?: unknown;
}

export interface ApproveAndCallBody {
  caller?: unknown;
  spender?: unknown;
  amount?: unknown;
  data?: unknown;
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_TARGET: 400,
  INVALID_AMOUNT: 400,
  INVALID_PAYLOAD: 400,
  INSUFFICIENT_BALANCE: 409,
  INSUFFICIENT_ALLOWANCE: 409,
  CALLBACK_REJECTED: 422,
};

export function statusForError(error: unknown): number {
  if (error instanceof RequestValidationError) {
    return 400;
  }
  if (error instanceof LedgerError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  return 500;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new RequestValidationError(`${field} is required`);
  }
  return value.trim();
}

// amounts travel as decimal strings
function requireAmount(value: unknown): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new RequestValidationError('amount must be a non-negative integer string');
  }
  return BigInt(value);
}

function optionalData(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return requireString(value, 'data');
}

export function serializeEvent(event: LedgerEvent): Record<string, string> {
  if (event.type === 'Transfer') {
    return { type: event.type, from: event.from, to: event.to, value: event.value.toString() };
  }
  return { type: event.type, owner: event.owner, spender: event.spender, value: event.value.toString() };
}

function requestIdOf(res: Response): string | null {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : null;
}

function serializeReceipt(receipt: OperationReceipt): Record<string, unknown> {
  return {
    operationId: receipt.operationId,
    operation: receipt.operation,
    notified: receipt.notified,
    events: receipt.events.map(serializeEvent),
  };
}

export class LedgerController {
  constructor(private readonly token: PayableToken) {}

  getToken(_req: Request, res: Response): void {
    res.status(200).json({
      success: true,
      data: {
        address: this.token.address,
        name: this.token.name,
        symbol: this.token.symbol,
        decimals: this.token.decimals,
        totalSupply: this.token.totalSupply().toString(),
        interfaces: this.token.declaredInterfaces,
      },
    });
  }

  getBalance(req: Request<{ account: string }>, res: Response): void {
    this.respond(res, 'getBalance', () => ({
      account: req.params.account,
      balance: this.token.balanceOf(req.params.account).toString(),
    }));
  }

  getAllowance(req: Request<{ owner: string; spender: string }>, res: Response): void {
    this.respond(res, 'getAllowance', () => ({
      owner: req.params.owner,
      spender: req.params.spender,
      allowance: this.token.allowance(req.params.owner, req.params.spender).toString(),
    }));
  }

  supportsInterface(req: Request<{ interfaceId: string }>, res: Response): void {
    this.respond(res, 'supportsInterface', () => {
      const interfaceId = req.params.interfaceId;
      if (!/^0x[0-9a-fA-F]{8}$/.test(interfaceId)) {
        throw new RequestValidationError('interfaceId must be a 4-byte hex string (0x........)');
      }
      return { interfaceId, supported: this.token.supportsInterface(interfaceId) };
    });
  }

  getEvents(_req: Request, res: Response): void {
    res.status(200).json({
      success: true,
      data: this.token.getEvents().map(serializeEvent),
    });
  }

  getMetrics(_req: Request, res: Response): void {
    res.status(200).json({ success: true, data: snapshotCounters() });
  }

  transferAndCall(req: Request<{}, {}, TransferAndCallBody>, res: Response): void {
    this.respond(res, 'transferAndCall', () => {
      const body: TransferAndCallBody = req.body ?? {};
      const receipt = this.token.transferAndCall(
        requireString(body.caller, 'caller'),
        requireString(body.to, 'to'),
        requireAmount(body.amount),
        optionalData(body.data),
      );
      return serializeReceipt(receipt);
    });
  }

  transferFromAndCall(req: Request<{}, {}, TransferFromAndCallBody>, res: Response): void {
    this.respond(res, 'transferFromAndCall', () => {
      const body: TransferFromAndCallBody = req.body ?? {};
      const receipt = this.token.transferFromAndCall(
        requireString(body.caller, 'caller'),
        requireString(body.from, 'from'),
        requireString(body.to, 'to'),
        requireAmount(body.amount),
        optionalData(body.data),
      );
      return serializeReceipt(receipt);
    });
  }

  approveAndCall(req: Request<{}, {}, ApproveAndCallBody>, res: Response): void {
    this.respond(res, 'approveAndCall', () => {
      const body: ApproveAndCallBody = req.body ?? {};
      const receipt = this.token.approveAndCall(
        requireString(body.caller, 'caller'),
        requireString(body.spender, 'spender'),
        requireAmount(body.amount),
        optionalData(body.data),
      );
      return serializeReceipt(receipt);
    });
  }

  private respond(res: Response, route: string, run: () => Record<string, unknown>): void {
    try {
      const data = run();
      res.status(200).json({ success: true, data });
    } catch (error: unknown) {
      const status = statusForError(error);
      const message = error instanceof Error ? error.message : String(error);
      const code = error instanceof LedgerError ? error.code : status === 400 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';

      const requestId = requestIdOf(res);
      if (status >= 500) {
        Logger.error('Ledger request failed', { requestId, route, status, code, error: message });
      } else {
        Logger.warn('Ledger request refused', { requestId, route, status, code, error: message });
      }

      res.status(status).json({ success: false, error: message, code });
    }
  }
}
