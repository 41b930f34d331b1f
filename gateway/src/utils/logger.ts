interface LogMeta {
  requestId?: string | null;
  route?: string | null;
  operationId?: string | null;
  [key: string]: unknown;
}

const SERVICE_NAME = 'ledger-gateway';

function baseContext(meta?: LogMeta): Record<string, unknown> {
  return {
    service: SERVICE_NAME,
    env: process.env.NODE_ENV || 'development',
    requestId: meta?.requestId ?? null,
    route: meta?.route ?? null,
    operationId: meta?.operationId ?? null,
    ...meta,
  };
}

function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class Logger {
  private static write(level: 'info' | 'warn' | 'error', message: string, meta?: LogMeta): void {
    const payload = JSON.stringify(
      {
        level,
        timestamp: new Date().toISOString(),
        message,
        ...baseContext(meta),
      },
      replacer,
    );

    if (level === 'error') {
      console.error(payload);
      return;
    }

    if (level === 'warn') {
      console.warn(payload);
      return;
    }

    console.log(payload);
  }

  static info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  static warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  static error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }
}
