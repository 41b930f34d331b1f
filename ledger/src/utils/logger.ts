/**
 * SPDX-License-Identifier: Apache-2.0
 */
interface LogMeta {
    operationId?: string | null;
    operation?: string | null;
    target?: string | null;
    [key: string]: unknown;
}

const SERVICE_NAME = 'payable-ledger';

function baseContext(meta?: LogMeta): Record<string, unknown> {
    return {
        service: SERVICE_NAME,
        env: process.env.NODE_ENV || 'development',
        operationId: meta?.operationId ?? null,
        operation: meta?.operation ?? null,
        target: meta?.target ?? null,
        ...meta,
    };
}

// JSON.stringify cannot serialize bigint amounts
function replacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

function normalizeErrorMeta(metaOrError?: unknown): LogMeta | undefined {
    if (!metaOrError) {
        return undefined;
    }

    if (metaOrError instanceof Error) {
        return {
            error: metaOrError.message,
            stack: metaOrError.stack,
        };
    }

    if (typeof metaOrError === 'object') {
        return Object.fromEntries(Object.entries(metaOrError));
    }

    return {
        error: String(metaOrError),
    };
}

export class Logger {
    private static write(level: 'info' | 'warn' | 'error', message: string, meta?: LogMeta): void {
        const line = JSON.stringify({
            level,
            timestamp: new Date().toISOString(),
            message,
            ...baseContext(meta),
        }, replacer);

        if (level === 'error') {
            console.error(line);
            return;
        }

        if (level === 'warn') {
            console.warn(line);
            return;
        }

        console.log(line);
    }

    static info(message: string, meta?: LogMeta): void {
        this.write('info', message, meta);
    }

    static warn(message: string, meta?: LogMeta): void {
        this.write('warn', message, meta);
    }

    static error(message: string, metaOrError?: unknown): void {
        this.write('error', message, normalizeErrorMeta(metaOrError));
    }
}
