/**
 * pg-plan-insight - Structured Logger
 *
 * One process-wide logger. Lines go to stderr so stdout only ever carries
 * the JSON or Markdown a command prints.
 *
 * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 * Example: [2025-01-18T09:30:05.120Z] [WARNING] [CONFIG] [CONFIG_INVALID_VALUE] Ignoring invalid EVAL_CS_WEIGHTS {"value":"0.5,0.5"}
 */

/**
 * RFC 5424 severities, most verbose first
 * @see https://datatracker.ietf.org/doc/html/rfc5424#section-6.2.1
 */
export type LogLevel =
    | 'debug'
    | 'info'
    | 'notice'
    | 'warning'
    | 'error'
    | 'critical'
    | 'alert'
    | 'emergency';

export type LogModule =
    | 'CLI'
    | 'CONFIG'
    | 'EXECUTOR'
    | 'PLAN'
    | 'RANKER'
    | 'SAMPLER'
    | 'EVALUATOR';

export interface LogContext {
    module?: LogModule;
    /** Module-prefixed event code, e.g. PG_EXPLAIN_FAILED */
    code?: string;
    /** Function that emitted the line, e.g. runExplain */
    operation?: string;
    /** Subject of the line: a file path, relation or run directory */
    entityId?: string;
    [key: string]: unknown;
}

/** Syslog priority: 0 is the most severe */
const PRIORITY: Readonly<Record<LogLevel, number>> = {
    emergency: 0,
    alert: 1,
    critical: 2,
    error: 3,
    warning: 4,
    notice: 5,
    info: 6,
    debug: 7
};

/**
 * Context keys whose values never reach the log. A key matches when it
 * contains any of these words, case-insensitively.
 */
const REDACTED_WORDS: readonly string[] = [
    'password',
    'secret',
    'token',
    'key',
    'credential',
    'authorization',
    'connectionstring',
    'connection_string'
];

// C0 and C1 control characters except tab, LF and CR
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRedactedKey(key: string): boolean {
    const lower = key.toLowerCase();
    return REDACTED_WORDS.some(word => lower.includes(word));
}

function redact(context: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
        if (value !== undefined && value !== null && isRedactedKey(key)) {
            result[key] = '[REDACTED]';
        } else if (isPlainObject(value)) {
            result[key] = redact(value);
        } else {
            result[key] = value;
        }
    }
    return result;
}

class Logger {
    private minLevel: LogLevel = 'info';
    private defaultModule: LogModule = 'CLI';

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    getLevel(): LogLevel {
        return this.minLevel;
    }

    isLevel(value: string): value is LogLevel {
        return Object.prototype.hasOwnProperty.call(PRIORITY, value);
    }

    /**
     * Module used for lines logged without one
     */
    setDefaultModule(module: LogModule): void {
        this.defaultModule = module;
    }

    /**
     * Write one line at `level` if it passes the minimum level
     */
    log(level: LogLevel, message: string, context?: LogContext): void {
        if (PRIORITY[level] > PRIORITY[this.minLevel]) {
            return;
        }

        const { module, code, ...rest }: LogContext = context ?? {};
        const parts = [
            `[${new Date().toISOString()}]`,
            `[${level.toUpperCase()}]`,
            `[${module ?? this.defaultModule}]`
        ];
        if (code) {
            parts.push(`[${code}]`);
        }
        parts.push(message.replace(CONTROL_CHARS, ''));
        if (Object.keys(rest).length > 0) {
            parts.push(JSON.stringify(redact(rest)));
        }

        console.error(parts.join(' '));
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    forModule(module: LogModule): ModuleLogger {
        return new ModuleLogger(this, module);
    }
}

/**
 * Logger bound to one module; the module cannot be overridden per line
 */
class ModuleLogger {
    constructor(
        private parent: Logger,
        private module: LogModule
    ) { }

    private scoped(context?: LogContext): LogContext {
        return { ...context, module: this.module };
    }

    debug(message: string, context?: LogContext): void {
        this.parent.debug(message, this.scoped(context));
    }

    info(message: string, context?: LogContext): void {
        this.parent.info(message, this.scoped(context));
    }

    warn(message: string, context?: LogContext): void {
        this.parent.warn(message, this.scoped(context));
    }

    error(message: string, context?: LogContext): void {
        this.parent.error(message, this.scoped(context));
    }
}

export const logger = new Logger();
