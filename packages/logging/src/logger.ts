import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    keystore_id: z.string().min(1).max(128).optional(),
    key_id: z.string().min(1).max(128).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

export const LogEventSchema = z
  .object({
    ts: z.string().datetime(),
    level: EmittableLogLevelSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    correlation_id: z.string().min(1),
    request_id: z.string().min(1),
    message: z.string().min(1).optional(),
    keystore_id: z.string().min(1).optional(),
    key_id: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;

const toLevelOrder = (level: LogLevel | EmittableLogLevel) => {
  switch (level) {
    case 'debug':
      return 10;
    case 'info':
      return 20;
    case 'warn':
      return 30;
    case 'error':
      return 40;
    case 'fatal':
      return 50;
    case 'silent':
      return 90;
  }
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: Omit<LogEventInput, 'level'>) => void;
  info: (input: Omit<LogEventInput, 'level'>) => void;
  warn: (input: Omit<LogEventInput, 'level'>) => void;
  error: (input: Omit<LogEventInput, 'level'>) => void;
  fatal: (input: Omit<LogEventInput, 'level'>) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const shouldEmit = ({configuredLevel, eventLevel}: {configuredLevel: LogLevel; eventLevel: EmittableLogLevel}) =>
  toLevelOrder(eventLevel) >= toLevelOrder(configuredLevel);

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const extractContext = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => ({
  correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
  request_id: input.request_id ?? context?.request_id ?? 'n/a',
  keystore_id: input.keystore_id ?? context?.keystore_id,
  key_id: input.key_id ?? context?.key_id,
  route: input.route ?? context?.route,
  method: input.method ?? context?.method
});

const toMetadataRecord = (value: unknown): Record<string, unknown> => {
  const parsed = z.record(z.string(), z.unknown()).safeParse(value);
  return parsed.success ? parsed.data : {};
};

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: ParsedLoggerOptions;
  context: LogContext | undefined;
}): LogEvent => {
  const resolvedContext = extractContext({context, input});
  const sanitizedMetadata = toMetadataRecord(
    sanitizeForLog({
      value: input.metadata ?? {},
      extraSensitiveKeys: options.extraSensitiveKeys
    })
  );

  return LogEventSchema.parse({
    ts: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: resolvedContext.correlation_id,
    request_id: resolvedContext.request_id,
    ...(input.message ? {message: input.message} : {}),
    ...(resolvedContext.keystore_id ? {keystore_id: resolvedContext.keystore_id} : {}),
    ...(resolvedContext.key_id ? {key_id: resolvedContext.key_id} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(resolvedContext.route ? {route: resolvedContext.route} : {}),
    ...(resolvedContext.method ? {method: resolvedContext.method} : {}),
    metadata: sanitizedMetadata
  });
};

type ParsedLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now: () => Date;
  writer: StructuredLogWriter;
  extraSensitiveKeys: string[];
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const parsedOptions: ParsedLoggerOptions = {
    level: LogLevelSchema.parse(options.level),
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    now: options.now ?? (() => new Date()),
    writer: options.writer ?? defaultWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };

  const log = (rawInput: LogEventInput) => {
    // Logging failures must never break request handling.
    try {
      const input = LogEventInputSchema.parse(rawInput);
      if (!shouldEmit({configuredLevel: parsedOptions.level, eventLevel: input.level})) {
        return;
      }

      const envelope = createEnvelope({
        input,
        options: parsedOptions,
        context: getLogContext()
      });
      chooseStream({level: input.level, writer: parsedOptions.writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      return;
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
