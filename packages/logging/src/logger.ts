import {z} from 'zod';

import {getLogContext, type LogContext} from './context.js';
import {sanitizeForLog} from './redaction.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

const RoleSchema = z.enum(['initiator', 'responder']);

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    role: RoleSchema.optional(),
    sae_id: z.string().min(1).optional(),
    kme_host: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
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
    role: RoleSchema.optional(),
    sae_id: z.string().min(1).optional(),
    kme_host: z.string().min(1).optional(),
    operation: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;

const toLevelOrder = (level: LogLevel) => {
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

export type LineSink = {
  write: (line: string) => unknown;
};

export type StructuredLogWriter = {
  stdout: LineSink;
  stderr: LineSink;
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

const resolveContext = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => ({
  correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
  request_id: input.request_id ?? context?.request_id ?? 'n/a',
  role: input.role ?? context?.role,
  sae_id: input.sae_id ?? context?.sae_id,
  kme_host: input.kme_host ?? context?.kme_host,
  operation: context?.operation
});

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: ParsedLoggerOptions;
  context: LogContext | undefined;
}): LogEvent => {
  const resolved = resolveContext({context, input});

  return LogEventSchema.parse({
    ts: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: resolved.correlation_id,
    request_id: resolved.request_id,
    ...(input.message ? {message: input.message} : {}),
    ...(resolved.role ? {role: resolved.role} : {}),
    ...(resolved.sae_id ? {sae_id: resolved.sae_id} : {}),
    ...(resolved.kme_host ? {kme_host: resolved.kme_host} : {}),
    ...(resolved.operation ? {operation: resolved.operation} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    metadata: sanitizeForLog({
      value: input.metadata ?? {},
      extraSensitiveKeys: options.extraSensitiveKeys
    })
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
      // Logging failures must never break key retrieval.
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
