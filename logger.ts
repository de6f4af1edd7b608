import type { EventHandler, IndexerEvent } from './types'
import type { LogLevel } from './config'
import { describe_error } from './result'

type LogContext = Record<string, unknown>

type LoggerFn = (message: string, context?: LogContext) => void

export type Logger = Record<LogLevel, LoggerFn>

export type LogSink = (level: LogLevel, message: string, context?: LogContext) => void

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

// stdout belongs to whatever embeds the indexer; every log line goes to stderr.
const stderr_sink: LogSink = (level, message, context) => {
  const write = level === 'warn' ? console.warn : console.error
  if (context && Object.keys(context).length > 0) {
    write(`[${level}] ${message}`, context)
    return
  }
  write(`[${level}] ${message}`)
}

export type LoggerOpts = {
  level?: LogLevel
  sink?: LogSink
}

export const create_logger = (opts: LoggerOpts = {}): Logger => {
  const threshold = RANK[opts.level ?? 'info']
  const sink = opts.sink ?? stderr_sink
  const at = (level: LogLevel): LoggerFn => (message, context) => {
    if (RANK[level] >= threshold) sink(level, message, context)
  }
  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') }
}

const describe_event = (event: IndexerEvent): [LogLevel, string, LogContext?] => {
  switch (event.type) {
    case 'tool_register':
      return ['debug', `registered ${event.requested} tools, ${event.created} new`]
    case 'fact_get':
      return ['debug', `${event.table}: found ${event.found} of ${event.requested}`]
    case 'fact_add':
      return ['debug', `${event.table}: ${event.affected} written, ${event.rejected} rejected`, { policy: event.policy }]
    case 'fact_delete':
      return ['debug', `${event.table}: ${event.deleted} deleted`]
    case 'content_translated':
      return ['debug', `translated ${event.content_id} as ${event.ecosystem}`, { reused: event.reused }]
    case 'translation_skipped':
      return ['warn', `skipped ${event.content_id} (${event.ecosystem}): ${describe_error(event.error)}`]
    case 'directory_indexed':
      return ['info', `indexed directory ${event.directory_id}`, { tool_id: event.tool_id, mappings: event.mappings }]
    case 'origin_aggregated':
      return ['info', `aggregated ${event.extrinsic ? 'extrinsic' : 'intrinsic'} metadata for ${event.origin}`, { provenance: event.provenance }]
    case 'extrinsic_dropped':
      return ['info', `dropped extrinsic record ${event.remd_id}: ${event.reason}`]
    case 'run_transition':
      return ['debug', `${event.origin}: ${event.from} -> ${event.to}`, { run_id: event.run_id }]
    case 'task_scheduled':
      return ['debug', `scheduled ${event.stage} for ${event.origin}`]
    case 'task_failed':
      return ['error', `${event.stage} failed for ${event.origin}: ${describe_error(event.error)}`, { object_id: event.object_id, tool_id: event.tool_id }]
  }
}

/**
 * Adapts a logger into an `on_event` handler.
 *
 * @example
 * ```ts
 * const logger = create_logger({ level: 'debug' })
 * const storage = create_memory_backend({ on_event: create_event_logger(logger) })
 * ```
 */
export const create_event_logger = (logger: Logger): EventHandler => event => {
  const [level, message, context] = describe_event(event)
  logger[level](message, context)
}
