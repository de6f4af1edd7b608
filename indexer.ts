/**
 * @module Indexer
 * @description Assembles storage, tools, logging and the dispatcher from an {@link IndexerConfig}.
 */

import type { EventHandler, IndexerStorage, Result, Scheduler } from './types'
import { ok } from './types'
import type { GraphStorage } from './archive'
import { create_backend, register_tools, type IndexerConfig } from './config'
import { create_dispatcher, type Dispatcher, type DispatcherTools } from './dispatcher'
import { create_event_logger, create_logger, type LogSink, type Logger } from './logger'

export type IndexerDeps = {
  graph: GraphStorage
  scheduler: Scheduler
  /** Replaces the backend `config.storage` describes. Its `on_event` is left as given and `close` does not close it. */
  storage?: IndexerStorage
  sink?: LogSink
  /** Receives every event after it has been logged. */
  on_event?: EventHandler
}

export type Indexer = {
  storage: IndexerStorage
  tools: DispatcherTools
  dispatcher: Dispatcher
  logger: Logger
  close: () => void
}

/**
 * Builds a ready-to-run indexer: the backend, the three registered tools, a
 * logger at `config.log_level`, and a dispatcher using the configured branch
 * precedence, filename registry, translate concurrency and default conflict
 * policy.
 *
 * @category Core
 * @group Builders
 *
 * @example
 * ```ts
 * const config = unwrap(load_config(process.env))
 * const queue = create_memory_queue()
 * const indexer = unwrap(await create_indexer(config, { graph: archive, scheduler: queue }))
 *
 * await indexer.dispatcher.start('https://example.org/foo')
 * await queue.drain(indexer.dispatcher.handle)
 * indexer.close()
 * ```
 */
export async function create_indexer(config: IndexerConfig, deps: IndexerDeps): Promise<Result<Indexer>> {
  const logger = create_logger({ level: config.log_level, sink: deps.sink })
  const log_event = create_event_logger(logger)
  const on_event: EventHandler = event => {
    log_event(event)
    deps.on_event?.(event)
  }

  const owned = deps.storage === undefined
  const storage = deps.storage ?? create_backend(config, on_event)
  const close = () => {
    if (owned) storage.close()
  }

  const tools = await register_tools(storage.tools, config.tools)
  if (!tools.ok) {
    close()
    return tools
  }

  const dispatcher = create_dispatcher({
    storage,
    graph: deps.graph,
    scheduler: deps.scheduler,
    tools: tools.value,
    filenames: config.filenames,
    branch_names: config.head_branches,
    concurrency: config.translate_concurrency,
    policy: config.conflict_policy,
    on_event,
  })

  logger.info(`indexer ready on ${config.storage.kind} storage`, { policy: config.conflict_policy })
  return ok({ storage, tools: tools.value, dispatcher, logger, close })
}
