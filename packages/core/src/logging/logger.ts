import { EventEmitter } from 'events'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogArg = unknown

export interface Logger {
  debug(message: string, ...args: LogArg[]): void
  info(message: string, ...args: LogArg[]): void
  warn(message: string, ...args: LogArg[]): void
  error(message: string, ...args: LogArg[]): void
}

export interface LogEntry {
  level: LogLevel
  message: string
  args: LogArg[]
  timestamp: number
}

export interface LoggingConfig {
  level: LogLevel
  includeComponents?: string[] // e.g. ["async-multi", "callback-bridge"]
  excludeComponents?: string[]
  includeInstanceValues?: string[]
  excludeInstanceValues?: string[]
}

export interface LogContext {
  component: string
  name: string
  clientId: string
  instanceValue?: string
}

export type ShouldLogFn = (level: LogLevel, context: LogContext) => boolean

export interface ILoggableComponent {
  getLogName(): string
  getStaticLogName(): string
  loggingHost: ILoggingHost
  instanceKey?: string
}

export interface ILoggingHost {
  clientId: string
  scopedLoggerFor(component: ILoggableComponent): Logger
}

interface LogNamed {
  logName?: string
  name?: string
}

function staticLogNameOf(instance: object): string | undefined {
  const ctor: LogNamed = instance.constructor
  return ctor.logName
}

export class LoopComponent extends EventEmitter implements ILoggableComponent {
  protected host: ILoggingHost

  public get loggingHost(): ILoggingHost {
    return this.host
  }

  // Required: stable identifier for each component class
  static logName: string = 'component'

  private _logger?: Logger

  public instanceKey?: string

  constructor(host: ILoggingHost) {
    super()
    this.host = host

    if (!staticLogNameOf(this)) {
      const ctor: LogNamed = this.constructor
      throw new Error(`LoopComponent subclass missing static logName: ${ctor.name ?? '<unknown>'}`)
    }
  }

  protected get logger(): Logger {
    if (!this._logger) {
      this._logger = this.host.scopedLoggerFor(this)
    }
    return this._logger
  }

  getLogName(): string {
    return this.getStaticLogName()
  }

  getStaticLogName(): string {
    return staticLogNameOf(this) ?? 'component'
  }
}

export function buildInjectedContext(component: ILoggableComponent): LogContext {
  const ctx: LogContext = {
    component: component.getStaticLogName(),
    name: component.getLogName(),
    clientId: component.loggingHost.clientId,
  }

  if (component.instanceKey) {
    ctx.instanceValue = component.instanceKey
  }

  return ctx
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function passesLevel(msgLevel: LogLevel, configLevel: LogLevel): boolean {
  return LEVEL_PRIORITY[msgLevel] >= LEVEL_PRIORITY[configLevel]
}

export function createFilter(cfg: LoggingConfig): ShouldLogFn {
  return (level, ctx) => {
    if (!passesLevel(level, cfg.level)) return false

    const comp = ctx.component
    const inst = ctx.instanceValue

    if (cfg.excludeComponents?.includes(comp)) return false
    if (cfg.includeComponents && !cfg.includeComponents.includes(comp)) return false

    if (inst) {
      if (cfg.excludeInstanceValues?.includes(inst)) return false
      if (cfg.includeInstanceValues && !cfg.includeInstanceValues.includes(inst)) return false
    }

    return true
  }
}

const NOOP = (): void => {}

export function withScopeAndFiltering(
  base: Logger,
  component: ILoggableComponent,
  shouldLog: ShouldLogFn,
): Logger {
  const getLogger = (level: LogLevel): Logger[LogLevel] => {
    const ctx = buildInjectedContext(component)
    if (!shouldLog(level, ctx)) return NOOP

    const prefix = formatPrefix(ctx)

    // Bound rather than wrapped so the console attributes the call site to the caller.
    return base[level].bind(base, prefix)
  }

  return {
    get debug() {
      return getLogger('debug')
    },
    get info() {
      return getLogger('info')
    },
    get warn() {
      return getLogger('warn')
    },
    get error() {
      return getLogger('error')
    },
  }
}

export function basicLogger(): Logger {
  return console
}

export function formatPrefix(ctx: LogContext): string {
  const parts: string[] = []

  if (ctx.clientId) {
    parts.push(`Client[${ctx.clientId.slice(0, 4)}]`)
  }

  if (ctx.component) {
    const compStr = ctx.component.charAt(0).toUpperCase() + ctx.component.slice(1)

    if (ctx.instanceValue) {
      parts.push(`${compStr}[${ctx.instanceValue.slice(0, 4)}]`)
    } else {
      parts.push(compStr)
    }
  }

  return parts.length > 0 ? `[${parts.join(':')}]` : ''
}

export function defaultLogger(): Logger {
  return basicLogger()
}

export function randomClientId(): string {
  return Math.random().toString(36).substring(2, 15)
}

/**
 * Logging host that writes through a base logger (console by default),
 * optionally mirroring every emitted entry to a capture callback.
 */
export class ConsoleLoggingHost implements ILoggingHost {
  readonly clientId: string
  private readonly shouldLog: ShouldLogFn

  constructor(
    config: LoggingConfig = { level: 'info' },
    private readonly base: Logger = defaultLogger(),
    private readonly onCapture?: (entry: LogEntry) => void,
  ) {
    this.clientId = randomClientId()
    this.shouldLog = createFilter(config)
  }

  scopedLoggerFor(component: ILoggableComponent): Logger {
    return withScopeAndFiltering(this.capturing(), component, this.shouldLog)
  }

  private capturing(): Logger {
    const onCapture = this.onCapture
    if (!onCapture) return this.base

    const base = this.base
    const emit =
      (level: LogLevel) =>
      (message: string, ...args: LogArg[]): void => {
        onCapture({ level, message, args, timestamp: Date.now() })
        base[level](message, ...args)
      }

    return {
      debug: emit('debug'),
      info: emit('info'),
      warn: emit('warn'),
      error: emit('error'),
    }
  }
}
