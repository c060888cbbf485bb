import pino from 'pino'

const root = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: undefined,
})

export class Logger {
  private readonly logger: pino.Logger

  constructor(scope: string) {
    this.logger = root.child({ scope })
  }

  debug(message: string, meta?: object) {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: object) {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: object) {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: object) {
    this.logger.error(meta ?? {}, message)
  }
}
