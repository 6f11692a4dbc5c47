import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const line = printf(({ level, message, timestamp: ts, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level} ${String(message)}${extra}`;
});

export const logger = winston.createLogger({
  // Raised or lowered from LOG_LEVEL once the config is validated
  level: 'info',
  // Vitest sets VITEST; keep test output to the runner's own report
  silent: Boolean(process.env.VITEST),
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), colorize(), line),
  transports: [new winston.transports.Console()],
});

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
