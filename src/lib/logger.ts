import pino from 'pino';

// Read straight from the environment: importing the config here would create a cycle
const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

const logger = pino({
  level,
  base: { service: 'access-gate-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  // Tokens and credentials never reach the logs
  redact: {
    paths: [
      'req.headers.authorization',
      'headers.authorization',
      'authorization',
      'token',
      'refreshToken',
      'password',
    ],
    censor: '[redacted]',
  },
});

export default logger;
