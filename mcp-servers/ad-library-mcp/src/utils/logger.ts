import winston from 'winston';
import { inspect } from 'util';

const logLevel = process.env.LOG_LEVEL || 'info';
const isTest = process.env.NODE_ENV === 'test';

const SENSITIVE_KEY_REGEX = /(authorization|api[_-]?key|access[_-]?token|token|secret)/i;
const SENSITIVE_STRING_REGEXES = [
  /([?&](?:key|api_key|token|secret)=)([^&\s]+)/gi,
  /(x-(?:api|goog-api)-key["']?\s*[:=]\s*["']?)([a-z0-9\-_.]+)/gi,
  /(authorization["']?\s*[:=]\s*["']?bearer\s+)([a-z0-9\-_.]+)/gi,
  /("?(?:api[_-]?key|access[_-]?token|authorization|token|secret)"?\s*:\s*")([^"]+)(")/gi,
];

function redactString(input: string): string {
  return SENSITIVE_STRING_REGEXES.reduce((value, regex) => {
    // Without a third group the fourth argument is the match offset.
    return value.replace(regex, (_match, prefix: string, _secret: string, suffix: unknown) => {
      if (typeof suffix === 'string') return `${prefix}[REDACTED]${suffix}`;
      return `${prefix}[REDACTED]`;
    });
  }, input);
}

export function redactSensitivePayload(value: unknown): unknown {
  if (value == null) return value;

  if (typeof value === 'string') {
    return redactString(value);
  }

  if (Array.isArray(value)) {
    return value.map((entry) => redactSensitivePayload(entry));
  }

  if (typeof value === 'object') {
    const output: Record<string, unknown> = {};
    for (const [key, nestedValue] of Object.entries(value)) {
      output[key] = SENSITIVE_KEY_REGEX.test(key) ? '[REDACTED]' : redactSensitivePayload(nestedValue);
    }
    return output;
  }

  return value;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = SENSITIVE_KEY_REGEX.test(key) ? '[REDACTED]' : redactSensitivePayload(info[key]);
  }
  return info;
});

export const logger = winston.createLogger({
  level: logLevel,
  silent: isTest,
  format: winston.format.combine(
    redactFormat(),
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'ad-library-mcp' },
  transports: isTest
    ? [new winston.transports.Console()]
    : [
        new winston.transports.File({ filename: 'logs/error.log', level: 'error' }),
        new winston.transports.File({ filename: 'logs/combined.log' }),
      ],
});

// stdout belongs to the MCP stdio transport, so console output goes to stderr.
if (process.env.NODE_ENV !== 'production' && !isTest) {
  logger.add(
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          let output = `${timestamp} [${level}]: ${message}`;

          if (Object.keys(meta).length > 0) {
            try {
              output += ` ${JSON.stringify(meta)}`;
            } catch {
              // circular references
              output += ` ${inspect(meta, { depth: 2, colors: false })}`;
            }
          }

          return output;
        })
      ),
    })
  );
}
