import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isTest = nodeEnv === 'test';

// Fields surfaced on their own line; everything else is folded into "Additional"
const HIGHLIGHTED_FIELDS: readonly string[] = ['status', 'error', 'requestId', 'elapsedMs', 'delayMs'];

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? (nodeEnv === 'production' ? 'info' : 'debug'),
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'kling-task-sdk' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info) => {
          const { level, message, timestamp, family, taskId, attempt, service: _service, ...metadata } = info;
          const familyInfo = family ? `[${String(family)}]` : '';
          const taskInfo = taskId ? `[${String(taskId)}]` : '';
          const attemptInfo = attempt ? `[attempt ${String(attempt)}]` : '';

          let output = `${String(timestamp)} ${level}: ${familyInfo}${taskInfo}${attemptInfo} ${String(message)}`;

          for (const field of HIGHLIGHTED_FIELDS) {
            if (metadata[field] !== undefined) {
              output += `\n  ${field}: ${String(metadata[field])}`;
            }
          }

          const remainingKeys = Object.keys(metadata).filter(
            (key) => !HIGHLIGHTED_FIELDS.includes(key)
          );
          if (remainingKeys.length > 0) {
            const remaining: Record<string, unknown> = {};
            for (const key of remainingKeys) {
              remaining[key] = metadata[key];
            }
            output += `\n  Additional: ${JSON.stringify(remaining)}`;
          }

          return output;
        })
      )
    })
  ]
});

if (!isTest) {
  logger.add(new winston.transports.File({
    filename: 'logs/error.log',
    level: 'error',
    maxsize: 5242880, // 5MB
    maxFiles: 5,
  }));

  logger.add(new winston.transports.File({
    filename: 'logs/combined.log',
    maxsize: 5242880, // 5MB
    maxFiles: 5,
  }));
}

export default logger;
