import winston from 'winston';
import chalk from 'chalk';
import DailyRotateFile from 'winston-daily-rotate-file';

// Extend Winston Logger interface to include trace method
declare module 'winston' {
  interface Logger {
    trace: winston.LeveledLogMethod;
  }
}

const { createLogger: winstonCreateLogger, format, transports } = winston;
const { combine, timestamp, printf, colorize, errors } = format;

const levelColors: { [key: string]: (text: string) => string } = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  http: chalk.magenta,
  verbose: chalk.blue,
  debug: chalk.gray,
  silly: chalk.white,
  trace: chalk.white
};

const logFormat = printf(({ level, message, timestamp, module, stack, ...metadata }) => {
  const ts = chalk.grey(new Date(String(timestamp)).toISOString());
  const levelString = level.toUpperCase();
  const coloredLevel = levelColors[level] ? levelColors[level](levelString) : levelString;
  const moduleString = module ? chalk.yellow(`[${String(module)}]`) : '';

  let formattedMessage = String(message);

  // Highlight EVM addresses and transaction hashes
  formattedMessage = formattedMessage.replace(/\b(0x[a-fA-F0-9]{40}(?:[a-fA-F0-9]{24})?)\b/g, chalk.blueBright('$1'));

  // Highlight progress indicators like X/Y or (X/Y)
  formattedMessage = formattedMessage.replace(/\((\d+\/\d+)\)/g, `(${chalk.magentaBright('$1')})`);

  let msg = `${ts} ${coloredLevel} ${moduleString} ${formattedMessage}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${chalk.grey(JSON.stringify(metadata))}`;
  }

  if (stack) {
    msg += `\n${chalk.red(String(stack))}`;
  }

  return msg;
});

// Custom log levels with trace as most verbose
const customLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  silly: 6,
  trace: 7
};

winston.addColors({ trace: 'white' });

const logTransports: winston.transport[] = [
  new transports.Console({
    format: combine(
      colorize({ all: true }),
      logFormat
    ),
  }),
];

if (process.env.LOG_TO_FILE === 'true') {
  logTransports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '10m',
      maxFiles: '14d',
      zippedArchive: true,
    }),
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '7d',
      zippedArchive: true,
    })
  );
}

// --- Create a single, shared logger instance ---
const globalLogger = winstonCreateLogger({
  level: process.env.LOG_LEVEL || 'info',
  levels: customLevels,
  format: combine(
    errors({ stack: true }),
    timestamp(),
    logFormat
  ),
  transports: logTransports,
});

export type AppLogger = winston.Logger;

// Child loggers share the global transports and tag every line with the module name.
export const createLogger = (moduleName: string): AppLogger => {
  return globalLogger.child({ module: moduleName });
};

export default createLogger('default');
