import winston from 'winston';
import util from 'node:util';
import type { TransformableInfo } from 'logform';


// https://github.com/winstonjs/winston/issues/1427
const combineMessageAndSplat = () => ({
  transform(info: TransformableInfo) {
    const splat: unknown = info[Symbol.for('splat')];
    const args = Array.isArray(splat) ? splat : [];
    // eslint-disable-next-line no-param-reassign
    info.message = util.format(info.message, ...args);
    return info;
  },
});

const createLogger = () => winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    combineMessageAndSplat(),
    winston.format.printf((info) => `${String(info['timestamp'])} ${info.level}: ${String(info.message)}`),
  ),
});

const logger = createLogger();
// stdout is reserved for CSV output
logger.add(new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] }));

export function addFileTransport(filename: string) {
  logger.add(new winston.transports.File({ level: 'debug', filename, options: { flags: 'a' }, maxsize: 1e6, maxFiles: 100, tailable: true }));
}

export function setLogLevel(level: string) {
  logger.level = level;
}

export default logger;
