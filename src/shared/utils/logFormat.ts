import { format } from 'winston';

/**
 * Reusable Winston log formats.
 */
export const LogFormats = {
  /**
   * Colourised format with timestamp, level, message, metadata and stack trace.
   */
  developmentFormat: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
    format.splat(),
    format.colorize(),
    format.printf(({ level, message, timestamp, stack, ...metadata }) => {
      let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
      const metaString = Object.keys(metadata).length
        ? JSON.stringify(metadata, getCircularReplacer(), 2)
        : '';
      if (metaString && metaString !== '{}') {
        msg += `\nMetadata: ${metaString}`;
      }
      if (typeof stack === 'string') {
        msg += `\nStack: ${stack}`;
      }
      return msg;
    })
  ),

  /**
   * JSON format with timestamp, level, message, metadata and stack trace.
   */
  productionFormat: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'label'] }),
    format.json()
  )
};

/**
 * JSON.stringify replacer that prints repeated object references as '[Circular]'.
 */
export const getCircularReplacer = () => {
  const seen = new WeakSet<object>();
  return (_key: string, value: unknown): unknown => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    return value;
  };
};
