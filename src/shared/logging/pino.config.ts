import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { DestinationStream, multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

export interface LoggingOptions {
  level: string;
  serviceName: string;
  environment: string;
  logDir?: string;
}

export function createPinoConfig(options: LoggingOptions): Params {
  return {
    pinoHttp: {
      level: options.level,

      base: {
        service: options.serviceName,
        environment: options.environment,
      },

      redact: {
        paths: [
          'req.headers.authorization',
          'req.headers.cookie',
          'req.headers["x-api-key"]',
          'password',
          'secretKey',
          'apiKey',
        ],
        remove: true,
      },

      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

      serializers: {
        req: (req: IncomingMessage) => ({
          id: req.id,
          method: req.method,
          url: req.url,
        }),
        res: (res: ServerResponse) => ({
          statusCode: res.statusCode,
        }),
      },

      autoLogging: {
        ignore: (req: IncomingMessage) => req.url === '/health',
      },

      genReqId: (req: IncomingMessage, res: ServerResponse) => {
        const header = req.headers['x-request-id'];
        const requestId = typeof header === 'string' && header.length > 0 ? header : `req-${uuidv4()}`;
        res.setHeader('X-Request-ID', requestId);
        return requestId;
      },

      stream: createLogStream(options),
    },
  };
}

/**
 * Console (pretty outside production) plus an optional JSON file
 */
function createLogStream(options: LoggingOptions): DestinationStream {
  const streams: StreamEntry[] = [
    {
      level: 'info',
      stream:
        options.environment !== 'production'
          ? pinoPretty({
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              singleLine: false,
            })
          : process.stdout,
    },
  ];

  if (options.logDir) {
    mkdirSync(options.logDir, { recursive: true });
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(options.logDir, `${options.serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return multistream(streams);
}
