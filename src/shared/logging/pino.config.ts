import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream, type StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'property-search';
const logFile = process.env.LOG_FILE;
const isProduction = process.env.NODE_ENV === 'production';

const streams: StreamEntry[] = [
  // Console output: pretty outside production, JSON in production
  {
    level: 'info',
    stream: !isProduction
      ? pinoPretty({
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          singleLine: false,
        })
      : process.stdout,
  },
];

if (logFile) {
  // File output with JSON formatting
  streams.push({
    level: 'debug',
    stream: createWriteStream(logFile, { flags: 'a' }),
  });
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: isProduction ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => (req.url || '') === '/health',
    },

    genReqId: (req: IncomingMessage) => {
      const requestId = req.headers['x-request-id'];
      return typeof requestId === 'string' && requestId
        ? requestId
        : `req-${uuidv4()}`;
    },

    customProps: (req: IncomingMessage) => ({
      requestId: req.id,
    }),

    stream: multistream(streams),
  },
};
