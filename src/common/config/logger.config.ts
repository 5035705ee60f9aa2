import { Params } from 'nestjs-pino';
import { getCorrelationId } from '../services/correlation-context';

const nodeEnv = process.env.NODE_ENV;

export const loggerConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),

    // NOTE: customProps only covers HTTP-triggered code paths. Scheduled
    // resyncs include correlationId in their own log data object.
    customProps: (): Record<string, unknown> => ({
      correlationId: getCorrelationId(),
    }),

    transport:
      nodeEnv !== 'production' && nodeEnv !== 'test'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              singleLine: false,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,

    base: null,

    serializers: {
      req: () => undefined,
      res: () => undefined,
    },
  },
};
