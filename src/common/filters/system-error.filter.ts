import {
  Catch,
  type ExceptionFilter,
  type ArgumentsHost,
  Logger,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SystemError } from '../errors/system-error';
import { SystemHealthError } from '../errors/system-health-error';
import { SystemHealthCriticalEvent } from '../events/system.events';
import { EVENT_NAMES } from '../events/event-catalog';

interface HttpReply {
  status: (code: number) => { send: (body: unknown) => unknown };
}

@Catch(SystemError)
export class SystemErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(SystemErrorFilter.name);
  private emitting = false;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  catch(exception: SystemError, host: ArgumentsHost): void {
    const component =
      exception instanceof SystemHealthError ? exception.component : undefined;

    this.logger.error({
      message: exception.message,
      code: exception.code,
      severity: exception.severity,
      retryStrategy: exception.retryStrategy,
      component,
      module: 'system-error-filter',
      data: exception.metadata,
      stack: exception.stack,
    });

    // Re-entrancy guard: a failing listener must not loop back through here
    if (exception.severity === 'critical' && !this.emitting) {
      this.emitting = true;
      try {
        this.eventEmitter.emit(
          EVENT_NAMES.SYSTEM_HEALTH_CRITICAL,
          new SystemHealthCriticalEvent(
            exception.code,
            exception.message,
            exception.name,
            { ...exception.metadata, component: component ?? 'unknown' },
          ),
        );
      } finally {
        this.emitting = false;
      }
    }

    // Scheduled resyncs and other non-HTTP contexts: log only
    if (host.getType() !== 'http') {
      return;
    }

    const response = host.switchToHttp().getResponse<HttpReply>();

    // warning: the clock is usable again once a sync succeeds
    const statusCode = exception.severity === 'warning' ? 503 : 500;

    void response.status(statusCode).send({
      error: {
        code: exception.code,
        message: exception.message,
        severity: exception.severity,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
