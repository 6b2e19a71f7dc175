import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { ChatNotAccessibleError, SubscriberNotFoundError, TelegramNotConfiguredError } from '../common/errors';
import { LoggerService } from '../common/logger.service';

type DomainError = TelegramNotConfiguredError | ChatNotAccessibleError | SubscriberNotFoundError;

interface JsonResponse {
  status(code: number): { json(body: unknown): unknown };
}

export function statusFor(err: DomainError): number {
  if (err instanceof TelegramNotConfiguredError) return HttpStatus.INTERNAL_SERVER_ERROR;
  return HttpStatus.NOT_FOUND;
}

@Catch(TelegramNotConfiguredError, ChatNotAccessibleError, SubscriberNotFoundError)
export class DomainExceptionFilter implements ExceptionFilter<DomainError> {
  constructor(private readonly logger: LoggerService) {}

  catch(err: DomainError, host: ArgumentsHost) {
    const statusCode = statusFor(err);
    if (statusCode >= 500) {
      this.logger.error(err.message, err.stack);
    }
    host.switchToHttp().getResponse<JsonResponse>().status(statusCode).json({ statusCode, message: err.message });
  }
}
