import { HttpStatus, ValidationPipe } from '@nestjs/common';

/** Unknown fields and wrong types are rejected with 422 before reaching a handler. */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY
  });
}
