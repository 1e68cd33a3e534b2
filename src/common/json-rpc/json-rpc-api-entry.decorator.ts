import {
  applyDecorators,
  HttpCode,
  HttpStatus,
  Post,
  UseFilters,
  UseInterceptors,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { JsonRpcExceptionFilter } from '@common/json-rpc/json-rpc.exception-filter';
import { JsonRpcInterceptor } from '@common/json-rpc/json-rpc.interceptor';
import { ValidationFailedAppError } from '@common/errors/validation-failed.app-error';
import { RegisterErrorInterceptor } from '@common/errors/register-error.interceptor';

interface JsonRpcApiEntryConfig {
  readonly path: string;
}

// Body fields without validation decorators are dropped before the handler
const Validator = new ValidationPipe({
  transform: true,
  whitelist: true,
  exceptionFactory: (errors) => new ValidationFailedAppError(errors),
});

/**
 * # POST entry answering with a JSON-RPC envelope
 *
 * Always replies with HTTP 200; failures come back as `status: 'error'`.
 */
export function JsonRpcApiEntry(
  config: JsonRpcApiEntryConfig,
): ReturnType<typeof applyDecorators> {
  return applyDecorators(
    Post(config.path),
    HttpCode(HttpStatus.OK),
    UseFilters(JsonRpcExceptionFilter),
    UseInterceptors(RegisterErrorInterceptor, JsonRpcInterceptor),
    UsePipes(Validator),
  );
}
