import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Inject } from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";

import { PersistenceFailureError } from "../errors.js";

/**
 * Storage failures become 503 so that callers can tell "the store is down"
 * apart from "no record for this plate". The message names the failed
 * operation, whichever route it came from.
 */
@Catch(PersistenceFailureError)
export class PersistenceFailureFilter implements ExceptionFilter<PersistenceFailureError> {
  constructor(@Inject(HttpAdapterHost) private readonly adapterHost: HttpAdapterHost) {}

  catch(exception: PersistenceFailureError, host: ArgumentsHost): void {
    const { httpAdapter } = this.adapterHost;
    const context = host.switchToHttp();
    httpAdapter.reply(
      context.getResponse(),
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: "Service Unavailable",
        message: `Storage unavailable: ${exception.message}`,
      },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}
