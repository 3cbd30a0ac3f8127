import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { ProxyError, UpstreamError } from "@/common/errors/proxy.errors";
import type { StandardErrorResponse } from "@/common/types/error-handling";
import { ErrorCode, ErrorSeverity, isStandardErrorResponse } from "@/common/types/error-handling";
import { asError } from "@/common/utils/error.utils";

/**
 * Global exception filter. Renders every failure as the standard JSON error envelope:
 * upstream failures as 502 (504 on timeout), HttpExceptions with their own status, the rest as 500.
 * A response that already started streaming cannot change status, so its connection is dropped.
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = this.statusFor(exception);
    const body = this.buildErrorResponse(exception, status, request);
    this.logError(exception, body, request, status);

    if (response.headersSent) {
      response.destroy();
      return;
    }

    response.setHeader("X-Content-Type-Options", "nosniff");
    response.setHeader("Cache-Control", "no-store");
    response.status(status).json(body);
  }

  private statusFor(exception: unknown): number {
    if (exception instanceof UpstreamError) {
      return exception.timedOut ? HttpStatus.GATEWAY_TIMEOUT : HttpStatus.BAD_GATEWAY;
    }
    if (exception instanceof HttpException) {
      return exception.getStatus();
    }
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  private buildErrorResponse(exception: unknown, status: number, request: Request): StandardErrorResponse {
    const requestId = request.get("X-Request-ID") ?? this.generateRequestId();
    const requestContext = { httpStatus: status, path: request.path, method: request.method };

    if (exception instanceof ProxyError) {
      return {
        success: false,
        error: {
          code: exception.code,
          message: exception.message,
          severity: exception.severity,
          module: exception.name,
          timestamp: exception.timestamp,
          context: { ...exception.context, ...requestContext },
        },
        timestamp: Date.now(),
        requestId,
        retryable: exception.retryable,
      };
    }

    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      if (isStandardErrorResponse(exceptionResponse)) {
        return { ...exceptionResponse, requestId };
      }
      const { code, message } = this.describeHttpException(exception, exceptionResponse);
      return {
        success: false,
        error: {
          code,
          message,
          severity: status >= 500 ? ErrorSeverity.HIGH : ErrorSeverity.LOW,
          module: "HttpException",
          timestamp: Date.now(),
          context: requestContext,
        },
        timestamp: Date.now(),
        requestId,
        retryable: status === HttpStatus.SERVICE_UNAVAILABLE || status === HttpStatus.TOO_MANY_REQUESTS,
      };
    }

    return {
      success: false,
      error: {
        code: ErrorCode.UNKNOWN_ERROR,
        message: "Internal server error",
        severity: ErrorSeverity.CRITICAL,
        module: "UnknownError",
        timestamp: Date.now(),
        context: requestContext,
      },
      timestamp: Date.now(),
      requestId,
      retryable: false,
    };
  }

  private describeHttpException(
    exception: HttpException,
    response: string | object
  ): { code: string; message: string } {
    if (typeof response === "string") {
      return { code: ErrorCode.HTTP_EXCEPTION, message: response };
    }

    let code: string = ErrorCode.HTTP_EXCEPTION;
    if ("code" in response && typeof response.code === "string") {
      code = response.code;
    } else if ("error" in response && typeof response.error === "string") {
      code = response.error;
    }
    const message = "message" in response && typeof response.message === "string" ? response.message : exception.message;
    return { code, message };
  }

  private logError(exception: unknown, body: StandardErrorResponse, request: Request, status: number): void {
    const message = `${request.method} ${request.originalUrl} - ${status} - ${body.error.message}`;
    const logContext = { requestId: body.requestId, code: body.error.code, retryable: body.retryable };

    if (status >= 500 && !(exception instanceof UpstreamError)) {
      this.logger.error(message, asError(exception).stack, logContext);
    } else if (status >= 500) {
      this.logger.warn(message, logContext);
    } else {
      this.logger.debug(message, logContext);
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }
}
