import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { TransportError, UpstreamError } from "../errors/index.js";
import { isPlainObject } from "./canonical-json.js";

interface ApiErrorResponse {
  error: {
    message: string;
    type: string;
    code: string | null;
  };
}

/**
 * Maps HTTP status codes to error types
 */
function getErrorType(status: number): string {
  switch (status) {
    case HttpStatus.BAD_REQUEST:
      return "invalid_request_error";
    case HttpStatus.UNAUTHORIZED:
      return "authentication_error";
    case HttpStatus.FORBIDDEN:
      return "permission_error";
    case HttpStatus.NOT_FOUND:
      return "not_found_error";
    case HttpStatus.CONFLICT:
      return "conflict_error";
    case HttpStatus.TOO_MANY_REQUESTS:
      return "rate_limit_error";
    case HttpStatus.BAD_GATEWAY:
    case HttpStatus.GATEWAY_TIMEOUT:
      return "proxy_error";
    case HttpStatus.INTERNAL_SERVER_ERROR:
    default:
      return "server_error";
  }
}

function extractMessage(exceptionResponse: string | object, fallback: string): string {
  if (typeof exceptionResponse === "string") {
    return exceptionResponse;
  }
  if (isPlainObject(exceptionResponse)) {
    const { message } = exceptionResponse;
    if (typeof message === "string") return message;
    // class-validator style arrays from Nest's built-in pipes
    if (Array.isArray(message)) return message.join("; ");
  }
  return fallback;
}

/**
 * Renders every error as `{"error": {message, type, code}}`. Upstream error
 * bodies are passed through verbatim with the upstream status.
 */
@Catch()
export class ApiErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (response.headersSent) {
      this.logger.error(`Error after response started: ${String(exception)}`);
      response.end();
      return;
    }

    if (exception instanceof UpstreamError) {
      response.status(exception.upstreamStatus).json(exception.body);
      return;
    }

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = "An unexpected error occurred";
    let code: string | null = null;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = extractMessage(exception.getResponse(), message);
      if (exception instanceof TransportError) {
        code = exception.failure === "timeout" ? "UPSTREAM_TIMEOUT" : "UPSTREAM_UNAVAILABLE";
      }
    } else {
      this.logger.error(
        exception instanceof Error ? (exception.stack ?? exception.message) : String(exception),
      );
    }

    const errorResponse: ApiErrorResponse = {
      error: {
        message,
        type: getErrorType(status),
        code,
      },
    };

    response.status(status).json(errorResponse);
  }
}
