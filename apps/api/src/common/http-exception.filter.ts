import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { ApiError, ApiErrorBody, ErrorCode, ErrorCodes } from "@gst-billing/shared";
import { RequestContext } from "../logging/request-context";
import { BillingError } from "./billing-errors";
import { describeBillingError } from "./billing-error-messages";

const errorCodeValues: readonly string[] = Object.values(ErrorCodes);

const isErrorCode = (value: unknown): value is ErrorCode =>
  typeof value === "string" && errorCodeValues.includes(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const requestId = RequestContext.get()?.requestId;

    const { status, error } = this.describe(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.originalUrl ?? request.url} failed: ${error.code}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    const body: ApiError = { ok: false, error, requestId };
    response.status(status).json(body);
  }

  private describe(exception: unknown): { status: number; error: ApiErrorBody } {
    if (exception instanceof BillingError) {
      const presentation = describeBillingError(exception);
      return {
        status: presentation.status,
        error: {
          code: exception.code,
          message: presentation.message,
          hint: presentation.hint,
          details: presentation.status < HttpStatus.INTERNAL_SERVER_ERROR ? exception.details : undefined,
        },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const payload = exception.getResponse();
      let code = this.mapStatusToCode(status);
      let message = exception.message;
      let details: unknown;
      let hint: string | undefined;

      if (typeof payload === "string") {
        message = payload;
      } else if (isRecord(payload)) {
        if (isErrorCode(payload.code)) {
          code = payload.code;
        }
        if (typeof payload.message === "string") {
          message = payload.message;
        } else if (Array.isArray(payload.message)) {
          message = payload.message.filter((item) => typeof item === "string").join(", ") || message;
        }
        details = payload.details;
        if (typeof payload.hint === "string") {
          hint = payload.hint;
        }
      }

      return { status, error: { code, message, details, hint: hint ?? this.mapStatusToHint(status) } };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      error: {
        code: ErrorCodes.INTERNAL_SERVER_ERROR,
        message: "Internal server error",
        hint: this.mapStatusToHint(HttpStatus.INTERNAL_SERVER_ERROR),
      },
    };
  }

  private mapStatusToCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCodes.VALIDATION_ERROR;
      case HttpStatus.NOT_FOUND:
        return ErrorCodes.NOT_FOUND;
      case HttpStatus.CONFLICT:
        return ErrorCodes.CONFLICT;
      default:
        return ErrorCodes.INTERNAL_SERVER_ERROR;
    }
  }

  private mapStatusToHint(status: number) {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return "Check the request fields and try again.";
      case HttpStatus.NOT_FOUND:
        return "Check the link or refresh and try again.";
      case HttpStatus.CONFLICT:
        return "Refresh and retry. This may have already been processed.";
      default:
        return "Please try again. If this keeps happening, contact support.";
    }
  }
}
