import type { ErrorCode } from "./errors";

export type ApiSuccess<T> = {
  ok: true;
  data: T;
  requestId?: string;
};

export type ApiErrorBody = {
  code: ErrorCode;
  message: string;
  details?: unknown;
  hint?: string;
};

export type ApiError = {
  ok: false;
  error: ApiErrorBody;
  requestId?: string;
};
