import { randomBytes, randomUUID } from "crypto";
import type { NextFunction, Request, Response } from "express";
import { RequestContext } from "./request-context";

const TRACEPARENT_PATTERN = /^00-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/i;

function readTraceparent(headerValue: string | undefined) {
  const match = headerValue ? TRACEPARENT_PATTERN.exec(headerValue.trim()) : null;
  if (!match) {
    return null;
  }
  const traceId = match[1].toLowerCase();
  if (/^0+$/.test(traceId) || /^0+$/.test(match[2])) {
    return null;
  }
  return { traceId, traceFlags: match[3].toLowerCase() };
}

function clientIp(req: Request) {
  const forwardedFor = req.headers["x-forwarded-for"];
  const first = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor?.split(",")[0];
  const trimmed = first?.trim();
  return trimmed ? trimmed : (req.ip ?? req.socket?.remoteAddress);
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const headerId = req.header("x-request-id")?.trim();
  const requestId = headerId ? headerId : randomUUID();
  res.setHeader("x-request-id", requestId);

  const incoming = readTraceparent(req.header("traceparent"));
  const traceId = incoming?.traceId ?? randomBytes(16).toString("hex");
  const spanId = randomBytes(8).toString("hex");
  res.setHeader("x-trace-id", traceId);
  res.setHeader("traceparent", `00-${traceId}-${spanId}-${incoming?.traceFlags ?? "01"}`);

  RequestContext.run(
    { requestId, traceId, spanId, ip: clientIp(req), userAgent: req.get("user-agent") || undefined },
    () => next(),
  );
}
