import pinoHttp from "pino-http";
import type { Request, Response } from "express";
import type { ApiEnv } from "../common/env";
import { RequestContext } from "./request-context";

const SERVICE_NAME = "gst-billing-api";

function resolveRouteLabel(req: Request) {
  if (typeof req.route?.path === "string") {
    return `${req.baseUrl ?? ""}${req.route.path}`;
  }
  const rawPath = req.originalUrl?.split("?")[0] ?? req.url ?? "/";
  return rawPath.startsWith("/") ? rawPath : `/${rawPath}`;
}

export function isProductionEnvironment(environment: string) {
  const normalized = environment.trim().toLowerCase();
  return normalized === "production" || normalized === "prod";
}

export function createHttpLogger(env: Pick<ApiEnv, "APP_ENVIRONMENT">) {
  const production = isProductionEnvironment(env.APP_ENVIRONMENT);

  return pinoHttp<Request, Response>({
    level: production ? "info" : "debug",
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie"],
      censor: "[REDACTED]",
    },
    customAttributeKeys: {
      req: "request",
      res: "response",
      err: "error",
      responseTime: "durationMs",
    },
    autoLogging: {
      ignore: (req) => req.url?.startsWith("/health") ?? false,
    },
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) {
        return "error";
      }
      if (res.statusCode >= 400) {
        return "warn";
      }
      return production ? "info" : "debug";
    },
    customProps: (req, res) => {
      const context = RequestContext.get();
      return {
        env: env.APP_ENVIRONMENT,
        service: SERVICE_NAME,
        requestId: context?.requestId,
        traceId: context?.traceId,
        spanId: context?.spanId,
        route: resolveRouteLabel(req),
        statusCode: res.statusCode,
      };
    },
  });
}
