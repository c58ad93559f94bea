import "reflect-metadata";
import "dotenv/config";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { requestContextMiddleware } from "./logging/request-context.middleware";
import { createHttpLogger } from "./logging/http-logger.middleware";
import { getApiEnv } from "./common/env";
import { HttpErrorFilter } from "./common/http-exception.filter";
import { ResponseInterceptor } from "./common/response.interceptor";

async function bootstrap() {
  const env = getApiEnv();
  const app = await NestFactory.create(AppModule);

  app.use(requestContextMiddleware);
  app.use(createHttpLogger(env));
  app.useGlobalFilters(new HttpErrorFilter());
  app.useGlobalInterceptors(new ResponseInterceptor());
  app.enableCors({
    origin: env.API_CORS_ORIGIN,
    credentials: true,
  });
  app.enableShutdownHooks();

  await app.listen(env.API_PORT);
  Logger.log(`billing api listening on port ${env.API_PORT}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error("API failed to start", error instanceof Error ? error.stack : String(error), "Bootstrap");
  process.exit(1);
});
