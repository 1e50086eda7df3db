import "reflect-metadata";
import * as Sentry from "@sentry/node";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import { AppModule } from "./app.module";
import { getOrderServiceEnv } from "./config/env";

function initSentry(dsn?: string): void {
  if (!dsn) return;
  Sentry.init({
    dsn,
    environment: process.env.APP_ENV || process.env.NODE_ENV || "local",
    tracesSampleRate: 0.2,
    release: process.env.RELEASE_SHA || "local",
    serverName: "order-service",
  });
}

async function bootstrap(): Promise<void> {
  const env = getOrderServiceEnv();
  initSentry(env.sentryDsn);
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: true }),
  );

  app.enableCors({ origin: true, credentials: true });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true, forbidNonWhitelisted: true }));
  app.enableShutdownHooks();
  await app.listen(env.port, "0.0.0.0");
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
