import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { AppModule } from "./app.module.js";
import { ApiErrorFilter } from "./common/api-error.filter.js";
import { ConfigService } from "./config/index.js";

async function bootstrap(): Promise<void> {
  const config = new ConfigService();
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: config.get("logLevels"),
  });
  app.useBodyParser("json", { limit: "10mb" });
  app.enableCors({
    origin: config.get("corsOrigins"),
    credentials: true,
    exposedHeaders: ["X-Request-ID", "X-Session-ID"],
  });
  app.useGlobalFilters(new ApiErrorFilter());
  app.enableShutdownHooks();

  const port = config.get("port");
  await app.listen(port);
  Logger.log(`Responses relay running on http://localhost:${String(port)}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error), "Bootstrap");
  process.exit(1);
});
