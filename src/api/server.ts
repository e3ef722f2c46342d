import Fastify from "fastify";
import { createPlatformContext, type PlatformContext } from "../core/services/platform-context.js";
import { replyWithError, requestIdFromHeaders } from "./http.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerAssetRoutes } from "./routes/assets.js";
import { registerChangeRoutes } from "./routes/changes.js";
import { registerHistoryRoutes } from "./routes/history.js";
import { registerLineRoutes } from "./routes/lines.js";
import { registerOffboardingRoutes } from "./routes/offboarding.js";
import { registerPublicRoutes } from "./routes/public.js";
import { registerRequestRoutes } from "./routes/requests.js";
import { registerReturnRoutes } from "./routes/returns.js";
import { registerVerificationRoutes } from "./routes/verifications.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function logLevelFromEnv(): LogLevel {
  const configured = (process.env.ASSETLINE_LOG_LEVEL ?? "info").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === configured) ?? "info";
}

export function buildServer(context = createPlatformContext()) {
  const bodyLimitBytes = Number.parseInt(process.env.ASSETLINE_BODY_LIMIT_BYTES ?? "1048576", 10);
  const logLevel = logLevelFromEnv();

  const app = Fastify({
    logger: logLevel === "silent" ? false : { level: logLevel },
    bodyLimit: bodyLimitBytes
  });

  // Security response headers
  app.addHook("onRequest", async (request, reply) => {
    const requestId = requestIdFromHeaders(request.headers);
    request.headers["x-request-id"] = requestId;
    reply.header("x-request-id", requestId);
    reply.header("x-content-type-options", "nosniff");
    reply.header("x-frame-options", "DENY");
    reply.header("cache-control", "no-store");
  });

  app.addHook("onClose", async () => {
    await context.notificationService.flush();
    await context.store.close?.();
  });

  registerPublicRoutes(app);
  registerAdminRoutes(app, context);
  registerAssetRoutes(app, context);
  registerRequestRoutes(app, context);
  registerReturnRoutes(app, context);
  registerChangeRoutes(app, context);
  registerOffboardingRoutes(app, context);
  registerLineRoutes(app, context);
  registerHistoryRoutes(app, context);
  registerVerificationRoutes(app, context);

  app.setErrorHandler((error, request, reply) => replyWithError(request, reply, error));

  return app;
}

export type { PlatformContext };
