import { buildServer } from "./api/server.js";
import { DEV_ADMIN_SUBJECT, devTokensDisabled } from "./core/services/auth-service.js";
import { createPlatformContext } from "./core/services/platform-context.js";

const port = Number.parseInt(process.env.PORT ?? "8080", 10);
const host = process.env.HOST ?? "0.0.0.0";

const context = createPlatformContext();
const app = buildServer(context);

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  console.log(`\n${signal} received. Shutting down gracefully...`);
  try {
    await app.close();
    console.log("Server closed. Goodbye.");
  } catch (error) {
    console.error("Error during shutdown:", error);
    process.exitCode = 1;
  }
}

// The dev token resolves to nobody until its subject exists.
async function provisionDevAdmin(): Promise<void> {
  if (process.env.ASSETLINE_API_TOKENS || devTokensDisabled()) {
    return;
  }
  const provisioned = await context.organizationService.bootstrap({
    agencyCode: "DEV",
    agencyName: "Development Agency",
    superuserId: DEV_ADMIN_SUBJECT,
    displayName: "Development Admin"
  });
  if (provisioned) {
    console.log(`Provisioned agency ${provisioned.agency.code} with superuser ${provisioned.superuser.id}.`);
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

provisionDevAdmin()
  .then(() => app.listen({ port, host }))
  .then(() => {
    console.log(`Assetline API listening on http://${host}:${port}`);
  })
  .catch((error: unknown) => {
    console.error("Failed to start Assetline API:", error);
    process.exitCode = 1;
  });
