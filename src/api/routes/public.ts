import type { FastifyInstance } from "fastify";

export function registerPublicRoutes(app: FastifyInstance): void {
  app.get("/health", async () => ({
    status: "ok",
    service: "assetline",
    timestamp: new Date().toISOString()
  }));
}
