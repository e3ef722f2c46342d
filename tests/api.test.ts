import { describe, expect, it } from "vitest";
import { buildServer } from "../src/api/server.js";
import { DEV_ADMIN_SUBJECT } from "../src/core/services/auth-service.js";
import { cleanup, makeContext, seedAgency } from "./support.js";

const tokens = [
  { token: "test-root-token", subject: "root" },
  { token: "test-staff-token", subject: "staff_1" },
  { token: "test-ict-token", subject: "ict_1" },
  { token: "test-head-token", subject: "head_1" },
  { token: "test-ghost-token", subject: "nobody_here" }
];

const as = (token: string) => ({ authorization: `Bearer ${token}` });

function createTestServer() {
  const { ctx, sink, baseDir } = makeContext({ authOptions: { rawConfig: JSON.stringify(tokens) } });
  const app = buildServer(ctx);
  return { app, ctx, sink, baseDir };
}

describe("HTTP API", () => {
  it("serves health without auth and sets security headers", async () => {
    const { app, baseDir } = createTestServer();
    try {
      const response = await app.inject({ method: "GET", url: "/health", headers: { "x-request-id": "req-health" } });
      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok", service: "assetline" });
      expect(response.headers["x-request-id"]).toBe("req-health");
      expect(response.headers["x-content-type-options"]).toBe("nosniff");
      expect(response.headers["x-frame-options"]).toBe("DENY");
    } finally {
      await app.close();
      cleanup(baseDir);
    }
  });

  it("rejects missing tokens and tokens for unknown users", async () => {
    const { app, ctx, baseDir } = createTestServer();
    try {
      await seedAgency(ctx);
      const missing = await app.inject({ method: "GET", url: "/v1/me" });
      expect(missing.statusCode).toBe(401);
      expect(missing.json().error.code).toBe("unauthorized");

      const ghost = await app.inject({ method: "GET", url: "/v1/me", headers: as("test-ghost-token") });
      expect(ghost.statusCode).toBe(401);
      expect(ghost.json().error.code).toBe("unknown_subject");

      const me = await app.inject({ method: "GET", url: "/v1/me", headers: as("test-staff-token") });
      expect(me.statusCode).toBe(200);
      expect(me.json()).toMatchObject({ id: "staff_1", unitId: "unit_field" });
    } finally {
      await app.close();
      cleanup(baseDir);
    }
  });

  it("runs a request and return cycle over HTTP", async () => {
    const { app, ctx, baseDir } = createTestServer();
    try {
      const seed = await seedAgency(ctx);

      const registered = await app.inject({
        method: "POST",
        url: `/v1/agencies/${seed.agencyId}/assets`,
        headers: as("test-ict-token"),
        payload: { categoryId: seed.laptops.id, name: "Field laptop", unitId: seed.fieldUnit.id, assetTag: "A001" }
      });
      expect(registered.statusCode).toBe(201);
      const assetId: string = registered.json().id;

      const created = await app.inject({
        method: "POST",
        url: "/v1/requests",
        headers: as("test-staff-token"),
        payload: { categoryId: seed.laptops.id, justification: "Site visits" }
      });
      expect(created.statusCode).toBe(201);
      const requestId: string = created.json().id;

      const approved = await app.inject({
        method: "POST",
        url: `/v1/requests/${requestId}/approve`,
        headers: as("test-head-token")
      });
      expect(approved.json().status).toBe("pending_ict");

      const approvedAgain = await app.inject({
        method: "POST",
        url: `/v1/requests/${requestId}/approve`,
        headers: as("test-head-token")
      });
      expect(approvedAgain.statusCode).toBe(409);
      expect(approvedAgain.json().error.code).toBe("state_conflict");

      const assigned = await app.inject({
        method: "POST",
        url: `/v1/requests/${requestId}/assign`,
        headers: as("test-ict-token"),
        payload: { assetId }
      });
      expect(assigned.statusCode).toBe(200);
      expect(assigned.json().asset).toMatchObject({ status: "assigned", currentHolderId: "staff_1" });

      const lookedUp = await app.inject({
        method: "GET",
        url: `/v1/agencies/${seed.agencyId}/assets/lookup?ref=ASSET:MOF:A001`,
        headers: as("test-staff-token")
      });
      expect(lookedUp.json().id).toBe(assetId);

      const opened = await app.inject({
        method: "POST",
        url: "/v1/returns",
        headers: as("test-staff-token"),
        payload: { assetId, reason: "Done" }
      });
      expect(opened.statusCode).toBe(201);
      const duplicate = await app.inject({
        method: "POST",
        url: "/v1/returns",
        headers: as("test-staff-token"),
        payload: { assetId }
      });
      expect(duplicate.statusCode).toBe(409);

      const verified = await app.inject({
        method: "POST",
        url: `/v1/returns/${opened.json().id}/verify`,
        headers: as("test-ict-token"),
        payload: {}
      });
      expect(verified.json().asset).toMatchObject({ status: "available", currentHolderId: null });

      const chain = await app.inject({
        method: "GET",
        url: `/v1/agencies/${seed.agencyId}/history/verify`,
        headers: as("test-ict-token")
      });
      expect(chain.json()).toMatchObject({ isValid: true, checkedEntries: 6 });

      const forbidden = await app.inject({
        method: "GET",
        url: `/v1/agencies/${seed.agencyId}/history`,
        headers: as("test-staff-token")
      });
      expect(forbidden.statusCode).toBe(403);
    } finally {
      await app.close();
      cleanup(baseDir);
    }
  });

  it("answers 400 for payloads outside the schema", async () => {
    const { app, ctx, baseDir } = createTestServer();
    try {
      await seedAgency(ctx);
      const response = await app.inject({
        method: "POST",
        url: "/v1/changes",
        headers: as("test-ict-token"),
        payload: { assetId: "ast_1", changes: { currentHolderId: "staff_1" } }
      });
      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe("validation_error");

      const exit = await app.inject({
        method: "POST",
        url: "/v1/exits",
        headers: as("test-staff-token"),
        payload: { reason: "resigned", typedConfirmation: "yes" }
      });
      expect(exit.statusCode).toBe(400);
      expect(exit.json().error.message).toBe("You must type CONFIRM (in capital letters) to proceed.");
    } finally {
      await app.close();
      cleanup(baseDir);
    }
  });

  it("records and lists asset verifications", async () => {
    const { app, ctx, baseDir } = createTestServer();
    try {
      const seed = await seedAgency(ctx);
      const asset = await ctx.assetRegistryService.register(seed.custodian, {
        agencyId: seed.agencyId,
        categoryId: seed.laptops.id,
        name: "Field laptop",
        unitId: seed.fieldUnit.id,
        assetTag: "A001"
      });

      const recorded = await app.inject({
        method: "POST",
        url: `/v1/agencies/${seed.agencyId}/verifications`,
        headers: as("test-head-token"),
        payload: { reference: "a001", location: "Field office" }
      });
      expect(recorded.statusCode).toBe(201);
      expect(recorded.json()).toMatchObject({ assetId: asset.id, method: "manual", tagEntered: "a001" });

      const refused = await app.inject({
        method: "POST",
        url: `/v1/agencies/${seed.agencyId}/verifications`,
        headers: as("test-staff-token"),
        payload: { reference: "A001" }
      });
      expect(refused.statusCode).toBe(403);

      const listed = await app.inject({
        method: "GET",
        url: `/v1/agencies/${seed.agencyId}/verifications?tag=A00`,
        headers: as("test-ict-token")
      });
      expect(listed.json().items.map((item: { assetId: string }) => item.assetId)).toEqual([asset.id]);
    } finally {
      await app.close();
      cleanup(baseDir);
    }
  });

  it("accepts the dev token once its superuser is provisioned", async () => {
    const { ctx, baseDir } = makeContext();
    const app = buildServer(ctx);
    try {
      const before = await app.inject({ method: "GET", url: "/v1/me", headers: as("dev_admin_token") });
      expect(before.statusCode).toBe(401);

      await ctx.organizationService.bootstrap({
        agencyCode: "DEV",
        agencyName: "Development Agency",
        superuserId: DEV_ADMIN_SUBJECT,
        displayName: "Development Admin"
      });
      const after = await app.inject({ method: "GET", url: "/v1/me", headers: as("dev_admin_token") });
      expect(after.statusCode).toBe(200);
      expect(after.json()).toMatchObject({ id: DEV_ADMIN_SUBJECT, isSuperuser: true });

      const agencies = await app.inject({ method: "GET", url: "/v1/agencies", headers: as("dev_admin_token") });
      expect(agencies.json().items.map((agency: { code: string }) => agency.code)).toEqual(["DEV"]);
    } finally {
      await app.close();
      cleanup(baseDir);
    }
  });
});
