import type { FastifyBaseLogger, FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";
import { createId } from "../lib/id.js";
import { DomainError } from "../core/errors.js";
import type { PlatformContext } from "../core/services/platform-context.js";
import type { UserProfile } from "../core/types/domain.js";

export function requestIdFromHeaders(headers: Record<string, unknown>): string {
  const header = headers["x-request-id"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].trim().length > 0) {
    return header[0];
  }
  return createId("req");
}

export function authHeaderFromHeaders(headers: Record<string, unknown>): string | undefined {
  const header = headers.authorization;
  if (typeof header === "string") {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string") {
    return header[0];
  }
  return undefined;
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string
  ) {
    super(message);
  }
}

/** Resolves the bearer token to the acting directory profile. */
export async function authenticate(context: PlatformContext, headers: Record<string, unknown>): Promise<UserProfile> {
  let subject: string;
  try {
    subject = context.authService.authenticate(authHeaderFromHeaders(headers)).subject;
  } catch (error) {
    throw new HttpError(401, "unauthorized", error instanceof Error ? error.message : "Unauthorized.");
  }

  const actor = await context.identityProvider.resolve(subject);
  if (!actor) {
    throw new HttpError(401, "unknown_subject", "Token subject is not an active user.");
  }
  return actor;
}

export function handleError(
  error: unknown,
  reply: { status: (code: number) => { send: (body: unknown) => unknown } },
  requestId?: string,
  log?: Pick<FastifyBaseLogger, "error">
) {
  const errorBody = (body: Record<string, unknown>) =>
    requestId
      ? {
          ...body,
          requestId
        }
      : body;

  if (error instanceof ZodError) {
    return reply.status(400).send({
      error: errorBody({
        code: "validation_error",
        message: "Invalid request payload.",
        details: error.issues
      })
    });
  }

  if (error instanceof HttpError) {
    return reply.status(error.statusCode).send({
      error: errorBody({
        code: error.errorCode,
        message: error.message
      })
    });
  }

  if (error instanceof DomainError) {
    return reply.status(error.statusCode).send({
      error: errorBody({
        code: error.code,
        message: error.message
      })
    });
  }

  if (error instanceof Error && "statusCode" in error) {
    const maybeStatus = error.statusCode;
    if (typeof maybeStatus === "number" && Number.isFinite(maybeStatus) && maybeStatus >= 400 && maybeStatus <= 499) {
      return reply.status(maybeStatus).send({
        error: errorBody({
          code: "request_error",
          message: error.message
        })
      });
    }
  }

  log?.error({ err: error, requestId }, "Unhandled error.");
  return reply.status(500).send({
    error: errorBody({
      code: "internal_error",
      message: "Unexpected error."
    })
  });
}

export function replyWithError(request: FastifyRequest, reply: FastifyReply, error: unknown) {
  return handleError(error, reply, requestIdFromHeaders(request.headers), request.log);
}
