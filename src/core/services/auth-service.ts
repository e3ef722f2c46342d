import { z } from "zod";
import type { ApiTokenRecord, TokenClaims } from "../types/auth.js";

interface TokenRecord extends ApiTokenRecord {
  tokenId: string;
  tokenType: TokenClaims["tokenType"];
}

export interface AuthServiceOptions {
  rawConfig?: string | undefined;
}

const configuredTokensSchema = z
  .array(
    z.object({
      token: z.string().min(8),
      subject: z.string().min(1)
    })
  )
  .min(1);

export const DEV_ADMIN_SUBJECT = "admin_user";

const defaultTokens: TokenRecord[] = [
  {
    token: "dev_admin_token",
    tokenId: "tok_dev_admin",
    subject: DEV_ADMIN_SUBJECT,
    tokenType: "dev"
  }
];

function isTruthy(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

export function devTokensDisabled(): boolean {
  if (process.env.NODE_ENV === "production" && !isTruthy(process.env.ASSETLINE_ALLOW_DEV_TOKENS_IN_PRODUCTION)) {
    return true;
  }
  return isTruthy(process.env.ASSETLINE_DISABLE_DEV_TOKENS);
}

function parseConfiguredTokens(raw: string | undefined): TokenRecord[] {
  if (raw) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(
        `ASSETLINE_API_TOKENS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return configuredTokensSchema.parse(parsed).map((entry, index) => ({
      token: entry.token,
      subject: entry.subject,
      tokenId: `tok_static_${index + 1}`,
      tokenType: "static"
    }));
  }

  if (devTokensDisabled()) {
    return [];
  }
  if (process.env.NODE_ENV === "production") {
    console.warn(
      "[SECURITY WARNING] Dev tokens are active in production. Set ASSETLINE_DISABLE_DEV_TOKENS=true or provide ASSETLINE_API_TOKENS."
    );
  }
  return defaultTokens;
}

/** Maps bearer tokens to directory subjects. Who the subject is, and what they may do, is decided downstream. */
export class AuthService {
  private readonly tokens: TokenRecord[];

  constructor(options?: AuthServiceOptions) {
    this.tokens = parseConfiguredTokens(options?.rawConfig ?? process.env.ASSETLINE_API_TOKENS);
  }

  authenticate(authorizationHeader: string | undefined): TokenClaims {
    if (!authorizationHeader) {
      throw new Error("Missing Authorization header.");
    }

    const [scheme, value] = authorizationHeader.split(" ");
    if (!scheme || !value || scheme.toLowerCase() !== "bearer") {
      throw new Error("Authorization must use Bearer token.");
    }

    const match = this.tokens.find((token) => token.token === value);
    if (!match) {
      throw new Error("Invalid API token.");
    }
    return {
      tokenId: match.tokenId,
      subject: match.subject,
      tokenType: match.tokenType
    };
  }
}
