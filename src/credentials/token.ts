/**
 * User ID tokens issued by Firebase Authentication.
 */

import { z } from "zod";
import { AuthError } from "../errors/index.js";
import { DEFAULT_ENDPOINTS } from "../connection/endpoints.js";
import type { FirebaseHttpClient } from "../transport/http-client.js";

/** Lifetime assumed when a response does not state one. */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

/** A token is refreshed once less than this much lifetime remains. */
export const TOKEN_SAFETY_MARGIN_SECONDS = 300;

const numericString = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

/**
 * Identity Toolkit sign-in / sign-up response.
 */
export const AuthResponseSchema = z
  .object({
    idToken: z.string().min(1),
    refreshToken: z.string().optional(),
    localId: z.string().optional(),
    email: z.string().optional(),
    displayName: z.string().optional(),
    registered: z.boolean().optional(),
    expiresIn: numericString.optional(),
  })
  .passthrough();

export type AuthResponse = z.infer<typeof AuthResponseSchema>;

/**
 * Secure Token refresh response.
 */
export const RefreshTokenResponseSchema = z
  .object({
    id_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_in: numericString,
    user_id: z.string().optional(),
    project_id: z.string().optional(),
  })
  .passthrough();

export type RefreshTokenResponse = z.infer<typeof RefreshTokenResponseSchema>;

export interface FirebaseTokenInit {
  idToken: string;
  refreshToken?: string;
  localId?: string;
  email?: string;
  apiKey?: string;
  issuedAt?: Date;
  lifetimeSeconds?: number;
}

interface TokenState {
  idToken: string;
  refreshToken?: string;
  localId?: string;
  email?: string;
  issuedAt: Date;
  lifetimeSeconds: number;
}

/**
 * What a token needs to mint its replacement.
 */
export interface TokenRefreshContext {
  http: FirebaseHttpClient;
  /** Defaults to the Secure Token endpoint */
  tokenUrl?: string;
  /** Used when the token carries no API key of its own */
  apiKey?: string;
  now?: () => Date;
}

/**
 * A user ID token with the refresh token needed to renew it.
 * Its fields change only through {@link FirebaseToken.refresh}.
 */
export class FirebaseToken {
  private state: TokenState;
  readonly apiKey?: string;

  constructor(init: FirebaseTokenInit) {
    this.state = {
      idToken: init.idToken,
      refreshToken: init.refreshToken,
      localId: init.localId,
      email: init.email,
      issuedAt: init.issuedAt ?? new Date(),
      lifetimeSeconds: init.lifetimeSeconds ?? DEFAULT_TOKEN_LIFETIME_SECONDS,
    };
    this.apiKey = init.apiKey;
  }

  get idToken(): string {
    return this.state.idToken;
  }

  get refreshToken(): string | undefined {
    return this.state.refreshToken;
  }

  get localId(): string | undefined {
    return this.state.localId;
  }

  get email(): string | undefined {
    return this.state.email;
  }

  get issuedAt(): Date {
    return this.state.issuedAt;
  }

  get lifetimeSeconds(): number {
    return this.state.lifetimeSeconds;
  }

  get expiresAt(): Date {
    return new Date(this.state.issuedAt.getTime() + this.state.lifetimeSeconds * 1000);
  }

  /**
   * True once no more than `bufferSeconds` of lifetime remain.
   */
  isExpired(bufferSeconds: number = TOKEN_SAFETY_MARGIN_SECONDS, now: Date = new Date()): boolean {
    return now.getTime() >= this.expiresAt.getTime() - bufferSeconds * 1000;
  }

  /**
   * Exchanges the refresh token for a new ID token when the current one is
   * inside the safety margin, or always with `force`.
   *
   * @throws {AuthError} If the token cannot be refreshed
   */
  async refresh(context: TokenRefreshContext, options: { force?: boolean } = {}): Promise<this> {
    const now = context.now ?? (() => new Date());
    if (!options.force && !this.isExpired(TOKEN_SAFETY_MARGIN_SECONDS, now())) {
      return this;
    }

    const refreshToken = this.state.refreshToken;
    if (refreshToken === undefined || refreshToken === "") {
      throw new AuthError("Token has expired and carries no refresh token", { code: "TOKEN_EXPIRED" });
    }
    const apiKey = this.apiKey ?? context.apiKey;
    if (apiKey === undefined || apiKey === "") {
      throw new AuthError("An API key is required to refresh the token", { code: "MISSING_API_KEY" });
    }

    const response = await requestTokenRefresh(context.http, refreshToken, apiKey, context.tokenUrl);
    this.state = {
      ...this.state,
      idToken: response.id_token,
      refreshToken: response.refresh_token,
      issuedAt: now(),
      lifetimeSeconds: response.expires_in,
    };
    return this;
  }

  /**
   * Returns an ID token with more than the safety margin of lifetime left.
   */
  async getToken(context: TokenRefreshContext): Promise<string> {
    await this.refresh(context);
    return this.state.idToken;
  }
}

/**
 * POSTs a refresh-token grant to the Secure Token endpoint.
 */
export async function requestTokenRefresh(
  http: FirebaseHttpClient,
  refreshToken: string,
  apiKey: string,
  tokenUrl: string = DEFAULT_ENDPOINTS.token
): Promise<RefreshTokenResponse> {
  return http.requestAs(
    {
      method: "POST",
      url: tokenUrl,
      query: { key: apiKey },
      body: { grant_type: "refresh_token", refresh_token: refreshToken },
      encode: "form",
      maxRetries: 1,
    },
    RefreshTokenResponseSchema
  );
}

/**
 * Builds a {@link FirebaseToken} from a sign-in response.
 *
 * @throws {AuthError} If the response carries no ID token
 */
export function createToken(authResponse: unknown, apiKey?: string, issuedAt: Date = new Date()): FirebaseToken {
  const parsed = AuthResponseSchema.safeParse(authResponse);
  if (!parsed.success) {
    throw new AuthError("Invalid authentication response: missing idToken", { code: "INVALID_AUTH_RESPONSE" });
  }
  const response = parsed.data;
  return new FirebaseToken({
    idToken: response.idToken,
    refreshToken: response.refreshToken,
    localId: response.localId,
    email: response.email,
    apiKey,
    issuedAt,
    lifetimeSeconds: response.expiresIn ?? DEFAULT_TOKEN_LIFETIME_SECONDS,
  });
}

/**
 * True for values shaped like a sign-in response.
 */
export function isAuthResponse(value: unknown): value is { idToken: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "idToken" in value &&
    typeof value.idToken === "string" &&
    value.idToken !== ""
  );
}
