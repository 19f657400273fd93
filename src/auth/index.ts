/**
 * Authentication Service.
 *
 * Email/password, anonymous and identity-provider sign-in plus account
 * management over the Identity Toolkit REST API. Auth calls are retried at
 * most once.
 */

import { z } from "zod";
import { AuthError, ValidationError } from "../errors/index.js";
import { defaultConfigResolver, type ConfigResolver } from "../config/index.js";
import type { Connection, ServiceContext } from "../connection/index.js";
import { AuthResponseSchema, FirebaseToken, requestTokenRefresh, type AuthResponse } from "../credentials/token.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { NO_CREDENTIAL, type FirebaseHttpClient } from "../transport/http-client.js";
import { isValidEmail } from "../utils/paths.js";

const AUTH_MAX_RETRIES = 1;

const UserInfoSchema = z
  .object({
    localId: z.string(),
    email: z.string().optional(),
    emailVerified: z.boolean().optional(),
    displayName: z.string().optional(),
    photoUrl: z.string().optional(),
    disabled: z.boolean().optional(),
    createdAt: z.string().optional(),
    lastLoginAt: z.string().optional(),
  })
  .passthrough();

export type UserInfo = z.infer<typeof UserInfoSchema>;

const LookupResponseSchema = z.object({ users: z.array(UserInfoSchema).optional() }).passthrough();

const SendOobCodeResponseSchema = z.object({ email: z.string().optional() }).passthrough();

const UpdateProfileResponseSchema = z
  .object({
    localId: z.string().optional(),
    email: z.string().optional(),
    displayName: z.string().optional(),
    photoUrl: z.string().optional(),
  })
  .passthrough();

export type UpdateProfileResponse = z.infer<typeof UpdateProfileResponseSchema>;

const IdpResponseSchema = AuthResponseSchema.extend({
  providerId: z.string().optional(),
  federatedId: z.string().optional(),
  oauthAccessToken: z.string().optional(),
  oauthIdToken: z.string().optional(),
  rawUserInfo: z.string().optional(),
});

export type IdpSignInResponse = z.infer<typeof IdpResponseSchema>;

export interface RefreshedToken {
  idToken: string;
  refreshToken: string;
  expiresIn: number;
  userId?: string;
}

export interface ProfileUpdate {
  displayName?: string;
  photoUrl?: string;
}

/**
 * Authentication Service.
 *
 * @example
 * ```typescript
 * const auth = new AuthService({ connection, http });
 * const session = await auth.signIn("ada@example.com", "test-password");
 * const authed = setToken(connection, session);
 * ```
 */
export class AuthService {
  private readonly connection: Connection;
  private readonly http: FirebaseHttpClient;
  private readonly logger: Logger;
  private readonly resolver: ConfigResolver;

  constructor(context: ServiceContext) {
    this.connection = context.connection;
    this.http = context.http;
    this.logger = (context.logger ?? new NoopLogger()).child({ service: "auth" });
    this.resolver = context.resolver ?? defaultConfigResolver;
  }

  async signIn(email: string, password: string): Promise<AuthResponse> {
    requireEmail(email);
    requirePassword(password);
    const response = await this.call("accounts:signInWithPassword", { email, password, returnSecureToken: true }, AuthResponseSchema);
    this.logger.info("Signed in with email and password", { localId: response.localId });
    return response;
  }

  async signInAnonymously(): Promise<AuthResponse> {
    return this.call("accounts:signUp", { returnSecureToken: true }, AuthResponseSchema);
  }

  async createUser(email: string, password: string): Promise<AuthResponse> {
    requireEmail(email);
    requirePassword(password);
    const response = await this.call("accounts:signUp", { email, password, returnSecureToken: true }, AuthResponseSchema);
    this.logger.info("Created user", { localId: response.localId });
    return response;
  }

  /**
   * Sends a password-reset email. An unknown address yields `null` and a
   * warning instead of an error.
   */
  async sendPasswordReset(email: string): Promise<{ email?: string } | null> {
    requireEmail(email);
    try {
      return await this.call("accounts:sendOobCode", { requestType: "PASSWORD_RESET", email }, SendOobCodeResponseSchema);
    } catch (error) {
      if (error instanceof AuthError && error.code === "EMAIL_NOT_FOUND") {
        this.logger.warn(`No account exists for ${email}`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Exchanges a refresh token for a new ID token.
   */
  async refreshIdToken(refreshToken: string): Promise<RefreshedToken> {
    if (refreshToken === "") {
      throw new ValidationError("refreshToken is required", { field: "refreshToken" });
    }
    const response = await requestTokenRefresh(this.http, refreshToken, this.apiKey(), this.connection.endpoints.token);
    return {
      idToken: response.id_token,
      refreshToken: response.refresh_token,
      expiresIn: response.expires_in,
      userId: response.user_id,
    };
  }

  /**
   * Account details of the signed-in user.
   */
  async getUser(idToken?: string): Promise<UserInfo | null> {
    const response = await this.call("accounts:lookup", { idToken: await this.idToken(idToken) }, LookupResponseSchema);
    return response.users?.[0] ?? null;
  }

  async updateProfile(update: ProfileUpdate, idToken?: string): Promise<UpdateProfileResponse> {
    return this.call(
      "accounts:update",
      {
        idToken: await this.idToken(idToken),
        displayName: update.displayName,
        photoUrl: update.photoUrl,
        returnSecureToken: true,
      },
      UpdateProfileResponseSchema
    );
  }

  async deleteUser(idToken?: string): Promise<true> {
    await this.call("accounts:delete", { idToken: await this.idToken(idToken) }, z.unknown());
    this.logger.info("Deleted user account");
    return true;
  }

  /**
   * Signs in with a credential from an identity provider, e.g.
   * `postBody = "id_token=<google id token>&providerId=google.com"`.
   */
  async signInWithIdp(requestUri: string, postBody: string, returnIdpCredential = true): Promise<IdpSignInResponse> {
    if (requestUri === "" || postBody === "") {
      throw new ValidationError("requestUri and postBody are required", { field: "postBody" });
    }
    return this.call(
      "accounts:signInWithIdp",
      { requestUri, postBody, returnSecureToken: true, returnIdpCredential },
      IdpResponseSchema
    );
  }

  private async call<T>(endpoint: string, body: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return this.http.requestAs(
      {
        method: "POST",
        url: `${this.connection.endpoints.auth}/${endpoint}`,
        query: { key: this.apiKey() },
        body,
        maxRetries: AUTH_MAX_RETRIES,
      },
      schema
    );
  }

  private apiKey(): string {
    const apiKey = this.resolver.resolve("api_key", this.connection.apiKey);
    if (apiKey === undefined) {
      throw new ValidationError("An API key is required for authentication calls. Set FIREBASE_API_KEY", {
        field: "apiKey",
      });
    }
    return apiKey;
  }

  private async idToken(explicit: string | undefined): Promise<string> {
    if (explicit !== undefined && explicit !== "") {
      return explicit;
    }
    const token = this.connection.token;
    if (token instanceof FirebaseToken) {
      return token.getToken({ http: this.http, tokenUrl: this.connection.endpoints.token, apiKey: this.apiKey() });
    }
    if (typeof token === "string" && token !== "" && token !== NO_CREDENTIAL) {
      return token;
    }
    throw new AuthError("This operation requires a signed-in user", { code: "AUTH_REQUIRED" });
  }
}

function requireEmail(email: string): void {
  if (email === "") {
    throw new ValidationError("Email is required", { field: "email" });
  }
  if (!isValidEmail(email)) {
    throw new ValidationError(`Invalid email address: ${email}`, { field: "email" });
  }
}

function requirePassword(password: string): void {
  if (password === "") {
    throw new ValidationError("Password is required", { field: "password" });
  }
}
