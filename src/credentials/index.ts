/**
 * Credentials: user ID tokens and service-account access tokens.
 */

export * from "./token.js";
export * from "./service-account.js";
