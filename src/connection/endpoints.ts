/**
 * Base URLs of the services this package talks to.
 */

export interface ServiceEndpoints {
  /** Identity Toolkit (`<auth>/accounts:signUp?key=...`) */
  auth: string;
  /** Secure Token refresh endpoint */
  token: string;
  /** Firestore REST root (`<firestore>/projects/<id>/databases/<db>/documents`) */
  firestore: string;
  /** Cloud Storage JSON API (`<storage>/b/<bucket>/o`) */
  storage: string;
  /** Cloud Storage media upload */
  storageUpload: string;
  /** Firebase Storage download host used for tokenized URLs */
  storageDownload: string;
  /** Browser-facing object URLs */
  storagePublic: string;
  dynamicLinks: string;
  /** OAuth2 token endpoint for service-account assertions */
  oauthToken: string;
}

export const DEFAULT_ENDPOINTS: Readonly<ServiceEndpoints> = Object.freeze({
  auth: "https://identitytoolkit.googleapis.com/v1",
  token: "https://securetoken.googleapis.com/v1/token",
  firestore: "https://firestore.googleapis.com/v1",
  storage: "https://storage.googleapis.com/storage/v1",
  storageUpload: "https://storage.googleapis.com/upload/storage/v1",
  storageDownload: "https://firebasestorage.googleapis.com/v0",
  storagePublic: "https://storage.cloud.google.com",
  dynamicLinks: "https://firebasedynamiclinks.googleapis.com/v1",
  oauthToken: "https://oauth2.googleapis.com/token",
});

/**
 * Default endpoints with the given overrides applied. Trailing slashes are dropped.
 */
export function resolveEndpoints(overrides: Partial<ServiceEndpoints> = {}): Readonly<ServiceEndpoints> {
  const merged: ServiceEndpoints = { ...DEFAULT_ENDPOINTS };
  for (const key of Object.keys(DEFAULT_ENDPOINTS)) {
    if (isEndpointKey(key)) {
      const value = overrides[key];
      if (value !== undefined && value !== "") {
        merged[key] = stripTrailingSlash(value);
      }
    }
  }
  return Object.freeze(merged);
}

function isEndpointKey(key: string): key is keyof ServiceEndpoints {
  return Object.prototype.hasOwnProperty.call(DEFAULT_ENDPOINTS, key);
}

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Realtime Database URL derived from a project id.
 */
export function defaultDatabaseUrl(projectId: string): string {
  return `https://${projectId}-default-rtdb.firebaseio.com`;
}

/**
 * Storage bucket derived from a project id.
 */
export function defaultStorageBucket(projectId: string): string {
  return `${projectId}.appspot.com`;
}
