/**
 * Tests for service-account credentials.
 */

import { generateKeyPairSync } from "node:crypto";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as jose from "jose";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { AuthError, ValidationError } from "../errors/index.js";
import {
  DEFAULT_SCOPES,
  parseServiceAccountKey,
  ServiceAccountCredentials,
  type ServiceAccountKeyFile,
} from "../credentials/service-account.js";
import { MockTransport, urlPath } from "../simulation/mock-transport.js";
import { FirebaseHttpClient } from "../transport/http-client.js";
import { isolatedResolver } from "./helpers.js";

const CLIENT_EMAIL = "robot@demo-project.iam.gserviceaccount.com";
const T0 = new Date("2024-01-01T00:00:00Z");

let privateKeyPem: string;
let publicKeyPem: string;
let keyFile: ServiceAccountKeyFile;
let dir: string;

beforeAll(() => {
  const pair = generateKeyPairSync("rsa", {
    modulusLength: 2048,
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
  });
  privateKeyPem = pair.privateKey;
  publicKeyPem = pair.publicKey;
  keyFile = {
    type: "service_account",
    project_id: "demo-project",
    private_key_id: "key-1",
    private_key: privateKeyPem,
    client_email: CLIENT_EMAIL,
  };
  dir = mkdtempSync(join(tmpdir(), "firekit-sa-"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseServiceAccountKey", () => {
  it("should map the key file and default the token URI", () => {
    const key = parseServiceAccountKey(keyFile);
    expect(key.projectId).toBe("demo-project");
    expect(key.privateKeyId).toBe("key-1");
    expect(key.clientEmail).toBe(CLIENT_EMAIL);
    expect(key.tokenUri).toBe("https://oauth2.googleapis.com/token");
  });

  it("should reject a key without a private key", () => {
    expect(() => parseServiceAccountKey({ client_email: CLIENT_EMAIL })).toThrow(ValidationError);
  });

  it("should reject a malformed client email", () => {
    expect(() => parseServiceAccountKey({ private_key: "test-key", client_email: "robot" })).toThrow(
      "Invalid service account key: client_email must be an email address"
    );
  });
});

describe("ServiceAccountCredentials", () => {
  let clock: Date;
  let transport: MockTransport;
  let http: FirebaseHttpClient;

  beforeEach(() => {
    clock = T0;
    transport = new MockTransport();
    http = new FirebaseHttpClient({ transport, sleep: async () => {}, random: () => 0 });
  });

  function credentials(): ServiceAccountCredentials {
    return ServiceAccountCredentials.fromJson(keyFile, { now: () => clock });
  }

  describe("createAssertion", () => {
    it("should sign an RS256 assertion for the token endpoint", async () => {
      const assertion = await credentials().createAssertion();

      const header = jose.decodeProtectedHeader(assertion);
      expect(header).toEqual({ alg: "RS256", typ: "JWT", kid: "key-1" });

      const publicKey = await jose.importSPKI(publicKeyPem, "RS256");
      const { payload } = await jose.jwtVerify(assertion, publicKey, { currentDate: T0 });
      const issuedAt = Math.floor(T0.getTime() / 1000);
      expect(payload).toEqual({
        scope: DEFAULT_SCOPES.join(" "),
        iss: CLIENT_EMAIL,
        sub: CLIENT_EMAIL,
        aud: "https://oauth2.googleapis.com/token",
        iat: issuedAt,
        exp: issuedAt + 3600,
      });
    });

    it("should carry custom scopes", async () => {
      const assertion = await credentials().createAssertion(["https://www.googleapis.com/auth/datastore"]);
      expect(jose.decodeJwt(assertion)["scope"]).toBe("https://www.googleapis.com/auth/datastore");
    });

    it("should fail with AuthError for an unusable key", async () => {
      const broken = ServiceAccountCredentials.fromJson({ private_key: "test-key", client_email: CLIENT_EMAIL });
      const error = await broken.createAssertion().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.code).toBe("INVALID_PRIVATE_KEY");
    });
  });

  describe("getAccessToken", () => {
    it("should exchange the assertion and cache the result", async () => {
      transport.replyJson({ access_token: "access-1", expires_in: 3600, token_type: "Bearer" });
      const creds = credentials();

      await expect(creds.getAccessToken(http)).resolves.toBe("access-1");
      await expect(creds.getAccessToken(http)).resolves.toBe("access-1");

      expect(transport.requests).toHaveLength(1);
      const request = transport.lastRequest();
      expect(urlPath(request)).toBe("https://oauth2.googleapis.com/token");
      const form = new URLSearchParams(typeof request.body === "string" ? request.body : "");
      expect(form.get("grant_type")).toBe("urn:ietf:params:oauth:grant-type:jwt-bearer");
      expect(jose.decodeJwt(form.get("assertion") ?? "").iss).toBe(CLIENT_EMAIL);
    });

    it("should reuse the cached token until a minute before expiry", async () => {
      transport
        .replyJson({ access_token: "access-1", expires_in: 3600 })
        .replyJson({ access_token: "access-2", expires_in: 3600 });
      const creds = credentials();
      await creds.getAccessToken(http);

      clock = new Date(T0.getTime() + 3539 * 1000);
      expect(creds.hasValidToken()).toBe(true);
      await expect(creds.getAccessToken(http)).resolves.toBe("access-1");

      clock = new Date(T0.getTime() + 3540 * 1000);
      expect(creds.hasValidToken()).toBe(false);
      await expect(creds.getAccessToken(http)).resolves.toBe("access-2");
      expect(transport.requests).toHaveLength(2);
    });

    it("should not reuse a token minted for other scopes", async () => {
      transport
        .replyJson({ access_token: "access-1", expires_in: 3600 })
        .replyJson({ access_token: "access-2", expires_in: 3600 });
      const creds = credentials();

      await creds.getAccessToken(http);
      await expect(creds.getAccessToken(http, ["https://www.googleapis.com/auth/datastore"])).resolves.toBe(
        "access-2"
      );
      expect(creds.hasValidToken()).toBe(false);
    });
  });

  describe("loading", () => {
    it("should parse inline JSON", () => {
      expect(ServiceAccountCredentials.fromJson(JSON.stringify(keyFile)).clientEmail).toBe(CLIENT_EMAIL);
    });

    it("should reject JSON it cannot parse", () => {
      expect(() => ServiceAccountCredentials.fromJson("{ nope")).toThrow(
        "Service account JSON could not be parsed"
      );
    });

    it("should read a key file", async () => {
      const path = join(dir, "service-account.json");
      writeFileSync(path, JSON.stringify(keyFile), "utf-8");
      const creds = await ServiceAccountCredentials.fromFile(path);
      expect(creds.projectId).toBe("demo-project");
    });

    it("should reject a missing key file", async () => {
      await expect(ServiceAccountCredentials.fromFile(join(dir, "missing.json"))).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it("should fall back to the configured path and then inline JSON", async () => {
      const path = join(dir, "from-env.json");
      writeFileSync(path, JSON.stringify({ ...keyFile, project_id: "path-project" }), "utf-8");

      const fromPath = await ServiceAccountCredentials.load({
        resolver: isolatedResolver({ GOOGLE_APPLICATION_CREDENTIALS: path }),
      });
      expect(fromPath.projectId).toBe("path-project");

      const fromJson = await ServiceAccountCredentials.load({
        resolver: isolatedResolver({
          FIREBASE_SERVICE_ACCOUNT_JSON: JSON.stringify({ ...keyFile, project_id: "inline-project" }),
        }),
      });
      expect(fromJson.projectId).toBe("inline-project");
    });

    it("should fail when nothing is configured", async () => {
      await expect(ServiceAccountCredentials.load({ resolver: isolatedResolver() })).rejects.toThrow(
        "No service account configured. Set GOOGLE_APPLICATION_CREDENTIALS or FIREBASE_SERVICE_ACCOUNT_JSON"
      );
    });
  });
});
