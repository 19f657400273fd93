/**
 * Tests for the Realtime Database service.
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { AuthError, ValidationError } from "../errors/index.js";
import { RealtimeDatabaseService, toDatabaseValue } from "../database/index.js";
import { LogLevel } from "../observability/index.js";
import { jsonBody, queryParams, urlPath } from "../simulation/mock-transport.js";
import { Bytes } from "../types/index.js";
import { createHarness, DATABASE_URL, type Harness } from "./helpers.js";

async function setup(signedIn = true): Promise<Harness & { database: RealtimeDatabaseService }> {
  const harness = await createHarness({ projectId: "demo-project", token: signedIn ? "test-token" : undefined });
  return { ...harness, database: new RealtimeDatabaseService(harness) };
}

describe("RealtimeDatabaseService", () => {
  describe("get", () => {
    it("should read JSON with the credential in the auth parameter", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ name: "Ada" });

      await expect(database.get("users/ada")).resolves.toEqual({ name: "Ada" });
      expect(transport.lastRequest().url).toBe(`${DATABASE_URL}/users/ada.json?auth=test-token`);
    });

    it("should return null with a warning for an empty location", async () => {
      const { transport, database, logger } = await setup();
      transport.replyJson(null);

      await expect(database.get("/users/ghost/")).resolves.toBeNull();
      expect(logger.messages(LogLevel.Warn)).toEqual(["No data found at path: users/ghost"]);
    });

    it("should request shallow reads", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ ada: true, grace: true });

      await database.get("users", { shallow: true });

      expect(transport.lastRequest().url).toBe(`${DATABASE_URL}/users.json?shallow=true&auth=test-token`);
    });

    it("should omit the credential for public reads", async () => {
      const { transport, database } = await setup(false);
      transport.replyJson(1);

      await database.get("public/counter");

      expect(transport.lastRequest().url).toBe(`${DATABASE_URL}/public/counter.json`);
    });

    it("should surface permission failures", async () => {
      const { transport, database } = await setup();
      transport.reply({ status: 401, body: { error: "Permission denied" } });

      await expect(database.get("private")).rejects.toBeInstanceOf(AuthError);
    });
  });

  describe("writes", () => {
    it("should PUT data and return the cleaned path", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ name: "Ada" });

      await expect(database.set("/users/ada/", { name: "Ada" })).resolves.toBe("users/ada");

      const request = transport.lastRequest();
      expect(request.method).toBe("PUT");
      expect(urlPath(request)).toBe(`${DATABASE_URL}/users/ada.json`);
      expect(request.body).toBe('{"name":"Ada"}');
    });

    it("should push under a generated key", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ name: "-Nabc123" });

      await expect(database.push("messages", { text: "hello" })).resolves.toBe("messages/-Nabc123");
      expect(transport.lastRequest().method).toBe("POST");
    });

    it("should PATCH for update", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ age: 37 });

      await expect(database.update("users/ada", { age: 37 })).resolves.toBe("users/ada");
      expect(transport.lastRequest().method).toBe("PATCH");
      expect(jsonBody(transport.lastRequest())).toEqual({ age: 37 });
    });

    it("should delete and return the path", async () => {
      const { transport, database } = await setup();
      transport.replyJson(null);

      await expect(database.delete("users/ada")).resolves.toBe("users/ada");
      expect(transport.lastRequest().method).toBe("DELETE");
    });
  });

  describe("binary values", () => {
    it("should store bytes as a base64 envelope", async () => {
      const { transport, database } = await setup();
      transport.replyJson({});

      await database.set("users/ada", { avatar: Bytes.fromString("hi"), name: "Ada" });

      expect(jsonBody(transport.lastRequest())).toEqual({ avatar: { base64Set: "aGk=" }, name: "Ada" });
    });

    it("should read the envelope back as bytes", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ base64Set: "aGk=" });

      const bytes = await database.getBytes("users/ada/avatar");

      expect(bytes?.toString()).toBe("hi");
    });

    it("should reject non-binary data when reading bytes", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ name: "Ada" });

      await expect(database.getBytes("users/ada")).rejects.toThrow("Data at 'users/ada' is not a binary value");
    });

    it("should convert nested bytes", () => {
      expect(toDatabaseValue([{ blob: Bytes.fromString("a") }, 1, "x"])).toEqual([{ blob: { base64Set: "YQ==" } }, 1, "x"]);
    });
  });

  describe("query", () => {
    it("should send ordered queries as JSON-encoded parameters", async () => {
      const { transport, database } = await setup();
      transport.replyJson({ ada: 90, grace: 95, alan: 99 });

      await database.query("scores").orderBy("$value").limitToLast(3).execute();

      const params = queryParams(transport.lastRequest());
      expect(params.get("orderBy")).toBe('"$value"');
      expect(params.get("limitToLast")).toBe("3");
      expect(params.get("auth")).toBe("test-token");
    });

    it("should fail before any request without orderBy", async () => {
      const { transport, database } = await setup();
      expect(() => database.query("scores").equalTo(5)).toThrow(ValidationError);
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe("url", () => {
    it("should encode segments and address the root", async () => {
      const { database } = await setup();
      expect(database.url("teams/red team")).toBe(`${DATABASE_URL}/teams/red%20team.json`);
      expect(database.url("")).toBe(`${DATABASE_URL}/.json`);
    });
  });

  describe("backup", () => {
    it("should write the whole database to a file", async () => {
      const { transport, database, logger } = await setup();
      transport.reply({ headers: { "content-type": "application/json" }, body: '{"users":{"ada":{"name":"Ada"}}}' });
      const dir = mkdtempSync(join(tmpdir(), "firekit-backup-"));
      const file = join(dir, "backup.json");

      try {
        await expect(database.backup(file)).resolves.toBe(file);
        expect(readFileSync(file, "utf-8")).toBe('{"users":{"ada":{"name":"Ada"}}}');
        expect(transport.lastRequest().url).toBe(`${DATABASE_URL}/.json?auth=test-token`);
        expect(logger.messages(LogLevel.Info)).toEqual([`Database backup written to ${file}`]);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should require a credential", async () => {
      const { transport, database } = await setup(false);
      await expect(database.backup("unused.json")).rejects.toBeInstanceOf(AuthError);
      expect(transport.requests).toHaveLength(0);
    });
  });
});
