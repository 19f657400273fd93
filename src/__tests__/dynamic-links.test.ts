/**
 * Tests for the dynamic links service.
 */

import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors/index.js";
import { buildShortLinkRequest, DynamicLinksService } from "../dynamic-links/index.js";
import { LogLevel } from "../observability/index.js";
import { jsonBody, queryParams, urlPath } from "../simulation/mock-transport.js";
import { createHarness } from "./helpers.js";

const PREFIX = "https://demo.page.link";

describe("buildShortLinkRequest", () => {
  it("should default to a short suffix without optional sections", () => {
    expect(buildShortLinkRequest({ link: "https://example.com/a", domainUriPrefix: PREFIX })).toEqual({
      dynamicLinkInfo: { domainUriPrefix: PREFIX, link: "https://example.com/a" },
      suffix: { option: "SHORT" },
    });
  });

  it("should fill unset social tags with empty strings", () => {
    const request = buildShortLinkRequest({
      link: "https://example.com/a",
      domainUriPrefix: PREFIX,
      short: false,
      social: { title: "Launch" },
    });

    expect(request.suffix.option).toBe("UNGUESSABLE");
    expect(request.dynamicLinkInfo.socialMetaTagInfo).toEqual({
      socialTitle: "Launch",
      socialDescription: "",
      socialImageLink: "",
    });
  });

  it("should map platform details", () => {
    const request = buildShortLinkRequest({
      link: "https://example.com/a",
      domainUriPrefix: PREFIX,
      android: { packageName: "com.example.app" },
      ios: { bundleId: "com.example.ios", appStoreId: "123" },
    });

    expect(request.dynamicLinkInfo.androidInfo?.androidPackageName).toBe("com.example.app");
    expect(request.dynamicLinkInfo.iosInfo).toEqual({
      iosBundleId: "com.example.ios",
      iosFallbackLink: undefined,
      iosAppStoreId: "123",
    });
  });

  it("should require a link and prefix", () => {
    expect(() => buildShortLinkRequest({ link: "", domainUriPrefix: PREFIX })).toThrow(ValidationError);
    expect(() => buildShortLinkRequest({ link: "https://example.com", domainUriPrefix: "" })).toThrow(
      "link and domainUriPrefix are required"
    );
  });
});

describe("DynamicLinksService", () => {
  it("should create a short link with the API key", async () => {
    const harness = await createHarness({ projectId: "demo-project", apiKey: "test-api-key" });
    harness.transport.replyJson({ shortLink: `${PREFIX}/abc`, previewLink: `${PREFIX}/abc?d=1` });

    const response = await new DynamicLinksService(harness).create({ link: "https://example.com/a", domainUriPrefix: PREFIX });

    expect(response.shortLink).toBe(`${PREFIX}/abc`);
    const request = harness.transport.lastRequest();
    expect(urlPath(request)).toBe("https://firebasedynamiclinks.googleapis.com/v1/shortLinks");
    expect(queryParams(request).get("key")).toBe("test-api-key");
    expect(jsonBody(request)).toEqual({
      dynamicLinkInfo: { domainUriPrefix: PREFIX, link: "https://example.com/a" },
      suffix: { option: "SHORT" },
    });
  });

  it("should log warnings returned with the link", async () => {
    const harness = await createHarness({ projectId: "demo-project", apiKey: "test-api-key" });
    harness.transport.replyJson({
      shortLink: `${PREFIX}/abc`,
      warning: [{ warningCode: "UNRECOGNIZED_PARAM", warningMessage: "Param 'x' is not recognized" }, { warningCode: "OTHER" }],
    });

    await new DynamicLinksService(harness).create({ link: "https://example.com/a", domainUriPrefix: PREFIX });

    expect(harness.logger.messages(LogLevel.Warn)).toEqual([
      "Dynamic link warning: Param 'x' is not recognized",
      "Dynamic link warning: OTHER",
    ]);
  });

  it("should require an API key", async () => {
    const harness = await createHarness({ projectId: "demo-project" });

    await expect(
      new DynamicLinksService(harness).create({ link: "https://example.com/a", domainUriPrefix: PREFIX })
    ).rejects.toThrow("An API key is required to create dynamic links");
    expect(harness.transport.requests).toHaveLength(0);
  });
});
