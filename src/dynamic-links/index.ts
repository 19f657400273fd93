/**
 * Dynamic Links Service.
 */

import { z } from "zod";
import { ValidationError } from "../errors/index.js";
import { defaultConfigResolver, type ConfigResolver } from "../config/index.js";
import type { Connection, ServiceContext } from "../connection/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import type { FirebaseHttpClient } from "../transport/http-client.js";

const ShortLinkResponseSchema = z
  .object({
    shortLink: z.string(),
    previewLink: z.string().optional(),
    warning: z.array(z.object({ warningCode: z.string().optional(), warningMessage: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

export type ShortLinkResponse = z.infer<typeof ShortLinkResponseSchema>;

export interface SocialMetaTags {
  title?: string;
  description?: string;
  imageLink?: string;
}

export interface AndroidLinkInfo {
  packageName: string;
  fallbackLink?: string;
  minPackageVersionCode?: string;
}

export interface IosLinkInfo {
  bundleId: string;
  fallbackLink?: string;
  appStoreId?: string;
}

export interface CreateDynamicLinkOptions {
  /** Deep link the dynamic link opens */
  link: string;
  /** e.g. `https://example.page.link` */
  domainUriPrefix: string;
  /** SHORT suffix when true, UNGUESSABLE otherwise */
  short?: boolean;
  social?: SocialMetaTags;
  android?: AndroidLinkInfo;
  ios?: IosLinkInfo;
}

interface DynamicLinkInfo {
  domainUriPrefix: string;
  link: string;
  socialMetaTagInfo?: { socialTitle: string; socialDescription: string; socialImageLink: string };
  androidInfo?: { androidPackageName: string; androidFallbackLink?: string; androidMinPackageVersionCode?: string };
  iosInfo?: { iosBundleId: string; iosFallbackLink?: string; iosAppStoreId?: string };
}

export interface ShortLinkRequest {
  dynamicLinkInfo: DynamicLinkInfo;
  suffix: { option: "SHORT" | "UNGUESSABLE" };
}

/**
 * Request body for `shortLinks`. Social tags left unset are sent empty.
 */
export function buildShortLinkRequest(options: CreateDynamicLinkOptions): ShortLinkRequest {
  if (options.link === "" || options.domainUriPrefix === "") {
    throw new ValidationError("link and domainUriPrefix are required", { field: "link" });
  }

  const info: DynamicLinkInfo = { domainUriPrefix: options.domainUriPrefix, link: options.link };
  const social = options.social;
  if (social !== undefined && (social.title !== undefined || social.description !== undefined || social.imageLink !== undefined)) {
    info.socialMetaTagInfo = {
      socialTitle: social.title ?? "",
      socialDescription: social.description ?? "",
      socialImageLink: social.imageLink ?? "",
    };
  }
  if (options.android !== undefined) {
    info.androidInfo = {
      androidPackageName: options.android.packageName,
      androidFallbackLink: options.android.fallbackLink,
      androidMinPackageVersionCode: options.android.minPackageVersionCode,
    };
  }
  if (options.ios !== undefined) {
    info.iosInfo = {
      iosBundleId: options.ios.bundleId,
      iosFallbackLink: options.ios.fallbackLink,
      iosAppStoreId: options.ios.appStoreId,
    };
  }

  return {
    dynamicLinkInfo: info,
    suffix: { option: options.short === false ? "UNGUESSABLE" : "SHORT" },
  };
}

/**
 * Dynamic Links Service.
 */
export class DynamicLinksService {
  private readonly connection: Connection;
  private readonly http: FirebaseHttpClient;
  private readonly logger: Logger;
  private readonly resolver: ConfigResolver;

  constructor(context: ServiceContext) {
    this.connection = context.connection;
    this.http = context.http;
    this.logger = (context.logger ?? new NoopLogger()).child({ service: "dynamic-links" });
    this.resolver = context.resolver ?? defaultConfigResolver;
  }

  async create(options: CreateDynamicLinkOptions): Promise<ShortLinkResponse> {
    const body = buildShortLinkRequest(options);
    const apiKey = this.resolver.resolve("api_key", this.connection.apiKey);
    if (apiKey === undefined) {
      throw new ValidationError("An API key is required to create dynamic links", { field: "apiKey" });
    }

    const response = await this.http.requestAs(
      {
        method: "POST",
        url: `${this.connection.endpoints.dynamicLinks}/shortLinks`,
        query: { key: apiKey },
        body,
      },
      ShortLinkResponseSchema
    );
    for (const warning of response.warning ?? []) {
      this.logger.warn(`Dynamic link warning: ${warning.warningMessage ?? warning.warningCode ?? "unknown"}`);
    }
    return response;
  }
}
