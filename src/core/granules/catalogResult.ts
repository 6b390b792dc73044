import type { CollectionResult, GranuleResult, RawMetadata } from "./granule.types";
import { resolveLocation } from "./locationResolver";

export class InvalidCatalogRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCatalogRecordError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asList = (value: unknown): unknown[] => (Array.isArray(value) ? value : value == null ? [] : [value]);

const pick = (value: unknown, ...path: string[]): unknown =>
  path.reduce<unknown>((node, key) => (isRecord(node) ? node[key] : undefined), value);

const findResourceUrl = (resources: unknown[], type: string): string | undefined => {
  const match = resources.find((r) => isRecord(r) && r.Type === type && typeof r.URL === "string");
  return isRecord(match) && typeof match.URL === "string" ? match.URL : undefined;
};

export const buildGranuleResult = (raw: RawMetadata): GranuleResult => {
  const onlineAccess = pick(raw, "Granule", "OnlineAccessURLs", "OnlineAccessURL");
  const relatedUrls = asList(onlineAccess).flatMap((r) =>
    isRecord(r) && typeof r.URL === "string" ? [r.URL] : []
  );
  const resources = asList(pick(raw, "Granule", "OnlineResources", "OnlineResource"));

  const result: GranuleResult = {
    kind: "granule",
    location: resolveLocation(onlineAccess),
    relatedUrls,
    raw
  };

  const opendapUrl = findResourceUrl(resources, "OPeNDAP");
  if (opendapUrl) result.opendapUrl = opendapUrl;
  const browseUrl = findResourceUrl(resources, "BROWSE");
  if (browseUrl) result.browseUrl = browseUrl;

  return result;
};

/**
 * Collections download their UMM-JSON metadata document, named after the short name.
 */
export const buildCollectionResult = (raw: RawMetadata, catalogHost: string): CollectionResult => {
  const conceptId = raw["concept-id"];
  if (typeof conceptId !== "string" || conceptId.trim() === "") {
    throw new InvalidCatalogRecordError("Invalid collection: missing concept-id");
  }
  const shortName = pick(raw, "Collection", "ShortName");
  if (typeof shortName !== "string" || shortName.replace(/\//g, "") === "") {
    throw new InvalidCatalogRecordError("Invalid collection: missing Collection.ShortName");
  }

  const url = `https://${catalogHost}/search/concepts/${encodeURIComponent(conceptId)}.umm-json`;
  const primary = { scheme: "https" as const, url };
  return {
    kind: "collection",
    conceptId,
    location: { primary, fallback: primary, destinationName: shortName.replace(/\//g, "") },
    raw
  };
};
