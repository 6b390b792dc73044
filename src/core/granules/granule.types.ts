export type RawMetadata = Record<string, unknown>;

export type DownloadScheme = "s3" | "https" | "http" | "ftp";

export type DownloadCandidate = {
  scheme: DownloadScheme;
  url: string;
};

/**
 * Where one data object is fetched from. When `primary` is S3, `fallback` is the
 * HTTPS copy of the same file (same basename), if the metadata lists one.
 */
export type Location = {
  primary: DownloadCandidate;
  fallback?: DownloadCandidate;
  destinationName: string;
};

export type GranuleResult = {
  kind: "granule";
  location: Location | null;
  relatedUrls: string[];
  opendapUrl?: string;
  browseUrl?: string;
  raw: RawMetadata;
};

export type CollectionResult = {
  kind: "collection";
  conceptId: string;
  location: Location;
  raw: RawMetadata;
};

export type CatalogResult = GranuleResult | CollectionResult;
