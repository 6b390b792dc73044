import type { DownloadCandidate, DownloadScheme, Location } from "./granule.types";

const schemePrefixes: Array<[string, DownloadScheme]> = [
  ["s3://", "s3"],
  ["https://", "https"],
  ["http://", "http"],
  ["ftp://", "ftp"]
];

export const schemeOf = (url: string): DownloadScheme | undefined =>
  schemePrefixes.find(([prefix]) => url.startsWith(prefix))?.[1];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isParseableUrl = (url: string): boolean => {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
};

export const basenameOf = (url: string): string => {
  const { pathname } = new URL(url);
  return pathname.slice(pathname.lastIndexOf("/") + 1);
};

const decodeSegment = (segment: string): string => {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
};

/**
 * Catalog metadata lists `OnlineAccessURL` either as an array of `{ URL }`
 * records or, for a single entry, as one bare record.
 * Entries without a string URL or with a scheme other than s3/http(s)/ftp are dropped.
 */
export const normalizeOnlineAccessUrls = (value: unknown): DownloadCandidate[] => {
  const records = Array.isArray(value) ? value : isRecord(value) ? [value] : [];

  return records.flatMap((record) => {
    if (!isRecord(record) || typeof record.URL !== "string") return [];
    const url = record.URL.trim();
    const scheme = schemeOf(url);
    if (!scheme || !isParseableUrl(url)) return [];
    return [{ scheme, url }];
  });
};

/**
 * Picks the first S3 candidate (else the first listed one) as primary and the
 * first HTTPS candidate with the same basename as fallback. Returns null when
 * nothing downloadable is listed.
 */
export const resolveLocation = (onlineAccessUrls: unknown): Location | null => {
  const candidates = normalizeOnlineAccessUrls(onlineAccessUrls);
  if (candidates.length === 0) return null;

  const primary = candidates.find((c) => c.scheme === "s3") ?? candidates[0];
  const basename = basenameOf(primary.url);
  const destinationName = decodeSegment(basename).replace(/\//g, "");
  if (destinationName === "") return null;

  const fallback = candidates.find((c) => c.scheme === "https" && basenameOf(c.url) === basename);
  return fallback ? { primary, fallback, destinationName } : { primary, destinationName };
};

export const locationFromUrl = (url: string): Location | null => resolveLocation([{ URL: url }]);

export const parseS3Url = (url: string): { bucket: string; key: string } => {
  const parsed = new URL(url);
  return {
    bucket: parsed.hostname,
    key: decodeURIComponent(parsed.pathname.replace(/^\/+/, ""))
  };
};
