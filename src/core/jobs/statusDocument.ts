import { XMLParser } from "fast-xml-parser";
import {
  normalizeJobStatus,
  type JobResourceUsage,
  type JobStatus,
  type SubmissionAck
} from "./DpsJob";

export type StatusDocumentKind = "submission" | "status" | "results" | "metrics";

export class StatusDocumentParseError extends Error {
  readonly code = "malformed_document";
  readonly documentKind: StatusDocumentKind;
  readonly rawBody: string;
  readonly cause?: unknown;

  constructor(args: { documentKind: StatusDocumentKind; message: string; rawBody: string; cause?: unknown }) {
    super(args.message);
    this.name = "StatusDocumentParseError";
    this.documentKind = args.documentKind;
    this.rawBody = args.rawBody;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type XmlElement = {
  name: string;
  children: unknown[];
};

const xmlParser = new XMLParser({
  preserveOrder: true,
  parseTagValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toElement = (node: unknown): XmlElement | undefined => {
  if (!isRecord(node)) return undefined;
  const name = Object.keys(node).find((key) => key !== ":@" && key !== "#text");
  if (name == null) return undefined;
  const children = node[name];
  return { name, children: Array.isArray(children) ? children : [] };
};

const childElements = (element: XmlElement): XmlElement[] =>
  element.children.flatMap((child) => {
    const el = toElement(child);
    return el ? [el] : [];
  });

const textOf = (element: XmlElement): string =>
  element.children
    .map((child) => {
      if (!isRecord(child)) return "";
      const text = child["#text"];
      return typeof text === "string" || typeof text === "number" ? String(text) : "";
    })
    .join("")
    .trim();

const parseRoot = (kind: StatusDocumentKind, xml: string): XmlElement => {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml, true);
  } catch (err) {
    throw new StatusDocumentParseError({
      documentKind: kind,
      message: `Malformed ${kind} document: ${err instanceof Error ? err.message : String(err)}`,
      rawBody: xml,
      cause: err
    });
  }

  const root = Array.isArray(parsed) ? parsed.map(toElement).find((el) => el != null) : undefined;
  if (!root) {
    throw new StatusDocumentParseError({
      documentKind: kind,
      message: `Malformed ${kind} document: no root element`,
      rawBody: xml
    });
  }
  return root;
};

export const parseSubmissionAck = (body: string): SubmissionAck => {
  const fail = (reason: string, cause?: unknown) =>
    new StatusDocumentParseError({
      documentKind: "submission",
      message: `Malformed submission acknowledgment: ${reason}`,
      rawBody: body,
      cause
    });

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw fail("body is not JSON", err);
  }
  if (!isRecord(json)) throw fail("body is not an object");

  const { status, http_status_code: httpStatusCode, job_id: jobId, details } = json;
  if (status !== "success" && status !== "failed") throw fail("status must be success or failed");
  if (typeof httpStatusCode !== "number" || !Number.isInteger(httpStatusCode)) {
    throw fail("http_status_code must be an integer");
  }
  if (typeof jobId !== "string") throw fail("job_id must be a string");

  const ack: SubmissionAck = { status, httpStatusCode, jobId };
  if (typeof details === "string") {
    ack.details = details;
  } else if (details != null) {
    ack.details = JSON.stringify(details);
  }
  return ack;
};

export type StatusDocument = {
  jobId?: string;
  status: JobStatus;
  rawStatus: string;
};

/**
 * Reads `<StatusInfo><JobID/><Status/></StatusInfo>`. Tags are matched by suffix,
 * so `wps:Status` and `Status` are read the same way.
 */
export const parseStatusDocument = (xml: string): StatusDocument => {
  const root = parseRoot("status", xml);
  let jobId: string | undefined;
  let rawStatus: string | undefined;

  for (const child of childElements(root)) {
    if (child.name.endsWith("JobID")) {
      jobId = textOf(child);
    } else if (child.name.endsWith("Status")) {
      rawStatus = textOf(child);
    }
  }

  if (rawStatus == null) {
    throw new StatusDocumentParseError({
      documentKind: "status",
      message: "Malformed status document: missing Status element",
      rawBody: xml
    });
  }

  const status = normalizeJobStatus(rawStatus);
  if (!status) {
    throw new StatusDocumentParseError({
      documentKind: "status",
      message: `Malformed status document: unknown status "${rawStatus}"`,
      rawBody: xml
    });
  }

  return jobId ? { jobId, status, rawStatus } : { status, rawStatus };
};

export type ResultsDocument = {
  outputs: string[];
  traceback: string[];
};

export const parseResultsDocument = (xml: string): ResultsDocument => {
  const root = parseRoot("results", xml);
  const outputs: string[] = [];
  const traceback: string[] = [];

  for (const child of childElements(root)) {
    if (child.name.endsWith("Output")) {
      for (const data of childElements(child)) {
        const url = textOf(data);
        if (data.name.endsWith("Data") && url !== "") outputs.push(url);
      }
    } else if (child.name.endsWith("Error")) {
      for (const line of childElements(child)) {
        const text = textOf(line);
        if (text !== "") traceback.push(text);
      }
    }
  }

  return { outputs, traceback };
};

const usageFields = new Map<string, { key: keyof JobResourceUsage; numeric: boolean }>([
  ["machine_type", { key: "machineType", numeric: false }],
  ["architecture", { key: "architecture", numeric: false }],
  ["machine_memory_size", { key: "machineMemorySize", numeric: true }],
  ["directory_size", { key: "directorySize", numeric: true }],
  ["operating_system", { key: "operatingSystem", numeric: false }],
  ["job_start_time", { key: "jobStartTime", numeric: false }],
  ["job_end_time", { key: "jobEndTime", numeric: false }],
  ["job_duration_seconds", { key: "jobDurationSeconds", numeric: true }],
  ["cpu_usage", { key: "cpuUsage", numeric: true }],
  ["cache_usage", { key: "cacheUsage", numeric: true }],
  ["mem_usage", { key: "memUsage", numeric: true }],
  ["max_mem_usage", { key: "maxMemUsage", numeric: true }],
  ["swap_usage", { key: "swapUsage", numeric: true }],
  ["read_io_stats", { key: "readIoStats", numeric: true }],
  ["write_io_stats", { key: "writeIoStats", numeric: true }],
  ["sync_io_stats", { key: "syncIoStats", numeric: true }],
  ["async_io_stats", { key: "asyncIoStats", numeric: true }],
  ["total_io_stats", { key: "totalIoStats", numeric: true }]
]);

const toNumberOrString = (value: string): number | string => {
  if (value === "") return value;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
};

export type MetricsDocument = {
  metrics: Record<string, string>;
  usage: JobResourceUsage;
};

export const parseMetricsDocument = (xml: string): MetricsDocument => {
  const root = parseRoot("metrics", xml);
  const metrics: Record<string, string> = {};
  const usage: JobResourceUsage = {};

  for (const child of childElements(root)) {
    const value = textOf(child);
    metrics[child.name] = value;

    const field = usageFields.get(child.name);
    if (!field) continue;
    Object.assign(usage, { [field.key]: field.numeric ? toNumberOrString(value) : value });
  }

  return { metrics, usage };
};
