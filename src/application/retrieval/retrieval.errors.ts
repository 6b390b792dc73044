export type RetrievalFailureCode =
  | "authorization_failed"
  | "transfer_failed"
  | "s3_download_failed"
  | "unsupported_scheme"
  | "aborted";

export type RetrievalAuth = "none" | "job_runtime_token" | "proxy_delegate";

export type RetrievalErrorContext = {
  url: string;
  status?: number;
  auth?: RetrievalAuth;
};

export class RetrievalError extends Error {
  readonly code: RetrievalFailureCode;
  readonly context: RetrievalErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: RetrievalFailureCode; message: string; context: RetrievalErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "RetrievalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Origin and path only; signed archive URLs carry credentials in the query.
export const sanitizeUrl = (url: string): string => {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    return url.split("?")[0];
  }
};
