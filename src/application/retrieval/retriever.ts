import { randomUUID } from "crypto";
import fs from "fs";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { DownloadCandidate, Location } from "../../core/granules/granule.types";
import { locationFromUrl, parseS3Url, schemeOf } from "../../core/granules/locationResolver";
import type { FtpClient } from "../../ports/FtpClient";
import type { ObjectStore } from "../../ports/ObjectStore";
import type { AuthContext } from "../../shared/auth/authContext";
import type { RequestHeaders } from "../../shared/http/headers";
import { toErrorMessage } from "../jobs/job.errors";
import { RetrievalError, sanitizeUrl, type RetrievalAuth } from "./retrieval.errors";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type RetrieverDeps = {
  authContext: AuthContext;
  objectStore: ObjectStore;
  ftpClient: FtpClient;
  fetchFn?: FetchFn;
  timeoutMs?: number;
};

export type RetrieveOptions = {
  overwrite?: boolean;
  signal?: AbortSignal;
};

export type RetrievalResult =
  | { kind: "nothing_to_fetch" }
  | { kind: "existing"; path: string }
  | { kind: "downloaded"; path: string; source: DownloadCandidate; auth: RetrievalAuth };

type ArchiveTokens = { userToken: string; appToken: string };

type OpenRequest = {
  res: Response;
  /** Restarts the idle timer; called as body chunks arrive. */
  touch: () => void;
  timedOut: () => boolean;
  close: () => void;
};

const pathExists = (target: string): Promise<boolean> =>
  fs.promises.stat(target).then(
    () => true,
    (err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT") return false;
      throw err;
    }
  );

/** The destination only ever appears complete: data lands in a sibling file that is renamed into place. */
const writeAtomically = async (dest: string, write: (tmpPath: string) => Promise<void>): Promise<void> => {
  const tmpPath = `${dest}.${randomUUID()}.part`;
  try {
    await write(tmpPath);
    await fs.promises.rename(tmpPath, dest);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    throw err;
  }
};

const discardBody = async (res: Response): Promise<void> => {
  if (res.body && !res.bodyUsed) await res.body.cancel();
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const buildRelayUrl = (relayEndpoint: string, url: string): string =>
  `${relayEndpoint.replace(/\/+$/, "")}/${encodeURIComponent(encodeURIComponent(url))}/data`;

export class Retriever {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(private readonly deps: RetrieverDeps) {
    this.fetchFn = deps.fetchFn ?? ((input, init) => fetch(input, init));
    this.timeoutMs = deps.timeoutMs ?? 30_000;
  }

  async retrieve(location: Location | null, destDir: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    if (!location) return { kind: "nothing_to_fetch" };

    const dest = path.join(destDir, location.destinationName);
    if (!options.overwrite && (await pathExists(dest))) return { kind: "existing", path: dest };
    await fs.promises.mkdir(destDir, { recursive: true });

    const { primary } = location;
    switch (primary.scheme) {
      case "ftp":
        this.assertNotAborted(primary.url, options.signal);
        await writeAtomically(dest, (tmpPath) => this.deps.ftpClient.download(new URL(primary.url), tmpPath));
        return { kind: "downloaded", path: dest, source: primary, auth: "none" };
      case "s3":
        return this.retrieveFromS3(location, dest, options.signal);
      case "http":
      case "https":
        return this.retrieveOverHttp(primary, dest, options.signal);
    }
  }

  /** Single-URL download with the same authorization rules as catalog locations. */
  async retrieveUrl(url: string, destDir: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    if (!schemeOf(url.trim())) {
      throw new RetrievalError({
        code: "unsupported_scheme",
        message: `Unsupported download scheme: ${sanitizeUrl(url)}`,
        context: { url: sanitizeUrl(url) }
      });
    }
    return this.retrieve(locationFromUrl(url), destDir, options);
  }

  private async retrieveFromS3(location: Location, dest: string, signal?: AbortSignal): Promise<RetrievalResult> {
    const { primary, fallback } = location;
    this.assertNotAborted(primary.url, signal);
    try {
      await writeAtomically(dest, (tmpPath) => this.deps.objectStore.downloadObject(parseS3Url(primary.url), tmpPath));
      return { kind: "downloaded", path: dest, source: primary, auth: "none" };
    } catch (err) {
      if (!fallback) {
        throw new RetrievalError({
          code: "s3_download_failed",
          message: `S3 download failed for ${sanitizeUrl(primary.url)}: ${toErrorMessage(err)}`,
          context: { url: sanitizeUrl(primary.url) },
          cause: err
        });
      }
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "retrieval.s3_fallback",
        url: sanitizeUrl(primary.url),
        fallbackUrl: sanitizeUrl(fallback.url),
        reason: toErrorMessage(err)
      }));
      return this.retrieveOverHttp(fallback, dest, signal);
    }
  }

  private async retrieveOverHttp(candidate: DownloadCandidate, dest: string, signal?: AbortSignal): Promise<RetrievalResult> {
    let request = await this.open(candidate.url, {}, signal);
    try {
      let auth: RetrievalAuth = "none";

      if (request.res.status === 401) {
        await discardBody(request.res);
        request.close();
        const escalated = await this.escalate(candidate.url, request.res.url || candidate.url, signal);
        request = escalated.request;
        auth = escalated.auth;
      }

      const { res } = request;
      if (!res.ok) {
        await discardBody(res);
        const code = res.status === 401 ? "authorization_failed" : "transfer_failed";
        throw new RetrievalError({
          code,
          message: `Download failed with status ${res.status}: ${sanitizeUrl(candidate.url)}`,
          context: { url: sanitizeUrl(candidate.url), status: res.status, auth }
        });
      }

      await writeAtomically(dest, (tmpPath) => this.writeBody(request, candidate.url, tmpPath, signal));
      return { kind: "downloaded", path: dest, source: candidate, auth };
    } finally {
      request.close();
    }
  }

  /**
   * Streams the response body to `tmpPath`. Failures reading the body become a
   * RetrievalError; failures writing the file propagate as they are.
   */
  private async writeBody(request: OpenRequest, url: string, tmpPath: string, signal?: AbortSignal): Promise<void> {
    const out = fs.createWriteStream(tmpPath);
    const body = request.res.body;
    if (!body) {
      await new Promise<void>((resolve, reject) => {
        out.on("error", reject);
        out.end(resolve);
      });
      return;
    }

    const toReadError = (err: unknown) => this.toTransferError(url, err, request, signal, "Download interrupted");
    async function* chunks(source: Readable): AsyncGenerator<Uint8Array> {
      try {
        for await (const chunk of source) {
          request.touch();
          yield chunk;
        }
      } catch (err) {
        throw toReadError(err);
      }
    }
    await pipeline(chunks(Readable.fromWeb(body)), out);
  }

  /**
   * Retries a 401 once with the credentials the process has: archive tokens
   * issued for a running job, or the caller's API credentials through the relay.
   */
  private async escalate(
    url: string,
    finalUrl: string,
    signal?: AbortSignal
  ): Promise<{ request: OpenRequest; auth: RetrievalAuth }> {
    const ctx = this.deps.authContext;
    switch (ctx.kind) {
      case "unauthenticated":
        throw new RetrievalError({
          code: "authorization_failed",
          message: `Authorization required and no credentials are available: ${sanitizeUrl(url)}`,
          context: { url: sanitizeUrl(url), status: 401, auth: "none" }
        });
      case "job_runtime_token": {
        this.logEscalation(url, ctx.kind);
        const tokens = await this.fetchArchiveTokens(ctx, signal);
        const request = await this.open(
          finalUrl,
          { Authorization: `Bearer ${tokens.userToken},Basic ${tokens.appToken}`, Connection: "close" },
          signal
        );
        return { request, auth: ctx.kind };
      }
      case "proxy_delegate": {
        this.logEscalation(url, ctx.kind);
        const request = await this.open(buildRelayUrl(ctx.relayEndpoint, url), ctx.apiHeaders, signal);
        return { request, auth: ctx.kind };
      }
    }
  }

  private async fetchArchiveTokens(
    ctx: Extract<AuthContext, { kind: "job_runtime_token" }>,
    signal?: AbortSignal
  ): Promise<ArchiveTokens> {
    const request = await this.open(
      ctx.tokenEndpoint,
      { "dps-machine-token": ctx.machineToken, "dps-job-id": ctx.jobId, Accept: "application/json" },
      signal
    );
    const { res } = request;
    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw this.toTransferError(ctx.tokenEndpoint, err, request, signal, "Token exchange interrupted");
    } finally {
      request.close();
    }
    const fail = (reason: string): RetrievalError =>
      new RetrievalError({
        code: "authorization_failed",
        message: `Token exchange failed: ${reason}`,
        context: { url: sanitizeUrl(ctx.tokenEndpoint), status: res.status, auth: "job_runtime_token" }
      });

    if (!res.ok) throw fail(`status ${res.status}`);
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw fail("response is not JSON");
    }
    if (!isRecord(json) || typeof json.user_token !== "string" || typeof json.app_token !== "string") {
      throw fail("response has no user_token/app_token");
    }
    return { userToken: json.user_token, appToken: json.app_token };
  }

  /**
   * Issues a GET whose idle timeout and forwarded abort stay armed until
   * `close()`, so they also cover reading the body.
   */
  private async open(url: string, headers: RequestHeaders, signal?: AbortSignal): Promise<OpenRequest> {
    this.assertNotAborted(url, signal);

    const controller = new AbortController();
    let timedOut = false;
    let closed = false;
    const onIdle = () => {
      timedOut = true;
      controller.abort();
    };
    let timer = setTimeout(onIdle, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const request: Omit<OpenRequest, "res"> = {
      touch: () => {
        if (closed) return;
        clearTimeout(timer);
        timer = setTimeout(onIdle, this.timeoutMs);
      },
      timedOut: () => timedOut,
      close: () => {
        closed = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", forwardAbort);
      }
    };

    try {
      const res = await this.fetchFn(url, { method: "GET", headers, redirect: "follow", signal: controller.signal });
      return { ...request, res };
    } catch (err) {
      request.close();
      throw this.toTransferError(url, err, request, signal, "Download request failed");
    }
  }

  private toTransferError(
    url: string,
    err: unknown,
    request: Pick<OpenRequest, "timedOut">,
    signal: AbortSignal | undefined,
    prefix: string
  ): RetrievalError {
    if (signal?.aborted) {
      return new RetrievalError({ code: "aborted", message: "Download aborted", context: { url: sanitizeUrl(url) }, cause: err });
    }
    const reason = request.timedOut() ? `no data for ${this.timeoutMs}ms` : toErrorMessage(err);
    return new RetrievalError({
      code: "transfer_failed",
      message: `${prefix}: ${reason}`,
      context: { url: sanitizeUrl(url) },
      cause: err
    });
  }

  private assertNotAborted(url: string, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RetrievalError({ code: "aborted", message: "Download aborted", context: { url: sanitizeUrl(url) } });
    }
  }

  private logEscalation(url: string, strategy: AuthContext["kind"]): void {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "retrieval.auth_escalation", url: sanitizeUrl(url), strategy }));
  }
}
