describe("wait-job CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("copies the job context of a poll timeout and leaves the cause out", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/wait-job");
    const { JobPollTimeoutError } = await import("../../src/application/jobs/job.errors");

    const error = new JobPollTimeoutError({
      context: { jobId: "job-1", status: "Running", attempts: 4, transportErrors: 0, elapsedMs: 5000 },
      lastAttempt: "pending",
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "job.wait_failed",
      name: "JobPollTimeoutError",
      message: "Polling job job-1 exceeded its budget after 4 attempts",
      code: "poll_timeout",
      context: { jobId: "job-1", status: "Running", attempts: 4, transportErrors: 0, elapsedMs: 5000 }
    });
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("keeps the numeric status of a retrieval failure", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/wait-job");
    const { RetrievalError } = await import("../../src/application/retrieval/retrieval.errors");

    const error = new RetrievalError({
      code: "authorization_failed",
      message: "Download failed with status 401: https://archive.example.test/f.h5",
      context: { url: "https://archive.example.test/f.h5", status: 401, auth: "job_runtime_token" }
    });

    expect(JSON.parse(JSON.stringify(buildCliErrorEnvelope(error, false)))).toEqual({
      event: "job.wait_failed",
      name: "RetrievalError",
      message: "Download failed with status 401: https://archive.example.test/f.h5",
      code: "authorization_failed",
      context: { url: "https://archive.example.test/f.h5", status: 401, auth: "job_runtime_token" }
    });
  });

  it("names the request failure kind of a job service error", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/wait-job");
    const { DpsRequestError } = await import("../../src/infrastructure/dps/DpsHttpClient");

    const error = new DpsRequestError({
      message: "DPS request timed out",
      requestUrl: "https://dps.example.test/api/dps/job/job-1/status",
      isTimeout: true
    });

    expect(JSON.parse(JSON.stringify(buildCliErrorEnvelope(error, false)))).toEqual({
      event: "job.wait_failed",
      name: "DpsRequestError",
      message: "DPS request timed out",
      code: "request_timeout",
      context: { url: "https://dps.example.test/api/dps/job/job-1/status" }
    });
  });

  it("reports the document kind of a parse error without its raw body", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/wait-job");
    const { StatusDocumentParseError } = await import("../../src/core/jobs/statusDocument");

    const error = new StatusDocumentParseError({
      documentKind: "status",
      message: "Malformed status document: no root element",
      rawBody: "<html>test-secret</html>"
    });

    const envelope = buildCliErrorEnvelope(error, false);
    expect(envelope).toEqual({
      event: "job.wait_failed",
      name: "StatusDocumentParseError",
      message: "Malformed status document: no root element",
      code: "malformed_document",
      document: "status"
    });
    expect(JSON.stringify(envelope)).not.toContain("test-secret");
  });

  it("includes the stack only in debug mode", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/wait-job");

    const envelope = buildCliErrorEnvelope(new Error("boom"), true);
    expect(envelope.code).toBeUndefined();
    expect(envelope.stack).toContain("Error: boom");
    expect(buildCliErrorEnvelope(new Error("boom"), false).stack).toBeUndefined();
    expect(buildCliErrorEnvelope("plain failure", false)).toEqual({
      event: "job.wait_failed",
      name: "Error",
      message: "plain failure"
    });
    expect(isDebugMode({ DEBUG: "true" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
  });

  it("prints the completion summary", async () => {
    const runWaitForJob = jest.fn().mockResolvedValue({
      job: { id: "job-1", status: "Succeeded", outputs: ["s3://bucket/x"] },
      attempts: 3,
      transportErrors: 1,
      elapsedMs: 3000
    });
    jest.doMock("../../src/composition/root", () => ({ runWaitForJob }));
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);

    const { executeWaitJobCli } = await import("../../src/cli/wait-job");
    await executeWaitJobCli(["job-1"]);

    expect(runWaitForJob).toHaveBeenCalledWith("job-1", { signal: expect.any(AbortSignal) });
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      event: "job.wait_completed",
      jobId: "job-1",
      status: "Succeeded",
      attempts: 3,
      transportErrors: 1,
      elapsedMs: 3000,
      outputs: ["s3://bucket/x"]
    });
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const { JobFailedError } = await import("../../src/application/jobs/job.errors");
    const runWaitForJob = jest.fn().mockRejectedValue(
      new JobFailedError({
        context: { jobId: "job-1", status: "Failed", attempts: 2 },
        traceback: ["do-not-print-this"]
      })
    );
    jest.doMock("../../src/composition/root", () => ({ runWaitForJob }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeWaitJobCli } = await import("../../src/cli/wait-job");
    await expect(executeWaitJobCli(["job-1"])).rejects.toThrow("EXIT:1");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const logged = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(JSON.parse(logged)).toEqual({
      event: "job.wait_failed",
      name: "JobFailedError",
      message: "Job job-1 finished with status Failed",
      code: "job_failed",
      context: { jobId: "job-1", status: "Failed", attempts: 2 }
    });
  });

  it("requires a job id", async () => {
    const runWaitForJob = jest.fn();
    jest.doMock("../../src/composition/root", () => ({ runWaitForJob }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeWaitJobCli } = await import("../../src/cli/wait-job");
    await expect(executeWaitJobCli([])).rejects.toThrow("EXIT:1");

    expect(runWaitForJob).not.toHaveBeenCalled();
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain("Usage: wait-job <jobId>");
  });
});
