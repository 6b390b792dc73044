import { DpsHttpClient } from "../../src/infrastructure/dps/DpsHttpClient";
import { readBody, startServer, type RecordedRequest } from "../helpers/testServer";

describe("DpsHttpClient request shape", () => {
  const recordingServer = async (status = 200, body = "<ok/>") => {
    const requests: RecordedRequest[] = [];
    const server = await startServer((req, res) => {
      void readBody(req).then((text) => {
        requests.push({ method: req.method ?? "", url: req.url ?? "", headers: req.headers, body: text });
        res.writeHead(status, { "content-type": "application/xml" });
        res.end(body);
      });
    });
    return { server, requests };
  };

  it("posts the job specification as JSON with the caller's token", async () => {
    const ack = JSON.stringify({ status: "success", http_status_code: 200, job_id: "job-1" });
    const { server, requests } = await recordingServer(200, ack);
    const client = new DpsHttpClient({ jobUrl: `${server.baseUrl}/api/dps/job/`, apiToken: "test-secret" });

    const response = await client.submitJob({
      algoId: "plant_growth",
      version: "main",
      queue: "cpu-8gb",
      identifier: "test-run",
      inputs: { year: 2024 }
    });

    expect(response).toEqual({ httpStatus: 200, body: ack });
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url).toBe("/api/dps/job");
    expect(requests[0].headers["content-type"]).toBe("application/json");
    expect(requests[0].headers.token).toBe("test-secret");
    expect(JSON.parse(requests[0].body)).toEqual({
      algo_id: "plant_growth",
      version: "main",
      queue: "cpu-8gb",
      identifier: "test-run",
      username: "anonymous",
      inputs: { year: 2024 }
    });

    await server.close();
  });

  it("returns a rejected submission instead of throwing", async () => {
    const ack = JSON.stringify({ status: "failed", http_status_code: 400, job_id: "", details: "bad queue" });
    const { server } = await recordingServer(400, ack);
    const client = new DpsHttpClient({ jobUrl: `${server.baseUrl}/api/dps/job` });

    await expect(
      client.submitJob({ algoId: "a", version: "v", queue: "q", identifier: "i", username: "tester" })
    ).resolves.toEqual({ httpStatus: 400, body: ack });

    await server.close();
  });

  it("addresses status, results and metrics by job id", async () => {
    const { server, requests } = await recordingServer();
    const client = new DpsHttpClient({ jobUrl: `${server.baseUrl}/api/dps/job`, proxyTicket: "test-ticket" });

    await client.fetchJobStatus("job 1");
    await client.fetchJobResult("job-1");
    await client.fetchJobMetrics("job-1");

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      "GET /api/dps/job/job%201/status",
      "GET /api/dps/job/job-1",
      "GET /api/dps/job/job-1/metrics"
    ]);
    expect(requests[0].headers.accept).toBe("application/xml");
    expect(requests[0].headers["proxy-ticket"]).toBe("test-ticket");
    expect(requests[0].headers.token).toBeUndefined();

    await server.close();
  });

  it("dismisses with a body-less POST to the revoke endpoint", async () => {
    const { server, requests } = await recordingServer(202, "<Accepted/>");
    const client = new DpsHttpClient({ jobUrl: `${server.baseUrl}/api/dps/job`, apiToken: "Bearer test-secret" });

    await expect(client.dismissJob("job-1")).resolves.toEqual({ httpStatus: 202, body: "<Accepted/>" });
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url).toBe("/api/dps/job/revoke/job-1");
    expect(requests[0].body).toBe("");
    expect(requests[0].headers.authorization).toBe("Bearer test-secret");

    await server.close();
  });
});
