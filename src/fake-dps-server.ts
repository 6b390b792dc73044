import http from "http";
import { URL } from "url";

/**
 * Minimal fake job service for E2E and local runs.
 * - POST {prefix}/dps/job                 submission ack (JSON)
 * - GET  {prefix}/dps/job/{id}/status     Running until `pollsUntilDone`, then `finalStatus`
 * - GET  {prefix}/dps/job/{id}            results document
 * - GET  {prefix}/dps/job/{id}/metrics    metrics document
 * - POST {prefix}/dps/job/revoke/{id}     marks the job Dismissed
 * - GET  /files/{name}                    static download payloads
 */
export type FakeDpsServerOptions = {
  prefix?: string;
  pollsUntilDone?: number;
  finalStatus?: string;
  outputs?: string[];
  files?: Record<string, string>;
};

type FakeJob = { polls: number; dismissed: boolean };

const statusDocument = (jobId: string, status: string) =>
  '<?xml version="1.0" encoding="UTF-8"?>' +
  '<wps:StatusInfo xmlns:wps="http://www.opengis.net/wps/2.0">' +
  `<wps:JobID>${jobId}</wps:JobID><wps:Status>${status}</wps:Status></wps:StatusInfo>`;

const resultsDocument = (jobId: string, outputs: string[]) =>
  '<wps:Result xmlns:wps="http://www.opengis.net/wps/2.0">' +
  `<wps:JobID>${jobId}</wps:JobID>` +
  `<wps:Output id="output-${jobId}">${outputs.map((url) => `<wps:Data>${url}</wps:Data>`).join("")}</wps:Output>` +
  "</wps:Result>";

const metricsDocument = () =>
  "<metrics><machine_type>t3.large</machine_type><job_duration_seconds>42</job_duration_seconds>" +
  "<cpu_usage>1.5</cpu_usage><max_mem_usage>2048</max_mem_usage></metrics>";

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    let data = "";
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => {
      data += chunk;
    });
    req.on("end", () => resolve(data));
    req.on("error", reject);
  });

export const createFakeDpsServer = (options: FakeDpsServerOptions = {}): http.Server => {
  const prefix = options.prefix ?? "/api";
  const pollsUntilDone = options.pollsUntilDone ?? 3;
  const finalStatus = options.finalStatus ?? "Succeeded";
  const outputs = options.outputs ?? [];
  const files = options.files ?? {};
  const jobs = new Map<string, FakeJob>();
  const jobRoute = new RegExp(`^${prefix}/dps/job/([^/]+)(/status|/metrics)?$`);
  const revokeRoute = new RegExp(`^${prefix}/dps/job/revoke/([^/]+)$`);

  const send = (res: http.ServerResponse, status: number, contentType: string, body: string) => {
    res.writeHead(status, { "content-type": contentType });
    res.end(body);
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "POST" && pathname === `${prefix}/dps/job`) {
      const body = await readBody(req);
      let spec: unknown;
      try {
        spec = JSON.parse(body);
      } catch {
        spec = undefined;
      }
      const algoId = typeof spec === "object" && spec !== null && "algo_id" in spec ? spec.algo_id : undefined;
      if (typeof algoId !== "string" || algoId === "") {
        return send(res, 400, "application/json", JSON.stringify({
          status: "failed",
          http_status_code: 400,
          job_id: "",
          details: "algo_id is required"
        }));
      }
      const jobId = `job-${jobs.size + 1}`;
      jobs.set(jobId, { polls: 0, dismissed: false });
      return send(res, 200, "application/json", JSON.stringify({ status: "success", http_status_code: 200, job_id: jobId }));
    }

    const revoke = req.method === "POST" ? revokeRoute.exec(pathname) : null;
    if (revoke) {
      const job = jobs.get(decodeURIComponent(revoke[1]));
      if (!job) return send(res, 404, "application/xml", "<Error>unknown job</Error>");
      job.dismissed = true;
      return send(res, 200, "application/xml", "<Dismissed/>");
    }

    const match = req.method === "GET" ? jobRoute.exec(pathname) : null;
    if (match) {
      const jobId = decodeURIComponent(match[1]);
      const job = jobs.get(jobId);
      if (!job) return send(res, 404, "application/xml", "<Error>unknown job</Error>");

      if (match[2] === "/status") {
        job.polls += 1;
        const status = job.dismissed ? "Dismissed" : job.polls >= pollsUntilDone ? finalStatus : "Running";
        return send(res, 200, "application/xml", statusDocument(jobId, status));
      }
      if (match[2] === "/metrics") return send(res, 200, "application/xml", metricsDocument());
      return send(res, 200, "application/xml", resultsDocument(jobId, outputs));
    }

    const file = pathname.startsWith("/files/") ? files[pathname.slice("/files/".length)] : undefined;
    if (req.method === "GET" && file != null) {
      return send(res, 200, "application/octet-stream", file);
    }

    send(res, 404, "text/plain", "not found");
  };

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      send(res, 500, "text/plain", err instanceof Error ? err.message : String(err));
    });
  });
};

if (require.main === module) {
  const port = Number(process.env.FAKE_DPS_PORT ?? 3999);
  createFakeDpsServer({
    outputs: [`http://localhost:${port}/files/output.txt`],
    files: { "output.txt": "fake output\n" }
  }).listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake DPS server on http://localhost:${port}`);
  });
}
