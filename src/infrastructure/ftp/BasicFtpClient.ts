import { Client } from "basic-ftp";
import type { FtpClient } from "../../ports/FtpClient";

export class BasicFtpClient implements FtpClient {
  constructor(private readonly timeoutMs = 30_000) {}

  async download(url: URL, destPath: string): Promise<void> {
    const client = new Client(this.timeoutMs);
    try {
      await client.access({
        host: url.hostname,
        port: url.port ? Number(url.port) : 21,
        user: url.username ? decodeURIComponent(url.username) : "anonymous",
        password: url.password ? decodeURIComponent(url.password) : "anonymous@",
        secure: false
      });
      await client.downloadTo(destPath, decodeURIComponent(url.pathname));
    } finally {
      client.close();
    }
  }
}
