export interface FtpClient {
  download(url: URL, destPath: string): Promise<void>;
}
