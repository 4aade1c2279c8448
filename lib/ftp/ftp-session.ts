import { AccessOptions, Client, FileInfo } from "basic-ftp";
import { EsnlSession, RemoteFileMetadata } from "../esnl-session";
import { sequenceReportName } from "../archive-layout";
import {
  OperationAbortedError,
  ReportNotFoundError,
  TransferError,
  describeError,
} from "../esnl-errors";

export type FtpSessionOptions = {
  // socket timeout handed to the FTP client (0 = none)
  timeoutMs?: number;
};

/**
 * A session against the archive's public FTP server. Logins are always
 * anonymous.
 */
export class FtpSession extends EsnlSession {
  private readonly _host: string;
  private readonly _port: number;
  private readonly _path: string;

  private readonly _client: Client;

  constructor(ftpUri: string, options: FtpSessionOptions = {}) {
    super(ftpUri);

    const url = new URL(ftpUri);

    if (url.protocol !== "ftp:")
      throw new Error(
        `FtpSession constructor() must be passed a valid FTP URI - instead it got ${url.protocol} as a protocol`,
      );

    this._host = url.hostname;
    this._port = url.port ? parseInt(url.port) : 21;

    // for consistency we always refer to remote folders with a trailing slash
    this._path = url.pathname.endsWith("/") ? url.pathname : url.pathname + "/";

    this._client = new Client(options.timeoutMs ?? 30000);
  }

  public get host(): string {
    return this._host;
  }

  public get port(): number {
    return this._port;
  }

  protected get basePath(): string {
    return this._path;
  }

  private get accessOptions(): AccessOptions {
    return {
      host: this._host,
      port: this._port,
      user: "anonymous",
      password: "anonymous@",
      secure: false,
    };
  }

  public async connect(signal?: AbortSignal): Promise<void> {
    try {
      await this.whileWatching(signal, () =>
        this._client.access(this.accessOptions),
      );
    } catch (e) {
      if (e instanceof OperationAbortedError) throw e;

      throw new TransferError(
        `Could not connect to ${this._host}:${this._port} - ${describeError(e)}`,
        [{ message: "FTP connection failed", path: this._location }],
      );
    }
  }

  public async disconnect(): Promise<void> {
    this._client.close();
  }

  public async resolveFileMetadata(
    directory: string,
    accession: string,
    signal?: AbortSignal,
  ): Promise<RemoteFileMetadata> {
    const name = sequenceReportName(accession);

    let listing: FileInfo[];
    try {
      listing = await this.whileWatching(signal, () =>
        this._client.list(directory),
      );
    } catch (e) {
      if (e instanceof OperationAbortedError) throw e;

      // the server answers a missing folder with a 550 - which is just "not there"
      throw new ReportNotFoundError(accession, directory);
    }

    const entry = listing.find((f) => f.isFile && f.name === name);

    if (!entry) throw new ReportNotFoundError(accession, directory);

    return { name: entry.name, size: entry.size };
  }

  protected async transfer(
    remotePath: string,
    localPath: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    try {
      // basic-ftp closes the client on any control socket error or timeout - so a
      // retried transfer has to log in again first
      if (this._client.closed) {
        if (signal?.aborted) throw new OperationAbortedError();

        await this.whileWatching(signal, () =>
          this._client.access(this.accessOptions),
        );
      }

      const response = await this.whileWatching(signal, () =>
        this._client.downloadTo(localPath, remotePath),
      );

      // 2xx is a completed transfer
      return response.code >= 200 && response.code < 300;
    } catch (e) {
      if (e instanceof OperationAbortedError) throw e;

      throw new TransferError(
        `Transfer of ${remotePath} failed - ${describeError(e)}`,
        [{ message: "FTP transfer failed", path: remotePath }],
      );
    }
  }

  /**
   * Run an FTP command - closing the client if the signal fires. The basic-ftp
   * client has no cancellation of its own, but closing it fails whatever
   * task is in progress.
   */
  private async whileWatching<T>(
    signal: AbortSignal | undefined,
    task: () => Promise<T>,
  ): Promise<T> {
    if (!signal) return task();

    if (signal.aborted) throw new OperationAbortedError();

    const onAbort = () => this._client.close();

    signal.addEventListener("abort", onAbort, { once: true });

    try {
      return await task();
    } catch (e) {
      if (signal.aborted) throw new OperationAbortedError();
      throw e;
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }
}
