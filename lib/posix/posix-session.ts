import { access, readdir, stat } from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import { isAbsolute, join } from "node:path";
import { pipeline } from "node:stream/promises";
import { EsnlSession, RemoteFileMetadata } from "../esnl-session";
import { sequenceReportName } from "../archive-layout";
import { ReportNotFoundError, TransferError } from "../esnl-errors";

/**
 * A session over a mirror of the archive in a local (or mounted) folder.
 */
export class PosixSession extends EsnlSession {
  constructor(absoluteRootFolder: string) {
    super(absoluteRootFolder);

    if (!isAbsolute(absoluteRootFolder))
      throw new Error("Archive root folder must be absolute");
  }

  protected get basePath(): string {
    return this._location;
  }

  public async connect(): Promise<void> {
    try {
      await access(this._location);
    } catch (e) {
      throw new TransferError(`Archive folder ${this._location} not accessible`, [
        { message: "Archive folder not accessible", path: this._location },
      ]);
    }
  }

  public async disconnect(): Promise<void> {
    // nothing is held open between calls
  }

  public async resolveFileMetadata(
    directory: string,
    accession: string,
  ): Promise<RemoteFileMetadata> {
    const name = sequenceReportName(accession);

    let entries: string[];
    try {
      entries = await readdir(directory);
    } catch (e) {
      throw new ReportNotFoundError(accession, directory);
    }

    if (!entries.includes(name))
      throw new ReportNotFoundError(accession, directory);

    const stats = await stat(join(directory, name));

    if (!stats.isFile()) throw new ReportNotFoundError(accession, directory);

    return { name: name, size: stats.size };
  }

  protected async transfer(
    remotePath: string,
    localPath: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    await pipeline(
      createReadStream(remotePath),
      createWriteStream(localPath),
      { signal: signal },
    );

    return true;
  }
}
