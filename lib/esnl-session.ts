import { stat } from "node:fs/promises";
import { isInteger } from "lodash";
import { assemblyDirectory, joinRemote } from "./archive-layout";
import { DownloadFailedError } from "./esnl-errors";

export type RemoteFileMetadata = {
  name: string;

  // undefined if the remote side could not tell us
  size?: number;
};

/**
 * A connection to an archive holding assembly reports. Concrete sessions
 * talk FTP, S3 or just read a local mirror folder.
 *
 * A session is used for a single lookup and then disconnected.
 */
export abstract class EsnlSession {
  protected constructor(protected readonly _location: string) {}

  /**
   * The URL/URI/path that describes the archive root.
   * e.g. "ftp://ftp.ebi.ac.uk/pub/databases/ena/assembly" or "/Users/person/mirror"
   */
  public get location(): string {
    return this._location;
  }

  /**
   * The base path (in whatever scheme the session uses) that assembly
   * folders are found under.
   */
  protected abstract get basePath(): string;

  public abstract connect(signal?: AbortSignal): Promise<void>;

  public abstract disconnect(): Promise<void>;

  /**
   * Describe the report for the accession inside the given directory.
   * Must throw ReportNotFoundError if there is no such report.
   */
  public abstract resolveFileMetadata(
    directory: string,
    accession: string,
    signal?: AbortSignal,
  ): Promise<RemoteFileMetadata>;

  /**
   * Copy the remote file to the local path.
   *
   * @returns false if the transfer did not complete (without there being an error as such)
   */
  protected abstract transfer(
    remotePath: string,
    localPath: string,
    signal?: AbortSignal,
  ): Promise<boolean>;

  /**
   * The remote directory holding the reports for the accession (with trailing slash).
   *
   * @param accession
   */
  public async resolveDirectory(accession: string): Promise<string> {
    return joinRemote(this.basePath, assemblyDirectory(accession));
  }

  /**
   * Download the remote file into the local path and check that what
   * arrived is the size the archive said it would be.
   *
   * @param remotePath
   * @param localPath
   * @param expectedSize the size reported by the archive (skipped if not an integer)
   * @param signal
   */
  public async download(
    remotePath: string,
    localPath: string,
    expectedSize: number | undefined,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (!(await this.transfer(remotePath, localPath, signal))) return false;

    if (isInteger(expectedSize)) {
      const actual = (await stat(localPath)).size;

      if (actual !== expectedSize)
        throw new DownloadFailedError(
          `Downloaded ${actual} bytes of ${remotePath} but expected ${expectedSize}`,
          [{ message: "Downloaded size mismatch", path: remotePath }],
        );
    }

    return true;
  }
}
