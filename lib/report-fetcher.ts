import { randomUUID } from "node:crypto";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import { EsnlSession, RemoteFileMetadata } from "./esnl-session";
import { Lookup, absent, found } from "./common-types";
import { joinRemote } from "./archive-layout";
import {
  DownloadFailedError,
  OperationAbortedError,
  describeError,
} from "./esnl-errors";
import { RetryPolicy, Sleep, retryWithBackoff } from "./retry";
import { Logger, logger as rootLogger } from "./logger";

export type ReportFetcherOptions = {
  downloadDir: string;
  retry: RetryPolicy;
  sleep?: Sleep;
  logger?: Logger;
};

export type FetchOptions = {
  signal?: AbortSignal;
};

/**
 * Downloads the sequence report for an accession into the local download folder,
 * retrying failed transfers with exponential backoff.
 */
export class ReportFetcher {
  private readonly logger: Logger;

  constructor(private readonly _options: ReportFetcherOptions) {
    this.logger = (_options.logger ?? rootLogger).child({
      component: "report-fetcher",
    });
  }

  /**
   * The local path that a download of the named remote file goes to. Each call
   * gives a different path so that lookups of the same accession
   * running at the same time do not write over each other.
   *
   * @param remoteName
   */
  public artifactPath(remoteName: string): string {
    return join(this._options.downloadDir, `${randomUUID()}-${remoteName}`);
  }

  /**
   * Fetch the report for the accession.
   *
   * @param session a connected session
   * @param accession
   * @param options
   * @returns the local path of the downloaded report (which the caller must delete), or an absence
   */
  public async fetch(
    session: EsnlSession,
    accession: string,
    options: FetchOptions = {},
  ): Promise<Lookup<string>> {
    const log = this.logger.child({ accession: accession });

    // working out where the report is happens once - if the archive has no report
    // for the accession then asking again will not help
    let directory: string;
    let metadata: RemoteFileMetadata;
    try {
      directory = await session.resolveDirectory(accession);
      metadata = await session.resolveFileMetadata(
        directory,
        accession,
        options.signal,
      );
    } catch (e) {
      if (e instanceof OperationAbortedError) return absent("aborted");

      log.warn(`Assembly report not found: ${describeError(e)}`);
      return absent("not-found");
    }

    const remotePath = joinRemote(directory, metadata.name);
    const localPath = this.artifactPath(metadata.name);

    try {
      await retryWithBackoff(
        async (attempt) => {
          try {
            const success = await session.download(
              remotePath,
              localPath,
              metadata.size,
              options.signal,
            );

            if (!success)
              throw new DownloadFailedError(
                `Transfer of ${remotePath} did not complete`,
                [
                  {
                    message: "Transfer did not complete",
                    accession: accession,
                    path: remotePath,
                    attempt: attempt,
                  },
                ],
              );
          } catch (e) {
            // never leave a partial file around between attempts
            await rm(localPath, { force: true });
            throw e;
          }
        },
        this._options.retry,
        {
          sleep: this._options.sleep,
          signal: options.signal,
          onRetry: (e, attempt, delayMs) =>
            log.warn(
              { attempt: attempt, delayMs: delayMs },
              `Error downloading assembly report, will retry: ${describeError(e)}`,
            ),
        },
      );
    } catch (e) {
      if (e instanceof OperationAbortedError) {
        log.warn("Assembly report download aborted");
        return absent("aborted");
      }

      log.warn(
        { attempts: this._options.retry.maxAttempts },
        `Assembly report could not be downloaded: ${describeError(e)}`,
      );
      return absent("download-failed");
    }

    log.info({ path: localPath }, "Assembly report downloaded");

    return found(localPath);
  }
}
