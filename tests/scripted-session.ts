import { writeFile } from "node:fs/promises";
import { EsnlSession, RemoteFileMetadata } from "../lib/esnl-session";
import { sequenceReportName } from "../lib/archive-layout";
import {
  OperationAbortedError,
  ReportNotFoundError,
  TransferError,
} from "../lib/esnl-errors";

export type TransferOutcome = "ok" | "throw" | "incomplete" | "truncated";

/**
 * An in-process stand-in for a remote archive. Each transfer takes the next
 * scripted outcome (the last one repeats forever).
 */
export class ScriptedSession extends EsnlSession {
  public connects = 0;
  public disconnects = 0;
  public transfers: { remotePath: string; localPath: string }[] = [];

  public missingReport = false;
  public failConnect = false;
  public failDisconnect = false;

  constructor(
    private readonly _content: string,
    private readonly _outcomes: TransferOutcome[] = ["ok"],
  ) {
    super("/scripted-archive");
  }

  protected get basePath(): string {
    return "/scripted-archive/";
  }

  public async connect(signal?: AbortSignal): Promise<void> {
    this.connects++;
    if (signal?.aborted) throw new OperationAbortedError();
    if (this.failConnect) throw new Error("connection refused");
  }

  public async disconnect(): Promise<void> {
    this.disconnects++;
    if (this.failDisconnect) throw new Error("disconnect failed");
  }

  public async resolveFileMetadata(
    directory: string,
    accession: string,
  ): Promise<RemoteFileMetadata> {
    if (this.missingReport) throw new ReportNotFoundError(accession, directory);

    return {
      name: sequenceReportName(accession),
      size: Buffer.byteLength(this._content),
    };
  }

  protected async transfer(
    remotePath: string,
    localPath: string,
  ): Promise<boolean> {
    this.transfers.push({ remotePath: remotePath, localPath: localPath });

    const outcome =
      this._outcomes[Math.min(this.transfers.length, this._outcomes.length) - 1];

    switch (outcome) {
      case "ok":
        await writeFile(localPath, this._content);
        return true;
      case "truncated":
        await writeFile(localPath, this._content.slice(0, 5));
        return true;
      case "incomplete":
        return false;
      case "throw":
        await writeFile(localPath, "partial");
        throw new TransferError("connection reset");
    }
  }
}
