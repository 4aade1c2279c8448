import { writeFile } from "node:fs/promises";
import {
  GetObjectCommand,
  HeadObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { isInteger } from "lodash";
import { EsnlSession, RemoteFileMetadata } from "../esnl-session";
import { joinRemote, sequenceReportName } from "../archive-layout";
import { ReportNotFoundError, TransferError } from "../esnl-errors";

/**
 * A session over a mirror of the archive held in an S3 bucket.
 */
export class S3Session extends EsnlSession {
  private readonly _bucket: string;
  private readonly _key: string;

  private _client?: S3Client = undefined;

  constructor(s3RootUri: string) {
    super(s3RootUri);

    const url = new URL(s3RootUri);

    if (url.protocol !== "s3:")
      throw new Error(
        `S3Session constructor() must be passed a valid S3 URI - instead it got ${url.protocol} as a protocol`,
      );

    // not a proper check but might stop some invalid bucket name mixups
    if (!url.hostname || url.hostname.length < 3)
      throw new Error(
        `S3Session constructor() must be passed a valid S3 URI - instead it got ${url.host} as a possible bucket name`,
      );

    this._bucket = url.hostname;
    // S3 keys do not actually start with a leading / - that we will get from the url.pathname - so we remove
    this._key = url.pathname.substring(1);

    // for consistency throughout our own S3 code - we always refer to S3 folders as keys with trailing slashes
    // (the root of the bucket is the empty key)
    if (this._key.length > 0 && !this._key.endsWith("/"))
      this._key = this._key + "/";
  }

  public get bucket(): string {
    return this._bucket;
  }

  public get key(): string {
    return this._key;
  }

  protected get basePath(): string {
    return this._key;
  }

  private get client(): S3Client {
    if (!this._client)
      throw new Error("S3Session used before connect() was called");

    return this._client;
  }

  public async connect(): Promise<void> {
    // credentials and region come from the standard AWS environment
    this._client = new S3Client({});
  }

  public async disconnect(): Promise<void> {
    this._client?.destroy();
    this._client = undefined;
  }

  public async resolveFileMetadata(
    directory: string,
    accession: string,
    signal?: AbortSignal,
  ): Promise<RemoteFileMetadata> {
    const name = sequenceReportName(accession);

    try {
      const headOutput = await this.client.send(
        new HeadObjectCommand({
          Bucket: this._bucket,
          Key: joinRemote(directory, name),
        }),
        { abortSignal: signal },
      );

      return {
        name: name,
        size: isInteger(headOutput.ContentLength)
          ? headOutput.ContentLength
          : undefined,
      };
    } catch (e) {
      if (
        e instanceof S3ServiceException &&
        e.$metadata.httpStatusCode === 404
      )
        throw new ReportNotFoundError(accession, directory);

      throw e;
    }
  }

  protected async transfer(
    remotePath: string,
    localPath: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const getOutput = await this.client.send(
      new GetObjectCommand({
        Bucket: this._bucket,
        Key: remotePath,
      }),
      { abortSignal: signal },
    );

    if (!getOutput.Body)
      throw new TransferError(`Could not get S3 content for ${remotePath}`, [
        { message: "S3 object had no body", path: `s3://${this._bucket}/${remotePath}` },
      ]);

    // reports are a few hundred KiB at most so we are fine holding one in memory
    await writeFile(localPath, await getOutput.Body.transformToByteArray());

    return true;
  }
}
