import { isAbsolute } from "node:path";
import { EsnlSession } from "../esnl-session";
import { FtpSession, FtpSessionOptions } from "../ftp/ftp-session";
import { S3Session } from "../s3/s3-session";
import { PosixSession } from "../posix/posix-session";
import { ConfigurationError } from "../esnl-errors";

export class SessionFactory {
  public static CreateSession = (
    location: string,
    ftpOptions: FtpSessionOptions = {},
  ): EsnlSession => {
    if (location.startsWith("ftp://")) return new FtpSession(location, ftpOptions);
    if (location.startsWith("s3://")) return new S3Session(location);
    if (isAbsolute(location)) return new PosixSession(location);

    throw new ConfigurationError(
      `Archive location '${location}' is not an ftp:// or s3:// URI or an absolute path`,
      [{ message: "Archive location not recognised", path: location }],
    );
  };
}
