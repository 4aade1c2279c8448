export * from "./common-types";
export * from "./entity-types";
export * from "./esnl-errors";
export * from "./config";
export * from "./retry";
export * from "./archive-layout";
export * from "./esnl-session";
export * from "./session/session-factory";
export * from "./ftp/ftp-session";
export * from "./s3/s3-session";
export * from "./posix/posix-session";
export * from "./report/ena-assembly-report-reader";
export * from "./report-fetcher";
export * from "./sequence-name-merger";
export * from "./ena-assembly-data-source";
export * from "./alias-service";
export * from "./assembly-json";
export { logger } from "./logger";
