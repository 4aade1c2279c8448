import "jest-extended";
import { Client, FileInfo, FileType } from "basic-ftp";
import { FtpSession } from "../lib/ftp/ftp-session";
import {
  OperationAbortedError,
  ReportNotFoundError,
  TransferError,
} from "../lib/esnl-errors";

// these tests never touch the network - the basic-ftp client is stubbed out

function fileInfo(name: string, size: number, type = FileType.File): FileInfo {
  const f = new FileInfo(name);
  f.size = size;
  f.type = type;
  return f;
}

afterEach(() => {
  jest.restoreAllMocks();
});

test("connecting logs in anonymously", async () => {
  const access = jest
    .spyOn(Client.prototype, "access")
    .mockResolvedValue({ code: 230, message: "Login successful" });

  await new FtpSession("ftp://ftp.example.org:2121/pub").connect();

  expect(access).toHaveBeenCalledWith({
    host: "ftp.example.org",
    port: 2121,
    user: "anonymous",
    password: "anonymous@",
    secure: false,
  });
});

test("a failed login is a transfer error", async () => {
  jest
    .spyOn(Client.prototype, "access")
    .mockRejectedValue(new Error("ECONNREFUSED"));

  await expect(
    new FtpSession("ftp://ftp.example.org/pub").connect(),
  ).rejects.toBeInstanceOf(TransferError);
});

test("report metadata comes from the folder listing", async () => {
  const list = jest
    .spyOn(Client.prototype, "list")
    .mockResolvedValue([
      fileInfo("GCA_000002305.1_assembly_report.txt", 10),
      fileInfo("GCA_000002305.1_sequence_report.txt", 299),
      fileInfo("GCA_000002305.1", 0, FileType.Directory),
    ]);

  const s = new FtpSession("ftp://ftp.example.org/pub/assembly");
  const dir = await s.resolveDirectory("GCA_000002305.1");

  expect(await s.resolveFileMetadata(dir, "GCA_000002305.1")).toEqual({
    name: "GCA_000002305.1_sequence_report.txt",
    size: 299,
  });
  expect(list).toHaveBeenCalledWith("/pub/assembly/GCA_000/GCA_000002/");
});

test("a folder without the report is not found", async () => {
  jest
    .spyOn(Client.prototype, "list")
    .mockResolvedValue([fileInfo("GCA_000002305.2_sequence_report.txt", 299)]);

  await expect(
    new FtpSession("ftp://ftp.example.org/pub").resolveFileMetadata(
      "/pub/GCA_000/GCA_000002/",
      "GCA_000002305.1",
    ),
  ).rejects.toBeInstanceOf(ReportNotFoundError);
});

test("a folder that cannot be listed is not found", async () => {
  jest
    .spyOn(Client.prototype, "list")
    .mockRejectedValue(new Error("550 Failed to change directory"));

  await expect(
    new FtpSession("ftp://ftp.example.org/pub").resolveFileMetadata(
      "/pub/GCA_000/GCA_000002/",
      "GCA_000002305.1",
    ),
  ).rejects.toBeInstanceOf(ReportNotFoundError);
});

test("a transfer that errors is a transfer error", async () => {
  jest.spyOn(Client.prototype, "closed", "get").mockReturnValue(false);
  jest
    .spyOn(Client.prototype, "downloadTo")
    .mockRejectedValue(new Error("426 Connection closed"));

  await expect(
    new FtpSession("ftp://ftp.example.org/pub").download(
      "/pub/report.txt",
      "/tmp/never-written.txt",
      100,
    ),
  ).rejects.toBeInstanceOf(TransferError);
});

test("aborting closes the client and reports the abort", async () => {
  const controller = new AbortController();
  const close = jest.spyOn(Client.prototype, "close");

  jest.spyOn(Client.prototype, "list").mockImplementation(
    () =>
      new Promise((_resolve, reject) => {
        controller.signal.addEventListener("abort", () =>
          reject(new Error("User closed client")),
        );
        controller.abort();
      }),
  );

  await expect(
    new FtpSession("ftp://ftp.example.org/pub").resolveFileMetadata(
      "/pub/",
      "GCA_000002305.1",
      controller.signal,
    ),
  ).rejects.toBeInstanceOf(OperationAbortedError);

  expect(close).toHaveBeenCalled();
});

test("a transfer after the client was closed logs in again", async () => {
  // the first transfer runs on the live connection, which its failure closes
  jest
    .spyOn(Client.prototype, "closed", "get")
    .mockReturnValueOnce(false)
    .mockReturnValue(true);
  const access = jest
    .spyOn(Client.prototype, "access")
    .mockResolvedValue({ code: 230, message: "Login successful" });
  const downloadTo = jest
    .spyOn(Client.prototype, "downloadTo")
    .mockRejectedValueOnce(
      new Error("Client is closed because Timeout (control socket)"),
    )
    .mockResolvedValue({ code: 226, message: "Transfer complete" });

  const s = new FtpSession("ftp://ftp.example.org/pub");
  await s.connect();

  await expect(
    s.download("/pub/report.txt", "/tmp/never-written.txt", undefined),
  ).rejects.toBeInstanceOf(TransferError);

  await expect(
    s.download("/pub/report.txt", "/tmp/never-written.txt", undefined),
  ).resolves.toBeTrue();

  expect(access).toHaveBeenCalledTimes(2);
  expect(downloadTo).toHaveBeenCalledTimes(2);
});

test("a closed client is not logged in again once aborted", async () => {
  jest.spyOn(Client.prototype, "closed", "get").mockReturnValue(true);
  const access = jest.spyOn(Client.prototype, "access");
  const downloadTo = jest.spyOn(Client.prototype, "downloadTo");

  const controller = new AbortController();
  controller.abort();

  await expect(
    new FtpSession("ftp://ftp.example.org/pub").download(
      "/pub/report.txt",
      "/tmp/never-written.txt",
      100,
      controller.signal,
    ),
  ).rejects.toBeInstanceOf(OperationAbortedError);

  expect(access).not.toHaveBeenCalled();
  expect(downloadTo).not.toHaveBeenCalled();
});
