import { createReadStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { countBy } from "lodash";
import { AssemblyEntity, ChromosomeEntity } from "./entity-types";
import { AbsenceReason, Lookup, absent, found } from "./common-types";
import { EsnlConfig } from "./config";
import { EsnlSession } from "./esnl-session";
import { SessionFactory } from "./session/session-factory";
import { ReportFetcher } from "./report-fetcher";
import {
  AssemblyReportReaderFactory,
  createEnaAssemblyReportReader,
} from "./report/ena-assembly-report-reader";
import { mergeSequenceNames } from "./sequence-name-merger";
import { Sleep } from "./retry";
import {
  EsnlError,
  OperationAbortedError,
  TransferError,
  describeError,
} from "./esnl-errors";
import { Logger, logger as rootLogger } from "./logger";

export type LookupOptions = {
  signal?: AbortSignal;
};

export type EnrichmentOutcome =
  | {
      state: "skipped";
      reason: "no-assembly" | "already-named";
    }
  | {
      state: "unavailable";
      reason: AbsenceReason;
    }
  | {
      state: "merged";

      // how many of the assembly's chromosomes were given an ENA name
      matched: number;

      // chromosomes ENA knows about that the assembly did not have
      unmatched: ChromosomeEntity[];

      // the reconciled chromosome list (assembly chromosomes then unmatched ones)
      sequences: ChromosomeEntity[];
    };

export interface AssemblyDataSource {
  getAssemblyByAccession(
    accession: string,
    options?: LookupOptions,
  ): Promise<Lookup<AssemblyEntity>>;
}

export type EnaAssemblyDataSourceDependencies = {
  sessionFactory?: () => EsnlSession;
  readerFactory?: AssemblyReportReaderFactory;
  sleep?: Sleep;
  logger?: Logger;
};

/**
 * True if every chromosome/scaffold of the assembly already has an ENA sequence name
 * (and so true for an assembly with no sequences at all).
 *
 * @param assembly
 */
export function hasAllNamesAssigned(assembly: AssemblyEntity): boolean {
  return (assembly.chromosomes ?? []).every((c) => c.enaSequenceName != null);
}

/**
 * Finds assemblies in the ENA archive by accession, and uses them to fill
 * in ENA sequence names on assemblies we already hold.
 */
export class EnaAssemblyDataSource implements AssemblyDataSource {
  private readonly logger: Logger;
  private readonly fetcher: ReportFetcher;
  private readonly sessionFactory: () => EsnlSession;
  private readonly readerFactory: AssemblyReportReaderFactory;

  constructor(
    private readonly _config: EsnlConfig,
    dependencies: EnaAssemblyDataSourceDependencies = {},
  ) {
    this.logger = (dependencies.logger ?? rootLogger).child({
      component: "ena-data-source",
    });
    this.sessionFactory =
      dependencies.sessionFactory ??
      (() => SessionFactory.CreateSession(_config.archiveLocation, _config.ftp));
    this.readerFactory =
      dependencies.readerFactory ?? createEnaAssemblyReportReader;
    this.fetcher = new ReportFetcher({
      downloadDir: _config.downloadDir,
      retry: _config.retry,
      sleep: dependencies.sleep,
      logger: this.logger,
    });
  }

  public hasAllNamesAssigned(assembly: AssemblyEntity): boolean {
    return hasAllNamesAssigned(assembly);
  }

  /**
   * Fetch and parse the archive's report for an assembly.
   *
   * Anything that goes wrong fetching or parsing the report is logged and
   * returned as an absence. Failing to connect to the archive, or not being able to
   * create the local download folder, is thrown.
   *
   * @param accession
   * @param options
   */
  public async getAssemblyByAccession(
    accession: string,
    options: LookupOptions = {},
  ): Promise<Lookup<AssemblyEntity>> {
    const log = this.logger.child({ accession: accession });

    await mkdir(this._config.downloadDir, { recursive: true });

    const session = this.sessionFactory();

    try {
      try {
        await session.connect(options.signal);
      } catch (e) {
        if (e instanceof OperationAbortedError) return absent("aborted");
        if (e instanceof EsnlError) throw e;

        throw new TransferError(
          `Could not connect to archive ${session.location}: ${describeError(e)}`,
          [{ message: "Archive connection failed", accession: accession }],
        );
      }

      let downloaded: Lookup<string>;
      try {
        downloaded = await this.fetcher.fetch(session, accession, options);
      } catch (e) {
        log.warn(`Could not fetch assembly report: ${describeError(e)}`);
        return absent("download-failed");
      }

      if (downloaded.state !== "found") return downloaded;

      const artifactPath = downloaded.value;

      try {
        const assembly = await this.parseReport(artifactPath, accession);

        log.info(
          countBy(assembly.chromosomes ?? [], (c) => c.contigType),
          `Number of sequences in ${accession}: ${assembly.chromosomes?.length ?? 0}`,
        );

        return found(assembly);
      } catch (e) {
        log.warn(`Could not parse assembly report: ${describeError(e)}`);
        return absent("parse-failed");
      } finally {
        try {
          await rm(artifactPath, { force: true });
        } catch (e) {
          log.warn(
            `Could not delete downloaded report ${artifactPath}: ${describeError(e)}`,
          );
        }
      }
    } finally {
      try {
        await session.disconnect();
      } catch (e) {
        log.warn(`Error while disconnecting from archive: ${describeError(e)}`);
      }
    }
  }

  /**
   * Add ENA sequence names to the chromosomes and scaffolds of the assembly,
   * modifying it in place. An assembly that already has all its
   * names is left alone without contacting the archive.
   *
   * @param targetAssembly
   * @param options
   */
  public async addEnaSequenceNamesToAssembly(
    targetAssembly: AssemblyEntity | null | undefined,
    options: LookupOptions = {},
  ): Promise<EnrichmentOutcome> {
    if (!targetAssembly) return { state: "skipped", reason: "no-assembly" };

    if (hasAllNamesAssigned(targetAssembly))
      return { state: "skipped", reason: "already-named" };

    const enaAssembly = await this.getAssemblyByAccession(
      targetAssembly.insdcAccession,
      options,
    );

    if (enaAssembly.state !== "found")
      return { state: "unavailable", reason: enaAssembly.reason };

    const result = mergeSequenceNames(
      enaAssembly.value.chromosomes ?? [],
      targetAssembly.chromosomes ?? [],
    );

    if (this._config.appendUnmatchedSequences && result.unmatched.length > 0) {
      // the parsed ENA assembly is thrown away after this so we can adopt its chromosomes
      for (const c of result.unmatched) c.assembly = targetAssembly;

      targetAssembly.chromosomes = (targetAssembly.chromosomes ?? []).concat(
        result.unmatched,
      );
    }

    return {
      state: "merged",
      matched: result.matched,
      unmatched: result.unmatched,
      sequences: result.sequences,
    };
  }

  private async parseReport(
    artifactPath: string,
    accession: string,
  ): Promise<AssemblyEntity> {
    const stream = createReadStream(artifactPath);

    try {
      const assembly = await this.readerFactory(stream, {
        accession: accession,
      }).extractAssembly();

      // the report itself does not carry the assembly accession
      if (!assembly.insdcAccession) assembly.insdcAccession = accession;

      return assembly;
    } finally {
      stream.destroy();
    }
  }
}
