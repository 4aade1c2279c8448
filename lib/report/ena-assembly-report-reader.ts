import { Readable } from "node:stream";
import { createInterface } from "node:readline";
import { AssemblyEntity, ChromosomeEntity } from "../entity-types";
import { ReportParseError } from "../esnl-errors";

export interface AssemblyReportReader {
  extractAssembly(): Promise<AssemblyEntity>;
}

export type AssemblyReportReaderOptions = {
  // the report rows do not name the assembly itself so the caller tells us
  accession?: string;
};

export type AssemblyReportReaderFactory = (
  stream: Readable,
  options: AssemblyReportReaderOptions,
) => AssemblyReportReader;

// accession, sequence-name, sequence-length, sequence-role, replicon-name, replicon-type, assembly-unit
const MINIMUM_COLUMNS = 4;

const CHROMOSOME_ROLE = "assembled-molecule";

/**
 * Reads an ENA assembly sequence report - a tab separated text file with one
 * row per sequence.
 */
export class EnaAssemblyReportReader implements AssemblyReportReader {
  private _assembly?: AssemblyEntity = undefined;

  constructor(
    private readonly _stream: Readable,
    private readonly _options: AssemblyReportReaderOptions = {},
  ) {}

  /**
   * Parse the report. The stream can only be consumed once so the
   * result is cached.
   */
  public async extractAssembly(): Promise<AssemblyEntity> {
    if (this._assembly) return this._assembly;

    const assembly: AssemblyEntity = {
      insdcAccession: this._options.accession ?? "",
      chromosomes: [],
    };
    const chromosomes: ChromosomeEntity[] = [];
    const seen = new Set<string>();

    const lines = createInterface({ input: this._stream, crlfDelay: Infinity });

    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;

      if (line.trim().length === 0 || line.startsWith("#")) continue;

      const columns = line.split("\t").map((c) => c.trim());

      if (columns[0] === "accession") continue;

      if (columns.length < MINIMUM_COLUMNS)
        throw new ReportParseError(
          `Expected at least ${MINIMUM_COLUMNS} tab separated columns but found ${columns.length}`,
          lineNumber,
        );

      const [accession, sequenceName, sequenceLength, sequenceRole] = columns;
      const repliconName = columns[4];

      if (accession.length === 0)
        throw new ReportParseError("Sequence accession is empty", lineNumber);

      if (seen.has(accession))
        throw new ReportParseError(
          `Sequence accession ${accession} appears more than once`,
          lineNumber,
        );
      seen.add(accession);

      const length = Number(sequenceLength);

      if (!/^\d+$/.test(sequenceLength) || !Number.isSafeInteger(length))
        throw new ReportParseError(
          `Sequence length '${sequenceLength}' is not a whole number`,
          lineNumber,
        );

      chromosomes.push({
        insdcAccession: accession,
        enaSequenceName: sequenceName.length > 0 ? sequenceName : null,
        contigType:
          sequenceRole === CHROMOSOME_ROLE ? "chromosome" : "scaffold",
        genbankSequenceName:
          repliconName && repliconName !== "na" ? repliconName : null,
        seqLength: length,
        assembly: assembly,
      });
    }

    assembly.chromosomes = chromosomes;
    this._assembly = assembly;

    return assembly;
  }
}

export const createEnaAssemblyReportReader: AssemblyReportReaderFactory = (
  stream,
  options,
) => new EnaAssemblyReportReader(stream, options);
