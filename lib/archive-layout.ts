import { InvalidAccessionError } from "./esnl-errors";

// GCA_ (GenBank) or GCF_ (RefSeq), nine digits, a dot and a version
const ASSEMBLY_ACCESSION_REGEX = /^GC[AF]_(\d{9})\.\d+$/;

export function isAssemblyAccession(accession: string): boolean {
  return ASSEMBLY_ACCESSION_REGEX.test(accession);
}

/**
 * The archive shards assemblies into two levels of folders built from
 * the accession prefix. For "GCA_000002305.1" these are "GCA_000" and "GCA_000002".
 *
 * @param accession
 * @returns the relative folder path - always with a trailing slash
 */
export function assemblyDirectory(accession: string): string {
  const m = ASSEMBLY_ACCESSION_REGEX.exec(accession);

  if (!m) throw new InvalidAccessionError(accession);

  const prefix = accession.slice(0, 4);

  return `${prefix}${m[1].slice(0, 3)}/${prefix}${m[1].slice(0, 6)}/`;
}

/**
 * The name of the sequence report for an assembly accession.
 *
 * @param accession
 */
export function sequenceReportName(accession: string): string {
  return `${accession}_sequence_report.txt`;
}

/**
 * Join a folder path (with or without a trailing slash) to a relative part,
 * using "/" whatever platform we are on (remote paths are never native paths).
 *
 * @param folder
 * @param relative
 */
export function joinRemote(folder: string, relative: string): string {
  if (folder.length === 0) return relative;

  return folder.endsWith("/") ? folder + relative : `${folder}/${relative}`;
}
