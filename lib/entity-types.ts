// the entities are plain objects - the persistence layer that normally owns
// them is outside this library, so we only describe the fields we read or write

export type ContigType = "chromosome" | "scaffold";

/**
 * A single sequence within an assembly, keyed by its INSDC accession.
 */
export type SequenceEntity = {
  insdcAccession: string;

  // the name the ENA archive gives this sequence (null until known)
  enaSequenceName: string | null;

  // lookup only - the assembly owns the sequence, not the other way round
  assembly?: AssemblyEntity;
};

export type ChromosomeEntity = SequenceEntity & {
  contigType: ContigType;
  refseqAccession?: string | null;
  genbankSequenceName?: string | null;
  seqLength?: number | null;
};

export type AssemblyEntity = {
  insdcAccession: string;
  refseqAccession?: string | null;
  name?: string | null;
  organism?: string | null;
  taxid?: number | null;
  chromosomes?: ChromosomeEntity[] | null;
};

/**
 * Return a copy of the assembly that can be safely serialised - i.e. without
 * the back-references from each chromosome to its assembly.
 *
 * @param assembly
 */
export function assemblyToJson(assembly: AssemblyEntity) {
  return {
    ...assembly,
    chromosomes: assembly.chromosomes?.map(({ assembly: _, ...rest }) => rest),
  };
}

/**
 * Point each chromosome of the assembly back at it.
 *
 * @param assembly
 */
export function linkChromosomes(assembly: AssemblyEntity): AssemblyEntity {
  for (const c of assembly.chromosomes ?? []) c.assembly = assembly;

  return assembly;
}
