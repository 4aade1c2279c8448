import { AssemblyEntity, ChromosomeEntity, linkChromosomes } from "./entity-types";

/**
 * The lookups the alias service needs from whatever is storing chromosomes.
 */
export interface ChromosomeLookup {
  getChromosomeByGenbank(genbank: string): ChromosomeEntity | undefined;
  getChromosomeByRefseq(refseq: string): ChromosomeEntity | undefined;
}

/**
 * Holds assemblies in memory, indexed by assembly accession and by the
 * GenBank and RefSeq accessions of their chromosomes.
 */
export class InMemoryAssemblyStore implements ChromosomeLookup {
  private readonly _assemblies = new Map<string, AssemblyEntity>();
  private readonly _byGenbank = new Map<string, ChromosomeEntity>();
  private readonly _byRefseq = new Map<string, ChromosomeEntity>();

  /**
   * Store (or replace) an assembly. Its chromosomes are pointed back at it.
   *
   * @param assembly
   */
  public save(assembly: AssemblyEntity): AssemblyEntity {
    const previous = this._assemblies.get(assembly.insdcAccession);

    if (previous) this.unindex(previous);

    linkChromosomes(assembly);
    this._assemblies.set(assembly.insdcAccession, assembly);

    for (const c of assembly.chromosomes ?? []) {
      this._byGenbank.set(c.insdcAccession, c);
      if (c.refseqAccession) this._byRefseq.set(c.refseqAccession, c);
    }

    return assembly;
  }

  public getAssemblyByAccession(accession: string): AssemblyEntity | undefined {
    return this._assemblies.get(accession);
  }

  public getChromosomeByGenbank(genbank: string): ChromosomeEntity | undefined {
    return this._byGenbank.get(genbank);
  }

  public getChromosomeByRefseq(refseq: string): ChromosomeEntity | undefined {
    return this._byRefseq.get(refseq);
  }

  public get size(): number {
    return this._assemblies.size;
  }

  private unindex(assembly: AssemblyEntity) {
    for (const c of assembly.chromosomes ?? []) {
      this._byGenbank.delete(c.insdcAccession);
      if (c.refseqAccession) this._byRefseq.delete(c.refseqAccession);
    }
  }
}

export class AliasService {
  constructor(private readonly _chromosomes: ChromosomeLookup) {}

  public getAssemblyByChromosomeGenbank(
    chrGenbank: string,
  ): AssemblyEntity | undefined {
    return this._chromosomes.getChromosomeByGenbank(chrGenbank)?.assembly;
  }

  public getAssemblyByChromosomeRefseq(
    chrRefseq: string,
  ): AssemblyEntity | undefined {
    return this._chromosomes.getChromosomeByRefseq(chrRefseq)?.assembly;
  }
}
