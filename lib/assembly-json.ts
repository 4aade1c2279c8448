import { z } from "zod";
import { AssemblyEntity, linkChromosomes } from "./entity-types";
import { ReportParseError } from "./esnl-errors";

const chromosomeSchema = z.object({
  insdcAccession: z.string().min(1),
  enaSequenceName: z.string().nullable().default(null),
  contigType: z.enum(["chromosome", "scaffold"]).default("chromosome"),
  refseqAccession: z.string().nullish(),
  genbankSequenceName: z.string().nullish(),
  seqLength: z.number().int().nonnegative().nullish(),
});

const assemblySchema = z.object({
  insdcAccession: z.string().min(1),
  refseqAccession: z.string().nullish(),
  name: z.string().nullish(),
  organism: z.string().nullish(),
  taxid: z.number().int().nullish(),
  chromosomes: z.array(chromosomeSchema).nullish(),
});

/**
 * Read an assembly from JSON text (as written by assemblyToJson), linking
 * the chromosomes back to the assembly.
 *
 * @param text
 */
export function parseAssemblyJson(text: string): AssemblyEntity {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ReportParseError("Assembly is not valid JSON");
  }

  const parsed = assemblySchema.safeParse(raw);

  if (!parsed.success)
    throw new ReportParseError(
      `Assembly JSON is not in the expected shape: ${parsed.error.issues
        .map((i) => `${i.path.join(".")} ${i.message}`)
        .join("; ")}`,
    );

  return linkChromosomes(parsed.data);
}
