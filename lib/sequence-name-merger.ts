import { SequenceEntity } from "./entity-types";

export type MergeResult<T extends SequenceEntity> = {
  // the reconciled collection - one entry per distinct accession, target
  // accessions first (in order of first appearance) then any the target did not have
  sequences: T[];

  // how many target entries were given a name
  matched: number;

  // source entries with no partner in the target (these are included in sequences)
  unmatched: T[];
};

/**
 * Copy ENA sequence names from the source sequences onto the target sequences,
 * matching purely on INSDC accession. Matched target entities are updated in place
 * (the source name always wins). Nothing is removed from the target - source
 * sequences without a match are returned as additions rather than being
 * silently dropped.
 *
 * If the target contains the same accession more than once, only the last of
 * them is named and it alone stands for that accession in the result's sequences.
 *
 * @param sourceSequences freshly fetched sequences (e.g. from an ENA report)
 * @param targetSequences the sequences we are adding names to
 */
export function mergeSequenceNames<T extends SequenceEntity>(
  sourceSequences: readonly T[],
  targetSequences: readonly T[],
): MergeResult<T> {
  const byAccession = new Map<string, T>();

  for (const targetSeq of targetSequences)
    byAccession.set(targetSeq.insdcAccession, targetSeq);

  const named = new Set<T>();
  const unmatched: T[] = [];

  for (const sourceSeq of sourceSequences) {
    const existing = byAccession.get(sourceSeq.insdcAccession);

    if (existing) {
      existing.enaSequenceName = sourceSeq.enaSequenceName;

      // a repeated source accession lands on the earlier source entry - that is not a match
      if (!unmatched.includes(existing)) named.add(existing);
    } else {
      byAccession.set(sourceSeq.insdcAccession, sourceSeq);
      unmatched.push(sourceSeq);
    }
  }

  return {
    sequences: Array.from(byAccession.values()),
    matched: named.size,
    unmatched: unmatched,
  };
}
