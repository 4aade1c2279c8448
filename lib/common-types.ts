export type ErrorReport = {
  state: "error";
  error: string;
  specific: ErrorSpecific[];
};

export type ErrorSpecific = {
  message: string;
  accession?: string;
  path?: string;
  attempt?: number;
};

/**
 * Why a lookup produced no value. None of these are programming errors -
 * an accession that is not present upstream is a normal outcome.
 */
export type AbsenceReason =
  | "not-found"
  | "download-failed"
  | "parse-failed"
  | "aborted";

export type Found<T> = {
  state: "found";
  value: T;
};

export type Absent = {
  state: "absent";
  reason: AbsenceReason;
};

export type Lookup<T> = Found<T> | Absent;

export function found<T>(value: T): Found<T> {
  return { state: "found", value: value };
}

export function absent(reason: AbsenceReason): Absent {
  return { state: "absent", reason: reason };
}
