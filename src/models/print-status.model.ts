export type PrintStatus = 'PENDING' | 'PRINTED' | 'FAILED' | 'UNKNOWN';

/** Known values of the service's `printflag` field */
const PRINT_FLAGS: ReadonlyMap<number, PrintStatus> = new Map<number, PrintStatus>([
  [0, 'PENDING'],
  [1, 'PRINTED'],
  [2, 'FAILED'],
]);

/** Map a raw status code; codes the service adds later read as UNKNOWN */
export function toPrintStatus(flag: number | undefined): PrintStatus {
  if (flag === undefined) return 'UNKNOWN';
  return PRINT_FLAGS.get(flag) ?? 'UNKNOWN';
}
