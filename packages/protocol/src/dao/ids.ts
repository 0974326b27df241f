export type IdKind = 'dao' | 'proposal' | 'receipt';

export interface IdGenerator {
  next(kind: IdKind): string;
}

/** `dao-1`, `proposal-1`, `receipt-1`, ... counted per kind. */
export function sequentialIds(prefix = ''): IdGenerator {
  const counters: Record<IdKind, number> = { dao: 0, proposal: 0, receipt: 0 };
  return {
    next(kind: IdKind): string {
      counters[kind] += 1;
      return `${prefix}${kind}-${counters[kind]}`;
    },
  };
}
