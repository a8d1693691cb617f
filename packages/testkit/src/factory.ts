/**
 * Builds test records from a base that may depend on a running sequence
 * number, so repeated calls produce distinct ids.
 */
export function createFactory<T extends object>(base: (sequence: number) => T) {
  let sequence = 0;

  return (overrides: Partial<T> = {}): T => {
    sequence += 1;
    return {
      ...base(sequence),
      ...overrides
    };
  };
}
